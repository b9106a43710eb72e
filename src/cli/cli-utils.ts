import type { RuntimeEnv } from '../runtime.js';
import { describeError } from '../errors.js';

/**
 * Run a command action; anything it throws is reported and exits 1.
 */
export async function runCommandWithRuntime(runtime: RuntimeEnv, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    runtime.error(describeError(error));
    runtime.exit(1);
  }
}
