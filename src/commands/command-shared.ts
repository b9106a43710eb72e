import type { RuntimeEnv } from '../runtime.js';
import { loadConfig, type FrozenConfig, type LoadConfigOptions } from '../config/config.js';
import { ConfigError } from '../errors.js';

/**
 * Load the config, or report every validation issue and exit 1.
 */
export async function requireValidConfig(
  options: LoadConfigOptions,
  runtime: RuntimeEnv,
): Promise<FrozenConfig | null> {
  try {
    return await loadConfig(options);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    runtime.error(error.message);
    runtime.exit(1);
    return null;
  }
}

/** Split a comma separated flag value ("users, workbooks"). */
export function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}
