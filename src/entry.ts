#!/usr/bin/env node
import { buildProgram } from './cli/governance-cli.js';
import { defaultRuntime } from './runtime.js';
import { describeError } from './errors.js';

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    defaultRuntime.error(describeError(error));
    defaultRuntime.exit(1);
  });
