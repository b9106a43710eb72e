/**
 * Environment Loader - process environment layered over local .env files
 *
 * Loading hierarchy (first hit wins, per variable):
 * 1. Process environment
 * 2. Local .env / .env.local in the working directory (development only)
 *
 * @module config/credentials
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import dotenv from 'dotenv';

export type EnvSource = Readonly<Record<string, string | undefined>>;

export interface LoadedEnvironment {
  /** Merged view: process environment over .env values */
  vars: Record<string, string>;
  /** .env files that contributed, in load order */
  dotenvFiles: string[];
}

/** Checked in this order; earlier files win */
export const DOTENV_FILES = ['.env.local', '.env'];

/** Variables holding secrets; never echoed */
export const SECRET_ENV_VARS = ['TABLEAU_TOKEN_SECRET', 'SLACK_WEBHOOK_URL'];

export interface LoadEnvironmentOptions {
  env?: EnvSource;
  cwd?: string;
}

/**
 * Merge the process environment with any local .env files. `.env` files
 * are skipped entirely when NODE_ENV is "production".
 */
export async function loadEnvironment(options: LoadEnvironmentOptions = {}): Promise<LoadedEnvironment> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const vars: Record<string, string> = {};
  const dotenvFiles: string[] = [];

  if (env.NODE_ENV !== 'production') {
    for (const name of DOTENV_FILES) {
      const path = join(cwd, name);
      if (!existsSync(path)) continue;

      const parsed = dotenv.parse(await readFile(path, 'utf-8'));
      for (const [key, value] of Object.entries(parsed)) {
        if (!(key in vars)) vars[key] = value;
      }
      dotenvFiles.push(path);
      console.warn(`[config] Loaded ${path} - development only!`);
    }
  }

  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      vars[key] = value;
    }
  }

  return { vars, dotenvFiles };
}
