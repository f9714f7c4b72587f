import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';

/**
 * Load environment variables from .env file
 *
 * Must run before the config module is first imported: config is built once,
 * from process.env, at import time.
 */
export function loadEnv(projectRoot: string): void {
  // Guard: only load once
  if (process.env.__CONCORDANCE_ENV_LOADED) return;

  const envPath = resolve(projectRoot, '.env');
  if (existsSync(envPath)) {
    // Keep dotenv quiet so CLI output stays machine-readable
    dotenvConfig({ path: envPath, quiet: true });
  }

  process.env.__CONCORDANCE_ENV_LOADED = '1';
}
