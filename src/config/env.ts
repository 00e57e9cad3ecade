import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';

/**
 * Load environment variables from the project's .env file.
 *
 * Call before ./index.js is imported: the config singleton reads
 * process.env once, at import time.
 */
export function loadEnv(projectRoot: string): void {
  if (process.env.__FOTOREPORT_ENV_LOADED) return;

  const envPath = resolve(projectRoot, '.env');
  if (existsSync(envPath)) {
    dotenvConfig({ path: envPath });
  }

  process.env.__FOTOREPORT_ENV_LOADED = '1';
}
