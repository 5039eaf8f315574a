import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';

/**
 * Load environment variables from a .env file in the working directory.
 *
 * Must run before the config module is first imported.
 */
export function loadEnv(cwd: string = process.cwd()): void {
  if (process.env.__MD_DIGEST_ENV_LOADED) return;

  const envPath = resolve(cwd, '.env');
  if (existsSync(envPath)) {
    dotenvConfig({ path: envPath });
  }

  process.env.__MD_DIGEST_ENV_LOADED = '1';
}
