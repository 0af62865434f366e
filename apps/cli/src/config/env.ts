/**
 * Environment
 *
 * Loaded before anything that creates a logger, so LOG_LEVEL and
 * NODE_ENV from the repo-root .env take effect.
 */

import { config as dotenvConfig } from 'dotenv';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

// Get monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../..');

// Load .env from monorepo root
dotenvConfig({ path: resolve(monorepoRoot, '.env') });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  EDIT_ASSIST_SETTINGS: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);

export const DEFAULT_SETTINGS_FILE = join(homedir(), '.edit-assist', 'settings.json');

/**
 * Settings file path: EDIT_ASSIST_SETTINGS when set (relative paths are
 * taken from the working directory), else ~/.edit-assist/settings.json.
 */
export function settingsFilePath(source: Env = env): string {
  return source.EDIT_ASSIST_SETTINGS ? resolve(source.EDIT_ASSIST_SETTINGS) : DEFAULT_SETTINGS_FILE;
}
