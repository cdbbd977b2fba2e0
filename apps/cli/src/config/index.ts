/**
 * CLI Configuration
 *
 * Environment settings. Writer parameters come from config.json in the
 * data directory (see @sftp-writer/core).
 */

import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '@sftp-writer/core';

export const APP_VERSION = '1.0.0';

const DEFAULT_DATA_DIR = './data';

// Environment schema
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  KBC_DATADIR: z.string().min(1).optional(),
});

export interface CliConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  dataDir: string;
}

/**
 * Resolve settings from the environment and command-line overrides.
 * The --data-dir option wins over KBC_DATADIR.
 */
export function loadCliConfig(
  overrides: { dataDir?: string } = {},
  env: NodeJS.ProcessEnv = process.env
): CliConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('Invalid environment', issues);
  }
  const parsed = result.data;

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    dataDir: resolve(overrides.dataDir ?? parsed.KBC_DATADIR ?? DEFAULT_DATA_DIR),
  };
}
