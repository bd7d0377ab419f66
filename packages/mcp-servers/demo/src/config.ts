/**
 * Environment configuration for the demo server.
 */

import { z } from 'zod';
import { LogLevel, optionalEnv, validate } from '@mcp-demo/shared';

export const DEFAULT_DB_PATH = 'test.db';

const DemoEnv = z.object({
  DB_PATH: optionalEnv(z.string().default(DEFAULT_DB_PATH)),
  LOG_LEVEL: optionalEnv(LogLevel.default('info')),
});

export interface DemoConfig {
  /** SQLite database file */
  dbPath: string;
  logLevel: LogLevel;
}

/**
 * Read configuration from the environment.
 * Throws ValidationError when a variable is present but malformed.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): DemoConfig {
  const parsed = validate(DemoEnv, env);

  return {
    dbPath: parsed.DB_PATH,
    logLevel: parsed.LOG_LEVEL,
  };
}
