import { LogLevel } from '@nestjs/common';
import * as path from 'path';
import { z } from 'zod';

import { DbContextOptions } from '../types/options';

export const DEFAULT_SEED_FILE = path.resolve(__dirname, '../../../data/customers.json');

const booleanString = z
  .enum(['true', 'false'])
  .transform(value => value === 'true');

const logLevels: [LogLevel, ...LogLevel[]] = ['log', 'error', 'warn', 'debug', 'verbose'];

const envSchema = z.object({
  DATABASE_PATH: z.string().min(1).default(':memory:'),
  DATABASE_SYNCHRONIZE: booleanString.default('true'),
  DATABASE_LOGGING: booleanString.default('false'),
  DATABASE_SEED_FILE: z.string().default(DEFAULT_SEED_FILE),
  // the levels the SQLite driver accepts in startTransaction
  TRANSACTION_ISOLATION_LEVEL: z.enum(['READ UNCOMMITTED', 'SERIALIZABLE']).optional(),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVELS: z
    .string()
    .default('log,warn,error')
    .transform(value => value.split(',').map(level => level.trim()).filter(level => level.length > 0))
    .pipe(z.array(z.enum(logLevels)))
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Reads the application configuration from environment variables.
 * Throws a ZodError describing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return envSchema.parse(env);
}

export function toDbContextOptions(config: AppConfig): DbContextOptions {
  return {
    type: 'better-sqlite3',
    database: config.DATABASE_PATH,
    synchronize: config.DATABASE_SYNCHRONIZE,
    enableLogging: config.DATABASE_LOGGING
  };
}
