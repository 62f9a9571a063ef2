/**
 * Configuration Module
 *
 * Loads and validates environment variables for the immunization ETL.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { TableNameSchema } from '../schemas/table.js';

/** Table written when no `--table` is given */
export const DEFAULT_TABLE_NAME = 'ns_school_immunization';

// Environment schema with optional values and defaults
export const envSchema = z.object({
  // Data directory (tables and run checkpoints)
  IMMUNIZATION_ETL_DATA_DIR: z.string().min(1).optional(),

  // Destination table
  IMMUNIZATION_ETL_TABLE: TableNameSchema.default(DEFAULT_TABLE_NAME),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Build the configuration object from validated environment values.
 */
export function buildConfig(env: Env) {
  return {
    // Environment
    nodeEnv: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    isDevelopment: env.NODE_ENV === 'development',
    isTest: env.NODE_ENV === 'test',

    // Data directory
    dataDir: env.IMMUNIZATION_ETL_DATA_DIR ?? join(homedir(), '.immunization-etl'),

    // Destination table
    tableName: env.IMMUNIZATION_ETL_TABLE,
  } as const;
}

// Parse environment
const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment variables:');
  console.error(parseResult.error.format());
  process.exit(1);
}

/**
 * Application configuration singleton
 */
export const config = buildConfig(parseResult.data);

// Re-export types
export type Config = ReturnType<typeof buildConfig>;

// Re-export group override loading
export * from './overrides.js';
