/**
 * Environment Configuration
 *
 * Loads and validates environment variables. CLI flags take precedence
 * over every value defined here.
 *
 * @module config/environment
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_LOG_FILE, DEFAULT_MAX_CONCURRENT } from '@/constants/sorter.constants';

// Load .env file
dotenv.config();

/**
 * Environment variables schema for validation
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).optional(),
  LOG_FILE_PATH: z.string().min(1).default(DEFAULT_LOG_FILE),
  LOG_PRETTY: z.enum(['true', 'false']).optional().transform((v) => (v === undefined ? undefined : v === 'true')),

  // Sorting
  SORTER_MAX_CONCURRENT: z
    .string()
    .default(String(DEFAULT_MAX_CONCURRENT))
    .transform(Number)
    .pipe(z.number().int().positive()),
});

export type Environment = z.infer<typeof envSchema>;

/**
 * Parse and validate a set of environment variables
 *
 * @throws Error listing the offending variables
 */
export function parseEnvironment(vars: NodeJS.ProcessEnv): Environment {
  const parsed = envSchema.safeParse(vars);

  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(', ');
    throw new Error(`Invalid environment variables: ${fields}`);
  }

  return parsed.data;
}

/**
 * Typed environment configuration
 */
export const env = parseEnvironment(process.env);

export const isProd = env.NODE_ENV === 'production';

/**
 * Whether console log lines should be pretty-printed
 */
export const usePrettyLogs = env.LOG_PRETTY ?? !isProd;
