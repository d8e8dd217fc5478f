/**
 * CLI option schemas
 *
 * @module schemas/cli
 */

import { z } from 'zod';

export const cliOptionsSchema = z.object({
  sourceFolder: z.string().min(1, 'source_folder is required'),
  outputFolder: z.string().min(1, 'output_folder is required'),
  maxConcurrent: z.coerce
    .number({ invalid_type_error: '--max-concurrent must be a number' })
    .int('--max-concurrent must be an integer')
    .positive('--max-concurrent must be greater than 0'),
  verbose: z.boolean().default(false),
  logFile: z.string().min(1),
  strict: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;
