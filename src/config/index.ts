/**
 * Configuration Module
 *
 * Loads and validates environment variables for the comment window CLI.
 * Uses Zod for runtime validation with sensible defaults.
 * The date and filter modules never read configuration; only the CLI does.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { isAbsolute, join } from 'node:path';

// Environment schema with optional values and defaults
const envSchema = z.object({
  // Region used when a request names none
  COMMENT_WINDOW_DEFAULT_REGION: z
    .string()
    .trim()
    .min(2)
    .max(5)
    .default('US'),

  // Base directory for relative --output paths
  COMMENT_WINDOW_OUTPUT_DIR: z.string().optional(),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

// Parse environment
const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment variables:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env: Env = parseResult.data;

/**
 * Application configuration singleton
 */
export const config = {
  // Environment
  nodeEnv: env.NODE_ENV,
  isProduction: env.NODE_ENV === 'production',
  isDevelopment: env.NODE_ENV === 'development',
  isTest: env.NODE_ENV === 'test',

  // Filtering defaults
  defaultRegion: env.COMMENT_WINDOW_DEFAULT_REGION.toUpperCase(),

  // Output directory (undefined means relative to the working directory)
  outputDir: env.COMMENT_WINDOW_OUTPUT_DIR,
} as const;

/**
 * Resolve an output file path against the configured output directory.
 * Absolute paths are returned unchanged.
 */
export function resolveOutputPath(filePath: string): string {
  if (isAbsolute(filePath) || !config.outputDir) {
    return filePath;
  }
  return join(config.outputDir, filePath);
}

// Re-export types
export type Config = typeof config;
