/**
 * Centralized Environment Configuration
 *
 * Validates all environment variables with Zod.
 * Call `loadEnv()` instead of accessing process.env directly.
 *
 * @example
 * ```typescript
 * import { loadEnv } from './config/env.js';
 * const env = loadEnv();
 * console.log(env.LOG_LEVEL); // Type-safe access
 * ```
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

/**
 * Environment variable schema with validation
 */
const envSchema = z.object({
    /**
     * Log level for the logger
     * @default 'info'
     */
    LOG_LEVEL: z
        .enum(['debug', 'info', 'warn', 'error'])
        .default('info')
        .describe('Log level: debug, info, warn, error'),

    /**
     * Tesseract executable; falls back to `tesseract` on PATH
     */
    TESSERACT_PATH: z
        .string()
        .min(1)
        .optional()
        .describe('Full path to the Tesseract executable'),

    /**
     * Worker pool size override
     */
    FOLIO_CONCURRENCY: z.coerce
        .number()
        .int()
        .min(1)
        .optional()
        .describe('Number of pages processed concurrently'),
});

/**
 * Validated environment type
 */
export type Env = z.infer<typeof envSchema>;

/**
 * Parse environment variables with validation
 * Returns validated env object or throws with descriptive errors
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const result = envSchema.safeParse(source);

    if (!result.success) {
        const errors = result.error.issues
            .map(issue => `  ${issue.path.join('.')}: ${issue.message}`)
            .join('\n');

        throw new ConfigurationError(`Environment validation failed:\n${errors}`);
    }

    return result.data;
}
