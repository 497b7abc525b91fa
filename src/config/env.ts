/**
 * Centralized Environment Configuration
 *
 * Validates environment variables with Zod.
 * Use `loadEnv()` instead of reading process.env directly.
 *
 * @example
 * ```typescript
 * import { loadEnv } from './config/env.js';
 * const env = loadEnv();
 * console.log(env.PDF_FILE_PATH, env.INCLUDE_PAGE_NUMBERS);
 * ```
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { DEFAULT_INCLUDE_PAGE_NUMBERS } from '../types/config.types.js';

const BOOLEAN_VALUES: Record<string, boolean> = {
    true: true,
    '1': true,
    yes: true,
    false: false,
    '0': false,
    no: false,
};

const booleanFlag = (fallback: boolean) =>
    z
        .string()
        .optional()
        .transform((value, ctx) => {
            const normalized = value?.trim().toLowerCase();
            if (!normalized) {
                return fallback;
            }
            const parsed = BOOLEAN_VALUES[normalized];
            if (parsed === undefined) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `expected one of ${Object.keys(BOOLEAN_VALUES).join(', ')}`,
                });
                return z.NEVER;
            }
            return parsed;
        });

const optionalPath = z
    .string()
    .optional()
    .transform((value) => {
        const trimmed = value?.trim();
        return trimmed ? trimmed : undefined;
    });

/**
 * Environment variable schema with validation
 */
const envSchema = z.object({
    /**
     * Path to the PDF file to convert
     */
    PDF_FILE_PATH: optionalPath.describe('Path to the PDF file to convert'),

    /**
     * Output JSON path; defaults to the PDF path with a .json extension
     */
    OUTPUT_FILE_PATH: optionalPath.describe('Path for the output JSON file'),

    /**
     * Prefix each page in full_text with a page marker
     * @default true
     */
    INCLUDE_PAGE_NUMBERS: booleanFlag(DEFAULT_INCLUDE_PAGE_NUMBERS)
        .describe('Whether to include page numbers in extracted text'),

    /**
     * Log level for the logger
     * @default 'info'
     */
    LOG_LEVEL: z
        .enum(['debug', 'info', 'warn', 'error'])
        .default('info')
        .describe('Log level: debug, info, warn, error'),

    /**
     * Log output format
     * @default 'pretty'
     */
    LOG_FORMAT: z
        .enum(['pretty', 'json'])
        .default('pretty')
        .describe('Log format: pretty or json'),
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
            .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
            .join('\n');

        throw new ConfigurationError(`Environment validation failed:\n${errors}`, {
            fields: result.error.issues.map((issue) => issue.path.join('.')),
        });
    }

    return result.data;
}
