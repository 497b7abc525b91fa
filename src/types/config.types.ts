import { z } from 'zod';
import type { IPdfReader } from './pdf-reader.types.js';
import type { ProgressCallback } from './extraction.types.js';
import type { Logger } from '../utils/logger.js';

/**
 * Logging configuration
 */
export interface LogConfig {
    /** Log level */
    level: 'debug' | 'info' | 'warn' | 'error';
    /** Enable structured JSON logging (default: true) */
    structured: boolean;
    /** Custom logger function */
    customLogger?: (level: string, message: string, meta?: Record<string, unknown>) => void;
}

/**
 * Options for a single conversion
 */
export interface ConversionOptions {
    /** Path to the PDF file (required) */
    pdfFilePath: string;
    /** Path for the output JSON file (default: PDF name with .json extension) */
    outputFilePath?: string;
    /** Prefix each page of full_text with a page marker (default: true) */
    includePageNumbers?: boolean;
    /** Page progress callback */
    onProgress?: ProgressCallback;
}

/**
 * Converter configuration
 */
export interface PdfConverterConfig extends ConversionOptions {
    /** Logging configuration */
    logging?: Partial<LogConfig>;
    /** PDF reader override (default: pdf-parse backed reader) */
    pdfReader?: IPdfReader;
    /** Logger override; takes precedence over `logging` */
    logger?: Logger;
}

/**
 * Conversion options with all defaults applied
 */
export interface ResolvedConversionOptions {
    pdfFilePath: string;
    outputFilePath: string;
    includePageNumbers: boolean;
}

export const DEFAULT_LOG_CONFIG: LogConfig = {
    level: 'info',
    structured: true,
};

export const DEFAULT_INCLUDE_PAGE_NUMBERS = true;

/**
 * Zod schema for conversion options validation.
 * An empty pdfFilePath is accepted here and rejected by the file validator
 * as invalid input.
 */
export const conversionOptionsSchema = z.object({
    pdfFilePath: z.string(),
    outputFilePath: z.string().optional(),
    includePageNumbers: z.boolean().optional(),
    onProgress: z.function().optional(),
    logging: z
        .object({
            level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
            structured: z.boolean().optional(),
        })
        .optional(),
});
