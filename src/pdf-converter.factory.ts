import { PdfConverter, type PdfConverterDependencies } from './pdf-converter.js';
import type { PdfConverterConfig, ResolvedConversionOptions } from './types/config.types.js';
import {
    conversionOptionsSchema,
    DEFAULT_INCLUDE_PAGE_NUMBERS,
    DEFAULT_LOG_CONFIG,
} from './types/config.types.js';
import type { ExtractionResult } from './types/extraction.types.js';
import type { IPdfReader } from './types/pdf-reader.types.js';
import { ConfigurationError } from './errors/index.js';
import { createLogger } from './utils/index.js';
import {
    FileValidator,
    MetadataCollector,
    OutputWriter,
    PageTextExtractor,
    PdfParseReader,
    resolveOutputPath,
} from './services/index.js';

/**
 * Factory for creating PdfConverter instances with proper dependency injection
 *
 * Every call builds fresh collaborators, so converters never share state.
 *
 * @example
 * ```typescript
 * import { createPdfConverter } from 'pdf-json-extract';
 *
 * const converter = createPdfConverter({
 *   pdfFilePath: './docs/report.pdf',
 *   includePageNumbers: false,
 * });
 *
 * const result = await converter.convert();
 * ```
 */
export class PdfConverterFactory {
    /**
     * Create a new PdfConverter with all dependencies wired
     * @param config - Conversion options plus optional overrides
     */
    static create(config: PdfConverterConfig): PdfConverter {
        const options = PdfConverterFactory.resolveOptions(config);
        const logger = config.logger ?? createLogger({ ...DEFAULT_LOG_CONFIG, ...config.logging });
        const pdfReader: IPdfReader = config.pdfReader ?? new PdfParseReader(logger);

        const deps: PdfConverterDependencies = {
            validator: new FileValidator(logger),
            collector: new MetadataCollector(logger),
            extractor: new PageTextExtractor(pdfReader, logger),
            writer: new OutputWriter(logger),
            logger,
        };

        return new PdfConverter(options, deps, config.onProgress);
    }

    /**
     * Validate user config and apply defaults
     */
    static resolveOptions(config: PdfConverterConfig): ResolvedConversionOptions {
        const parsed = conversionOptionsSchema.safeParse(config);
        if (!parsed.success) {
            throw new ConfigurationError(`Invalid conversion options: ${parsed.error.message}`, {
                issues: parsed.error.issues.map((issue) => ({
                    path: issue.path.join('.'),
                    message: issue.message,
                })),
            });
        }

        return {
            pdfFilePath: config.pdfFilePath,
            outputFilePath: resolveOutputPath(config.pdfFilePath, config.outputFilePath),
            includePageNumbers: config.includePageNumbers ?? DEFAULT_INCLUDE_PAGE_NUMBERS,
        };
    }
}

/**
 * Convenience function to create a PdfConverter instance
 */
export function createPdfConverter(config: PdfConverterConfig): PdfConverter {
    return PdfConverterFactory.create(config);
}

/**
 * Convert one PDF and return its extraction result
 */
export async function convertPdfToJson(config: PdfConverterConfig): Promise<ExtractionResult> {
    return PdfConverterFactory.create(config).convert();
}
