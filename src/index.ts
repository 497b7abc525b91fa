/**
 * pdf-json-extract: convert a PDF into a JSON artifact of metadata and per-page text
 *
 * @packageDocumentation
 */

// Converter and factory
export { PdfConverter, type PdfConverterDependencies } from './pdf-converter.js';
export { PdfConverterFactory, createPdfConverter, convertPdfToJson } from './pdf-converter.factory.js';

// Pipeline services
export {
    FileValidator,
    MetadataCollector,
    PageTextExtractor,
    PdfParseReader,
    OutputWriter,
    assembleExtractionResult,
    buildFullText,
    resolveOutputPath,
    serializeExtractionResult,
    deriveDocumentName,
} from './services/index.js';
export type { PageExtractionResult } from './services/index.js';

export type { IPdfReader, PdfDocumentHandle } from './types/pdf-reader.types.js';

export type {
    ConversionOptions,
    PdfConverterConfig,
    ResolvedConversionOptions,
    LogConfig,
} from './types/config.types.js';
export { conversionOptionsSchema, DEFAULT_LOG_CONFIG } from './types/config.types.js';

export type {
    SourceFileFacts,
    ExtractedPage,
    PageProgress,
    ProgressCallback,
    DocumentMetadata,
    PageRecord,
    ExtractionContent,
    ExtractionResult,
    AssembleOptions,
} from './types/extraction.types.js';
export { extractionResultSchema, documentMetadataSchema, pageRecordSchema } from './types/schemas.js';

// Enums
export { ConversionStateEnum, PageStatusEnum } from './types/enums.js';
export type { ConversionStage, ConversionStateEnumType, PageStatusEnumType } from './types/enums.js';

// Constants
export { DATA_TYPE_TAG, CONNECTION_FIELDS, getConnectionMetadata, formatPageMarker } from './config/constants.js';

// Events and logging
export { PdfConverterEventEmitter, createEventEmitter, createLogger } from './utils/index.js';
export type { PdfConverterEvents, Logger, LogMeta } from './utils/index.js';

// Errors
export {
    PdfConversionError,
    ConfigurationError,
    InvalidInputError,
    ExtractionFailedError,
    FileSystemIOError,
    WriteError,
    ConverterStateError,
    InvariantViolationError,
    // Utilities
    generateCorrelationId,
    getCorrelationId,
    runWithCorrelationId,
    wrapError,
} from './errors/index.js';

export type { ProcessingWarning, ErrorContext } from './errors/index.js';
