import { AsyncLocalStorage } from 'async_hooks';
import type { ConversionStage } from '../types/enums.js';
import type { ExtractionResult } from '../types/extraction.types.js';

/**
 * Error context for correlation and tracing
 */
export interface ErrorContext {
    /** Unique correlation ID for request tracing */
    correlationId?: string;
    /** Timestamp when error occurred */
    timestamp?: Date;
    /** Original cause of the error */
    cause?: Error;
    /** Operation that was being performed */
    operation?: string;
}

/**
 * Generate a unique correlation ID
 */
export function generateCorrelationId(): string {
    return `pdfj_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
}

/**
 * Correlation ID of the conversion running in the current async context
 */
const correlationContext = new AsyncLocalStorage<string>();

/**
 * Run `fn` with `id` as the correlation ID of everything it awaits
 */
export function runWithCorrelationId<T>(id: string, fn: () => T): T {
    return correlationContext.run(id, fn);
}

/**
 * Get current correlation ID from async context or generate new one
 */
export function getCorrelationId(): string {
    return correlationContext.getStore() ?? generateCorrelationId();
}

/**
 * Base error class for PDF conversion
 * All errors extend this class for consistent handling
 */
export class PdfConversionError extends Error {
    public readonly code: string;
    public readonly details?: Record<string, unknown>;
    public readonly correlationId: string;
    public readonly timestamp: Date;
    public readonly cause?: Error;
    public readonly operation?: string;
    /** Whether a caller may reasonably retry the same conversion */
    public readonly retryable: boolean = false;
    /** Pipeline stage the error surfaced in, set by the converter */
    public stage?: ConversionStage;

    constructor(
        message: string,
        code: string,
        details?: Record<string, unknown>,
        context?: ErrorContext
    ) {
        super(message);
        this.name = 'PdfConversionError';
        this.code = code;
        this.details = details;
        this.correlationId = context?.correlationId ?? getCorrelationId();
        this.timestamp = context?.timestamp ?? new Date();
        this.cause = context?.cause;
        this.operation = context?.operation;
        Error.captureStackTrace(this, this.constructor);
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            correlationId: this.correlationId,
            timestamp: this.timestamp.toISOString(),
            operation: this.operation,
            stage: this.stage,
            retryable: this.retryable,
            cause: this.cause ? {
                name: this.cause.name,
                message: this.cause.message,
            } : undefined,
        };
    }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

/**
 * Wrap an unknown error into a PdfConversionError
 */
export function wrapError(
    error: unknown,
    ErrorClass: new (message: string, details?: Record<string, unknown>, context?: ErrorContext) => PdfConversionError,
    operation?: string
): PdfConversionError {
    if (error instanceof PdfConversionError) {
        return error;
    }

    const originalError = toError(error);
    return new ErrorClass(
        originalError.message,
        { originalError: originalError.name },
        { cause: originalError, operation }
    );
}

/**
 * Configuration-related errors (environment, CLI flags, options)
 */
export class ConfigurationError extends PdfConversionError {
    constructor(message: string, details?: Record<string, unknown>, context?: ErrorContext) {
        super(message, 'CONFIGURATION_ERROR', details, context);
        this.name = 'ConfigurationError';
    }
}

/**
 * Input path is missing, unreadable, or not a PDF container
 */
export class InvalidInputError extends PdfConversionError {
    public readonly path: string;

    constructor(message: string, path: string, details?: Record<string, unknown>, context?: ErrorContext) {
        super(message, 'INVALID_INPUT', { path, ...details }, context);
        this.name = 'InvalidInputError';
        this.path = path;
    }
}

/**
 * The document could not be opened or iterated at all
 */
export class ExtractionFailedError extends PdfConversionError {
    public readonly filename?: string;

    constructor(message: string, details?: Record<string, unknown>, context?: ErrorContext) {
        super(message, 'EXTRACTION_FAILED', details, context);
        this.name = 'ExtractionFailedError';
        this.filename = typeof details?.filename === 'string' ? details.filename : undefined;
    }
}

/**
 * Filesystem metadata or output directory access failed
 */
export class FileSystemIOError extends PdfConversionError {
    public override readonly retryable = true;

    constructor(message: string, details?: Record<string, unknown>, context?: ErrorContext) {
        super(message, 'IO_ERROR', details, context);
        this.name = 'IOError';
    }
}

/**
 * Serializing or writing the output artifact failed.
 * The assembled result is attached so programmatic callers keep it.
 */
export class WriteError extends PdfConversionError {
    public override readonly retryable = true;
    public readonly outputPath: string;
    public result?: ExtractionResult;

    constructor(message: string, outputPath: string, details?: Record<string, unknown>, context?: ErrorContext) {
        super(message, 'WRITE_ERROR', { outputPath, ...details }, context);
        this.name = 'WriteError';
        this.outputPath = outputPath;
    }
}

/**
 * Converter used outside its lifecycle (e.g. convert() called twice)
 */
export class ConverterStateError extends PdfConversionError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'INVALID_STATE', details);
        this.name = 'ConverterStateError';
    }
}

/**
 * Internal invariant broken; indicates a programming error
 */
export class InvariantViolationError extends PdfConversionError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'INVARIANT_VIOLATION', details);
        this.name = 'InvariantViolationError';
    }
}

export function assertInvariant(
    condition: boolean,
    message: string,
    details?: Record<string, unknown>
): asserts condition {
    if (!condition) {
        throw new InvariantViolationError(message, details);
    }
}

/**
 * Processing warning (non-fatal issue during processing)
 */
export interface ProcessingWarning {
    /** Warning type */
    type: 'PAGE_EXTRACTION_FAILED' | 'EMPTY_PAGE';
    /** Related page number */
    page: number;
    /** Warning message */
    message: string;
    /** Additional details */
    details?: Record<string, unknown>;
}

/**
 * Read the errno code (ENOENT, EACCES, ...) off a filesystem error
 */
export function getErrnoCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}
