import { EventEmitter } from 'events';
import type { ConversionStateEnumType } from '../types/enums.js';
import type { ExtractionResult, PageProgress } from '../types/extraction.types.js';
import type { PdfConversionError } from '../errors/index.js';

/**
 * Event types emitted by the PDF converter
 */
export interface PdfConverterEvents {
    // Lifecycle
    'convert:start': { pdfFilePath: string; outputFilePath: string; correlationId: string };
    'convert:state': { from: ConversionStateEnumType; to: ConversionStateEnumType };
    'convert:complete': { result: ExtractionResult; outputFilePath: string; processingMs: number };
    'convert:error': { error: PdfConversionError };

    // Extraction progress
    'extract:page': PageProgress;
}

/**
 * Type-safe event emitter for the PDF converter
 */
export class PdfConverterEventEmitter extends EventEmitter {
    emit<K extends keyof PdfConverterEvents>(
        event: K,
        data: PdfConverterEvents[K]
    ): boolean {
        return super.emit(event, data);
    }

    on<K extends keyof PdfConverterEvents>(
        event: K,
        listener: (data: PdfConverterEvents[K]) => void
    ): this {
        return super.on(event, listener);
    }

    once<K extends keyof PdfConverterEvents>(
        event: K,
        listener: (data: PdfConverterEvents[K]) => void
    ): this {
        return super.once(event, listener);
    }

    off<K extends keyof PdfConverterEvents>(
        event: K,
        listener: (data: PdfConverterEvents[K]) => void
    ): this {
        return super.off(event, listener);
    }
}

/**
 * Create a new event emitter instance
 */
export function createEventEmitter(): PdfConverterEventEmitter {
    return new PdfConverterEventEmitter();
}
