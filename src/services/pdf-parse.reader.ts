import { PDFParse } from 'pdf-parse';
import type { IPdfReader, PdfDocumentHandle } from '../types/pdf-reader.types.js';
import { toError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * Document handle backed by a pdf-parse parser instance
 */
class PdfParseDocument implements PdfDocumentHandle {
    constructor(
        private readonly parser: PDFParse,
        public readonly pageCount: number
    ) {}

    async extractPageText(pageNumber: number): Promise<string> {
        const result = await this.parser.getText({ partial: [pageNumber] });
        const page = result.pages.find((entry) => entry.num === pageNumber);
        return page?.text ?? '';
    }

    async close(): Promise<void> {
        await this.parser.destroy();
    }
}

/**
 * IPdfReader implementation using pdf-parse
 */
export class PdfParseReader implements IPdfReader {
    private readonly logger: Logger;

    constructor(logger: Logger) {
        this.logger = logger;
    }

    async open(buffer: Buffer, source: string): Promise<PdfDocumentHandle> {
        const parser = new PDFParse({ data: new Uint8Array(buffer) });

        try {
            const info = await parser.getInfo();

            this.logger.debug('PDF opened', {
                file: source,
                pageCount: info.total,
            });

            return new PdfParseDocument(parser, info.total);
        } catch (error) {
            await parser.destroy().catch((destroyError: unknown) => {
                this.logger.warn('Failed to release parser after open error', {
                    file: source,
                    error: toError(destroyError).message,
                });
            });
            throw error;
        }
    }
}
