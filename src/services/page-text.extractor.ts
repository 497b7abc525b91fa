import type { IPdfReader, PdfDocumentHandle } from '../types/pdf-reader.types.js';
import type { ExtractedPage, PageProgress, ProgressCallback } from '../types/extraction.types.js';
import { PageStatusEnum } from '../types/enums.js';
import type { PageStatusEnumType } from '../types/enums.js';
import { ExtractionFailedError, toError } from '../errors/index.js';
import type { ProcessingWarning } from '../errors/index.js';
import { countCharacters, hasExtractableText } from '../utils/text.js';
import type { Logger } from '../utils/logger.js';

/**
 * Output of a full extraction run
 */
export interface PageExtractionResult {
    pages: ExtractedPage[];
    warnings: ProcessingWarning[];
}

/**
 * Extracts text page by page.
 *
 * A page that fails becomes an empty page and a warning; the run goes on.
 * Only failing to open the document or read its page count is fatal.
 */
export class PageTextExtractor {
    private readonly reader: IPdfReader;
    private readonly logger: Logger;

    constructor(reader: IPdfReader, logger: Logger) {
        this.reader = reader;
        this.logger = logger;
    }

    async extract(
        buffer: Buffer,
        source: string,
        onProgress?: ProgressCallback
    ): Promise<PageExtractionResult> {
        const document = await this.open(buffer, source);
        return this.extractDocument(document, source, onProgress);
    }

    /**
     * Open a document through the reader
     */
    async open(buffer: Buffer, source: string): Promise<PdfDocumentHandle> {
        try {
            return await this.reader.open(buffer, source);
        } catch (error) {
            const cause = toError(error);
            throw new ExtractionFailedError(
                `Failed to open PDF ${source}: ${cause.message}`,
                { filename: source },
                { cause, operation: 'openDocument' }
            );
        }
    }

    /**
     * Extract every page of an opened document, then close it
     */
    async extractDocument(
        document: PdfDocumentHandle,
        source: string,
        onProgress?: ProgressCallback
    ): Promise<PageExtractionResult> {
        try {
            if (!Number.isInteger(document.pageCount) || document.pageCount < 0) {
                throw new ExtractionFailedError(`Invalid page count for ${source}: ${document.pageCount}`, {
                    filename: source,
                    pageCount: document.pageCount,
                });
            }
            return await this.extractPages(document, source, onProgress);
        } finally {
            await this.close(document, source);
        }
    }

    private async extractPages(
        document: PdfDocumentHandle,
        source: string,
        onProgress?: ProgressCallback
    ): Promise<PageExtractionResult> {
        const total = document.pageCount;
        const pages: ExtractedPage[] = [];
        const warnings: ProcessingWarning[] = [];
        const startTime = Date.now();

        this.logger.info('Extracting text', { file: source, pageCount: total });

        for (let pageNumber = 1; pageNumber <= total; pageNumber++) {
            const page = await this.extractPage(document, pageNumber, source);
            pages.push(page);

            let status: PageStatusEnumType = PageStatusEnum.EXTRACTED;
            if (page.failed) {
                status = PageStatusEnum.FAILED;
                warnings.push({
                    type: 'PAGE_EXTRACTION_FAILED',
                    page: pageNumber,
                    message: page.error ?? 'Page text could not be extracted',
                });
            } else if (!hasExtractableText(page.text)) {
                status = PageStatusEnum.EMPTY;
                warnings.push({
                    type: 'EMPTY_PAGE',
                    page: pageNumber,
                    message: 'Page has no extractable text',
                });
            }

            onProgress?.(this.progress(pageNumber, total, page, status, startTime));
        }

        return { pages, warnings };
    }

    private async extractPage(
        document: PdfDocumentHandle,
        pageNumber: number,
        source: string
    ): Promise<ExtractedPage> {
        try {
            const text = await document.extractPageText(pageNumber);
            return { pageNumber, text, failed: false };
        } catch (error) {
            const message = toError(error).message;
            this.logger.warn('Error processing page', { file: source, page: pageNumber, error: message });
            return { pageNumber, text: '', failed: true, error: message };
        }
    }

    private progress(
        current: number,
        total: number,
        page: ExtractedPage,
        status: PageStatusEnumType,
        startTime: number
    ): PageProgress {
        const elapsedMs = Date.now() - startTime;
        const remaining = total - current;

        return {
            current,
            total,
            pageNumber: page.pageNumber,
            status,
            characterCount: countCharacters(page.text),
            elapsedMs,
            estimatedRemainingMs: remaining > 0 ? Math.round((elapsedMs / current) * remaining) : 0,
        };
    }

    private async close(document: PdfDocumentHandle, source: string): Promise<void> {
        try {
            await document.close();
            this.logger.debug('PDF closed', { file: source });
        } catch (error) {
            // Pages are already extracted; a failed release does not change the result
            this.logger.warn('Failed to close PDF', { file: source, error: toError(error).message });
        }
    }
}
