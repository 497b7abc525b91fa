/**
 * An opened PDF document
 */
export interface PdfDocumentHandle {
    /** Total number of pages */
    readonly pageCount: number;

    /**
     * Extract the text of one page
     * @param pageNumber - 1-indexed page number
     */
    extractPageText(pageNumber: number): Promise<string>;

    /** Release resources held by the underlying parser */
    close(): Promise<void>;
}

/**
 * PDF Reader Interface
 *
 * Narrow port over PDF parsing libraries (pdf-parse, pdfjs-dist, etc.).
 * Each call is fallible: `open` failures are fatal for a conversion,
 * `extractPageText` failures only affect that page.
 *
 * @example
 * ```typescript
 * const doc = await reader.open(buffer, 'report.pdf');
 * try {
 *   for (let n = 1; n <= doc.pageCount; n++) {
 *     console.log(await doc.extractPageText(n));
 *   }
 * } finally {
 *   await doc.close();
 * }
 * ```
 */
export interface IPdfReader {
    /**
     * Open a PDF document from its bytes
     * @param buffer - PDF file content
     * @param source - File name, used in diagnostics only
     */
    open(buffer: Buffer, source: string): Promise<PdfDocumentHandle>;
}
