import { DATA_TYPE_TAG, FULL_TEXT_FORMAT, formatPageMarker } from '../config/constants.js';
import { DEFAULT_INCLUDE_PAGE_NUMBERS } from '../types/config.types.js';
import type {
    AssembleOptions,
    DocumentMetadata,
    ExtractedPage,
    ExtractionResult,
    PageRecord,
    SourceFileFacts,
} from '../types/extraction.types.js';
import { assertInvariant } from '../errors/index.js';
import { countCharacters, hasExtractableText } from '../utils/text.js';

/**
 * Turn extractor output into frozen page records
 */
export function toPageRecords(pages: readonly ExtractedPage[]): PageRecord[] {
    return pages.map((page, index) => {
        assertInvariant(page.pageNumber === index + 1, 'Page numbers must be contiguous and 1-based', {
            expected: index + 1,
            actual: page.pageNumber,
        });

        return Object.freeze({
            page_number: page.pageNumber,
            text: page.text,
            character_count: countCharacters(page.text),
        });
    });
}

/**
 * Concatenate page texts.
 * With markers each page reads `--- Page <n> ---\n<text>`; pages are joined by a blank line.
 */
export function buildFullText(pages: readonly PageRecord[], includePageNumbers: boolean): string {
    const parts = includePageNumbers
        ? pages.map((page) => `${formatPageMarker(page.page_number)}\n${page.text}`)
        : pages.map((page) => page.text);

    return parts.join(FULL_TEXT_FORMAT.PAGE_SEPARATOR);
}

/**
 * Build the JSON artifact from file facts and extracted pages.
 * Deterministic for a fixed `options.now`.
 */
export function assembleExtractionResult(
    facts: SourceFileFacts,
    pages: readonly ExtractedPage[],
    options: AssembleOptions = {}
): ExtractionResult {
    const includePageNumbers = options.includePageNumbers ?? DEFAULT_INCLUDE_PAGE_NUMBERS;
    const timestamp = (options.now ?? new Date()).toISOString();

    const records = toPageRecords(pages);
    const totalCharacters = records.reduce((sum, page) => sum + page.character_count, 0);
    const pagesWithText = records.filter((page) => hasExtractableText(page.text)).length;

    assertInvariant(pagesWithText <= records.length, 'Pages with text cannot exceed total pages', {
        pagesWithText,
        totalPages: records.length,
    });

    // Key order here is the serialized order
    const metadata: DocumentMetadata = {
        name: facts.name,
        data_type: DATA_TYPE_TAG,
        timestamp,
        source_file_name: facts.fileName,
        source_file_path: facts.filePath,
        source_file_size: facts.fileSize,
        source_file_hash: facts.fileHash,
        source_modified_time: facts.modifiedTime,
        total_pages: records.length,
        total_characters: totalCharacters,
        pages_with_extractable_text: pagesWithText,
        extraction_timestamp: timestamp,
    };

    return {
        metadata,
        content: {
            full_text: buildFullText(records, includePageNumbers),
            pages: records,
        },
    };
}
