import type { PageStatusEnumType } from './enums.js';

/**
 * Facts about the source file gathered before extraction
 */
export interface SourceFileFacts {
    /** Base name without extension */
    name: string;
    /** Base name with extension */
    fileName: string;
    /** Absolute path */
    filePath: string;
    /** Size in bytes */
    fileSize: number;
    /** SHA-256 hex digest of the file content */
    fileHash: string;
    /** Last modification time (ISO-8601) */
    modifiedTime: string;
}

/**
 * Result of collecting file metadata
 */
export interface CollectedFile {
    buffer: Buffer;
    facts: SourceFileFacts;
}

/**
 * Per-page outcome from the extractor
 */
export interface ExtractedPage {
    /** 1-indexed page number */
    pageNumber: number;
    /** Extracted text, empty when nothing could be extracted */
    text: string;
    /** True when the page could not be read */
    failed: boolean;
    /** Failure reason for failed pages */
    error?: string;
}

/**
 * Page progress reported while extracting
 */
export interface PageProgress {
    /** Pages processed so far (1-based) */
    current: number;
    /** Total number of pages */
    total: number;
    pageNumber: number;
    status: PageStatusEnumType;
    characterCount: number;
    elapsedMs: number;
    estimatedRemainingMs: number;
}

/**
 * Progress callback type
 */
export type ProgressCallback = (progress: PageProgress) => void;

/**
 * Serialized document metadata (key order is the output order)
 */
export interface DocumentMetadata {
    name: string;
    data_type: 'from_pdf';
    timestamp: string;
    source_file_name: string;
    source_file_path: string;
    source_file_size: number;
    source_file_hash: string;
    source_modified_time: string;
    total_pages: number;
    total_characters: number;
    pages_with_extractable_text: number;
    extraction_timestamp: string;
}

export interface PageRecord {
    page_number: number;
    text: string;
    character_count: number;
}

export interface ExtractionContent {
    full_text: string;
    pages: PageRecord[];
}

/**
 * The JSON artifact written for one PDF
 */
export interface ExtractionResult {
    metadata: DocumentMetadata;
    content: ExtractionContent;
}

/**
 * Options for the assembler
 */
export interface AssembleOptions {
    /** Prefix each page with a `--- Page <n> ---` marker (default: true) */
    includePageNumbers?: boolean;
    /** Clock value for timestamps (default: new Date()) */
    now?: Date;
}
