/**
 * System constants for PDF to JSON conversion
 * Centralizes literals shared by the pipeline and the CLI
 */

// ============================================
// Artifact Format
// ============================================

/**
 * Producer tag written to metadata.data_type
 */
export const DATA_TYPE_TAG = 'from_pdf' as const;

export const OUTPUT_EXTENSION = '.json';

export const JSON_INDENT = 2;

/**
 * Full-text layout
 */
export const FULL_TEXT_FORMAT = {
    /** Separator placed between pages */
    PAGE_SEPARATOR: '\n\n',
    /** Substring every page marker starts with */
    MARKER_PREFIX: '--- Page',
} as const;

export function formatPageMarker(pageNumber: number): string {
    return `${FULL_TEXT_FORMAT.MARKER_PREFIX} ${pageNumber} ---`;
}

// ============================================
// Input Validation
// ============================================

export const PDF_SIGNATURE = {
    /** Magic bytes opening every PDF container */
    MAGIC: '%PDF-',
    /** Readers accept leading garbage before the header up to this offset */
    SEARCH_WINDOW_BYTES: 1024,
} as const;

// ============================================
// Connection Metadata
// ============================================

export type ConnectionFieldType = 'string' | 'bool';

export interface ConnectionField {
    description: string;
    type: ConnectionFieldType;
    required: boolean;
    default: string | boolean;
    sensitive: boolean;
}

export const CONNECTION_TYPE = 'FileSystem';

/**
 * Parameters a host needs to collect before running a conversion
 */
export const CONNECTION_FIELDS: Readonly<Record<'pdf_file_path' | 'output_file_path' | 'include_page_numbers', ConnectionField>> = {
    pdf_file_path: {
        description: 'Path to the PDF file to convert to JSON',
        type: 'string',
        required: true,
        default: '',
        sensitive: false,
    },
    output_file_path: {
        description: 'Path for output JSON file (optional, defaults to PDF name with .json extension)',
        type: 'string',
        required: false,
        default: '',
        sensitive: false,
    },
    include_page_numbers: {
        description: 'Whether to include page numbers in extracted text',
        type: 'bool',
        required: false,
        default: true,
        sensitive: false,
    },
};

export function getConnectionMetadata(): {
    connection_type: string;
    fields: Readonly<Record<string, ConnectionField>>;
} {
    return {
        connection_type: CONNECTION_TYPE,
        fields: CONNECTION_FIELDS,
    };
}
