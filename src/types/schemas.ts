import { z } from 'zod';
import { DATA_TYPE_TAG } from '../config/constants.js';

/**
 * Zod schema for a page record
 */
export const pageRecordSchema = z.object({
    page_number: z.number().int().min(1),
    text: z.string(),
    character_count: z.number().int().min(0),
});

/**
 * Zod schema for document metadata
 */
export const documentMetadataSchema = z.object({
    name: z.string(),
    data_type: z.literal(DATA_TYPE_TAG),
    timestamp: z.string().datetime(),
    source_file_name: z.string().min(1),
    source_file_path: z.string().min(1),
    source_file_size: z.number().int().min(0),
    source_file_hash: z.string().regex(/^[0-9a-f]{64}$/, 'Expected a SHA-256 hex digest'),
    source_modified_time: z.string().datetime(),
    total_pages: z.number().int().min(0),
    total_characters: z.number().int().min(0),
    pages_with_extractable_text: z.number().int().min(0),
    extraction_timestamp: z.string().datetime(),
});

/**
 * Zod schema for the JSON artifact, including cross-field invariants
 */
export const extractionResultSchema = z
    .object({
        metadata: documentMetadataSchema,
        content: z.object({
            full_text: z.string(),
            pages: z.array(pageRecordSchema),
        }),
    })
    .superRefine((value, ctx) => {
        const { metadata, content } = value;

        if (content.pages.length !== metadata.total_pages) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: 'total_pages must equal the number of pages',
                path: ['metadata', 'total_pages'],
            });
        }

        content.pages.forEach((page, index) => {
            if (page.page_number !== index + 1) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `page_number must be ${index + 1}`,
                    path: ['content', 'pages', index, 'page_number'],
                });
            }
        });

        const sum = content.pages.reduce((acc, page) => acc + page.character_count, 0);
        if (sum !== metadata.total_characters) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: 'total_characters must equal the sum of page character counts',
                path: ['metadata', 'total_characters'],
            });
        }

        if (metadata.pages_with_extractable_text > metadata.total_pages) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: 'pages_with_extractable_text cannot exceed total_pages',
                path: ['metadata', 'pages_with_extractable_text'],
            });
        }
    });

export type ExtractionResultInput = z.input<typeof extractionResultSchema>;
