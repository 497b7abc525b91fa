import { describe, it, expect } from 'vitest';
import { extractionResultSchema, pageRecordSchema } from '../src/types/schemas.js';
import { assembleExtractionResult } from '../src/services/json.assembler.js';
import { createMockFacts, createMockPages, FIXED_NOW } from './mocks/index.js';

describe('Validation Schemas', () => {
    describe('pageRecordSchema', () => {
        it('should validate a page record', () => {
            const result = pageRecordSchema.safeParse({ page_number: 1, text: 'Hi', character_count: 2 });
            expect(result.success).toBe(true);
        });

        it('should reject page number zero', () => {
            const result = pageRecordSchema.safeParse({ page_number: 0, text: '', character_count: 0 });
            expect(result.success).toBe(false);
        });
    });

    describe('extractionResultSchema', () => {
        const valid = assembleExtractionResult(createMockFacts(), createMockPages(['Hello', '', 'World!']), {
            now: FIXED_NOW,
        });

        it('should accept an assembled result', () => {
            expect(extractionResultSchema.safeParse(valid).success).toBe(true);
        });

        it('should reject a wrong data_type', () => {
            const result = extractionResultSchema.safeParse({
                ...valid,
                metadata: { ...valid.metadata, data_type: 'from_csv' },
            });
            expect(result.success).toBe(false);
        });

        it('should reject a malformed hash', () => {
            const result = extractionResultSchema.safeParse({
                ...valid,
                metadata: { ...valid.metadata, source_file_hash: 'not-a-hash' },
            });
            expect(result.success).toBe(false);
        });

        it('should reject a total_pages mismatch', () => {
            const result = extractionResultSchema.safeParse({
                ...valid,
                metadata: { ...valid.metadata, total_pages: 4 },
            });
            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.issues.map((issue) => issue.path.join('.'))).toContain('metadata.total_pages');
            }
        });

        it('should reject a character total mismatch', () => {
            const result = extractionResultSchema.safeParse({
                ...valid,
                metadata: { ...valid.metadata, total_characters: 99 },
            });
            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.issues[0].message).toBe(
                    'total_characters must equal the sum of page character counts'
                );
            }
        });

        it('should reject non-contiguous page numbers', () => {
            const pages = valid.content.pages.map((page, index) =>
                index === 2 ? { ...page, page_number: 4 } : page
            );
            const result = extractionResultSchema.safeParse({
                ...valid,
                content: { ...valid.content, pages },
            });
            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.issues[0].message).toBe('page_number must be 3');
            }
        });

        it('should reject more text pages than pages', () => {
            const result = extractionResultSchema.safeParse({
                ...valid,
                metadata: { ...valid.metadata, pages_with_extractable_text: 5 },
            });
            expect(result.success).toBe(false);
        });
    });
});
