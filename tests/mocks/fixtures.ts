/**
 * Test Fixtures
 *
 * Temporary files carrying a PDF header, and helpers to clean them up.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { ExtractedPage, SourceFileFacts } from '../../src/types/extraction.types.js';

/**
 * Bytes of a minimal file that passes the PDF signature check
 */
export const MINIMAL_PDF_CONTENT = '%PDF-1.4\n1 0 obj\n<< /Type /Catalog >>\nendobj\ntrailer\n<< /Root 1 0 R >>\n%%EOF\n';

export async function createTempDir(prefix: string = 'pdf-json-test-'): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}

export async function writeFixture(
    dir: string,
    name: string,
    content: string | Buffer = MINIMAL_PDF_CONTENT
): Promise<string> {
    const filePath = path.join(dir, name);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
    return filePath;
}

export async function pathExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

export function createMockFacts(overrides: Partial<SourceFileFacts> = {}): SourceFileFacts {
    return {
        name: 'report',
        fileName: 'report.pdf',
        filePath: '/data/in/report.pdf',
        fileSize: 2048,
        fileHash: 'a'.repeat(64),
        modifiedTime: '2024-03-01T10:00:00.000Z',
        ...overrides,
    };
}

export function createMockPages(texts: string[]): ExtractedPage[] {
    return texts.map((text, index) => ({ pageNumber: index + 1, text, failed: false }));
}

/**
 * Build a real PDF with one line of Helvetica text per page
 *
 * Texts must not contain parentheses or backslashes.
 */
export function buildPdf(pageTexts: string[]): Buffer {
    const pageCount = pageTexts.length;
    const fontId = 3;
    const pageId = (index: number): number => 4 + index * 2;
    const contentId = (index: number): number => 5 + index * 2;

    const objects: string[] = [
        '<< /Type /Catalog /Pages 2 0 R >>',
        `<< /Type /Pages /Kids [${pageTexts.map((_, i) => `${pageId(i)} 0 R`).join(' ')}] /Count ${pageCount} >>`,
        '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>',
    ];
    pageTexts.forEach((text, i) => {
        const stream = `BT /F1 24 Tf 72 720 Td (${text}) Tj ET`;
        objects.push(
            `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] ` +
                `/Resources << /Font << /F1 ${fontId} 0 R >> >> /Contents ${contentId(i)} 0 R >>`,
            `<< /Length ${Buffer.byteLength(stream)} >>\nstream\n${stream}\nendstream`
        );
    });

    let body = '%PDF-1.4\n';
    const offsets: number[] = [];
    objects.forEach((object, i) => {
        offsets.push(Buffer.byteLength(body));
        body += `${i + 1} 0 obj\n${object}\nendobj\n`;
    });

    const xrefOffset = Buffer.byteLength(body);
    // Each xref entry is exactly 20 bytes including its two-byte line ending
    const entries = offsets.map((offset) => `${String(offset).padStart(10, '0')} 00000 n \n`).join('');
    body +=
        `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n${entries}` +
        `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

    return Buffer.from(body, 'latin1');
}

export const FIXED_NOW = new Date('2024-05-06T07:08:09.000Z');
