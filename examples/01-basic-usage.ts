/**
 * 01 - Basic Usage
 *
 * The simplest way to convert a PDF:
 * 1. Create a converter with createPdfConverter()
 * 2. Convert
 * 3. Read the metadata and page texts
 *
 * Run: npx tsx examples/01-basic-usage.ts ./docs/report.pdf
 */

import { createPdfConverter } from '../src/index.js';

async function main() {
    console.log('PDF to JSON Basic Usage Example\n');
    console.log('='.repeat(50));

    const pdfFilePath = process.argv[2] ?? process.env.PDF_FILE_PATH ?? 'test.pdf';

    // 1. Initialize
    const converter = createPdfConverter({
        pdfFilePath,
        // Optional: defaults to the PDF name with a .json extension
        // outputFilePath: './out/report.json',
        includePageNumbers: true,
        logging: { level: 'warn' },
        onProgress: (progress) => {
            console.log(`   Page ${progress.current}/${progress.total} (${progress.status})`);
        },
    });

    // 2. Convert
    console.log(`\nConverting ${pdfFilePath}...`);
    const result = await converter.convert();

    // 3. Inspect
    const { metadata, content } = result;
    console.log(`\nConverted: ${metadata.total_pages} pages, ${metadata.total_characters} characters`);
    console.log(`   Pages with text: ${metadata.pages_with_extractable_text}`);
    console.log(`   SHA-256: ${metadata.source_file_hash}`);
    console.log(`   Output: ${converter.outputFilePath}`);

    const first = content.pages[0];
    if (first) {
        console.log(`\nPage 1 preview: ${first.text.substring(0, 120)}...`);
    }

    console.log('\n' + '='.repeat(50));
    console.log('Example complete!');
}

main().catch(console.error);
