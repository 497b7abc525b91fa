/**
 * 03 - Error Handling
 *
 * Error handling patterns for PDF conversion.
 *
 * Features:
 * - Typed error classes with codes and stages
 * - Correlation IDs for tracing
 * - Retryable vs non-retryable errors
 * - Recovering the assembled result after a failed write
 *
 * Run: npx tsx examples/03-error-handling.ts
 */

import {
    convertPdfToJson,
    createPdfConverter,
    serializeExtractionResult,
    ConverterStateError,
    ExtractionFailedError,
    InvalidInputError,
    PdfConversionError,
    WriteError,
} from '../src/index.js';

async function main() {
    console.log('PDF to JSON Error Handling Example\n');
    console.log('='.repeat(50));

    // 1. Invalid input
    console.log('\n1. Missing input file');
    try {
        await convertPdfToJson({ pdfFilePath: './does-not-exist.pdf', logging: { level: 'error' } });
    } catch (error) {
        if (error instanceof InvalidInputError) {
            console.log(`   Caught InvalidInputError [${error.code}] during ${error.stage}`);
            console.log(`      Path: ${error.path}`);
            console.log(`      Correlation ID: ${error.correlationId}`);
            console.log(`      Retryable: ${error.retryable}`);
        } else {
            throw error;
        }
    }

    // 2. Retry only what is retryable
    console.log('\n2. Retry pattern');
    const pdfFilePath = process.argv[2] ?? 'test.pdf';
    for (let attempt = 1; attempt <= 3; attempt++) {
        try {
            const result = await convertPdfToJson({ pdfFilePath, logging: { level: 'error' } });
            console.log(`   Converted ${result.metadata.total_pages} pages on attempt ${attempt}`);
            break;
        } catch (error) {
            if (error instanceof WriteError && error.result) {
                // The extraction succeeded; keep it even though the file could not be written
                console.log(`   Write failed, ${serializeExtractionResult(error.result).length} bytes kept in memory`);
            }
            if (error instanceof PdfConversionError && error.retryable && attempt < 3) {
                console.log(`   ${error.code} is retryable, trying again`);
                continue;
            }
            if (error instanceof ExtractionFailedError) {
                console.log(`   Could not read ${error.filename ?? pdfFilePath}: ${error.message}`);
            } else if (error instanceof PdfConversionError) {
                console.log(`   Giving up: ${JSON.stringify(error.toJSON())}`);
            }
            break;
        }
    }

    // 3. One converter, one run
    console.log('\n3. Converters are single-use');
    const converter = createPdfConverter({ pdfFilePath: './does-not-exist.pdf', logging: { level: 'error' } });
    await converter.convert().catch((error: unknown) => {
        console.log(`   First run failed: ${error instanceof Error ? error.message : String(error)}`);
    });
    try {
        await converter.convert();
    } catch (error) {
        if (error instanceof ConverterStateError) {
            console.log(`   Caught ConverterStateError: ${error.message}`);
        }
    }

    console.log('\n' + '='.repeat(50));
    console.log('Example complete!');
}

main().catch(console.error);
