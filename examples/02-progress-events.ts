/**
 * 02 - Progress Events
 *
 * Follow a conversion through its lifecycle events:
 * - convert:state for every state transition
 * - extract:page with an estimate of the remaining time
 * - convert:complete / convert:error
 *
 * Run: npx tsx examples/02-progress-events.ts ./docs/report.pdf
 */

import { createPdfConverter } from '../src/index.js';

async function main() {
    console.log('PDF to JSON Events Example\n');
    console.log('='.repeat(50));

    const converter = createPdfConverter({
        pdfFilePath: process.argv[2] ?? 'test.pdf',
        includePageNumbers: false,
        logging: { level: 'error' },
    });

    converter.events.on('convert:start', ({ correlationId }) => {
        console.log(`Started (${correlationId})`);
    });

    converter.events.on('convert:state', ({ from, to }) => {
        console.log(`   ${from} -> ${to}`);
    });

    converter.events.on('extract:page', (progress) => {
        const eta = (progress.estimatedRemainingMs / 1000).toFixed(1);
        console.log(`   Page ${progress.pageNumber}/${progress.total}: ${progress.characterCount} chars, ~${eta}s left`);
    });

    converter.events.on('convert:complete', ({ outputFilePath, processingMs }) => {
        console.log(`Wrote ${outputFilePath} in ${processingMs}ms`);
    });

    converter.events.on('convert:error', ({ error }) => {
        console.log(`Failed during ${error.stage}: ${error.message}`);
    });

    await converter.convert();
}

main().catch(console.error);
