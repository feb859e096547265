/**
 * 01 - Basic Usage
 *
 * Process one PDF:
 * 1. Create an instance with Folio.create()
 * 2. Run the document
 * 3. Read the run report
 *
 * Run: npx tsx examples/01-basic-usage.ts path/to/file.pdf
 */

import { Folio } from '../src/index.js';

async function main(): Promise<void> {
    const input = process.argv[2];
    if (!input) {
        console.log('Usage: npx tsx examples/01-basic-usage.ts <file.pdf>');
        return;
    }

    const folio = await Folio.create({
        outputRoot: './output',
        render: { dpi: 200, language: 'eng' },
        logging: { level: 'warn', structured: false },
    });

    folio.events.on('page:complete', (page) => {
        console.log(`   Page ${page.pageIndex}: ${page.status} (${page.durationMs}ms)`);
    });

    const report = await folio.runDocument(input);

    console.log(`\nProcessed ${report.documentName}`);
    console.log(`   Output: ${report.outputDir}`);
    console.log(`   Succeeded: ${report.tally.successCount}, failed: ${report.tally.failureCount}`);

    if (report.aggregation) {
        console.log(`   Word report: ${report.aggregation.words.outputPath ?? report.aggregation.words.status}`);
    }
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
