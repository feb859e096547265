/**
 * 02 - Resume and Batch
 *
 * - Inspect a document to find where a previous run stopped
 * - Resume from there
 * - Process a whole directory with per-document isolation
 *
 * Run: npx tsx examples/02-resume-and-batch.ts path/to/file.pdf path/to/dir
 */

import { Folio, SetupError } from '../src/index.js';

async function main(): Promise<void> {
    const [file, directory] = process.argv.slice(2);
    if (!file || !directory) {
        console.log('Usage: npx tsx examples/02-resume-and-batch.ts <file.pdf> <directory>');
        return;
    }

    const folio = await Folio.create({ outputRoot: './output', concurrency: 4 });

    // 1. Where did the last run stop?
    try {
        const inspection = await folio.inspect(file);
        console.log(`${inspection.documentName}: ${inspection.lastCompletedPage}/${inspection.pageCount} pages done`);

        const report = await folio.runDocument(file, { range: { mode: 'resume' } });
        console.log(report.range ? `Resumed pages ${report.range.start}-${report.range.end}` : 'Nothing left to do');
    } catch (error) {
        if (error instanceof SetupError) {
            console.log(`Cannot process ${file}: ${error.message}`);
        } else {
            throw error;
        }
    }

    // 2. Batch
    folio.events.on('batch:document', (outcome) => {
        console.log(`[${outcome.position}/${outcome.total}] ${outcome.documentName}: ${outcome.success ? 'ok' : outcome.error}`);
    });

    const summary = await folio.runDirectory(directory);
    console.log(`\n${summary.successful.length} succeeded, ${summary.failed.length} failed`);
    if (summary.errorLogPath) {
        console.log(`Errors logged to ${summary.errorLogPath}`);
    }
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
