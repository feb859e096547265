#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { readFileSync } from 'fs';
import * as fs from 'fs/promises';
import { z } from 'zod';
import type { PipelineConfig } from '../types/config.types.js';
import type { BatchSummary, DocumentRunReport } from '../types/pipeline.types.js';
import { loadEnv } from '../config/env.js';
import {
    inspectOptionsSchema,
    parseOptions,
    parseRangeMode,
    runOptionsSchema,
} from '../config/cli-options.js';
import { isFatalSetupError, toError } from '../errors/index.js';
import { Folio } from '../folio.js';

const packageSchema = z.object({ version: z.string() });
const pkg = packageSchema.parse(
    JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'))
);

function printRunReport(report: DocumentRunReport): void {
    const { tally } = report;

    console.log(`\n${report.documentName}`);
    console.log(`  Output:    ${report.outputDir}`);

    if (!report.range) {
        console.log(`  All ${report.pageCount} pages were already processed.`);
        return;
    }

    console.log(`  Pages:     ${report.range.start}-${report.range.end} of ${report.pageCount}`);
    console.log(`  Succeeded: ${tally.successCount}`);
    console.log(`  Failed:    ${tally.failureCount}`);
    console.log(`  Skipped:   ${tally.skippedCount + report.alreadyCompletePages}`);
    console.log(`  Time:      ${(tally.durationMs / 1000).toFixed(2)}s`);

    if (tally.failures.length > 0) {
        console.log('\n  Failed pages:');
        for (const failure of tally.failures) {
            console.log(`    Page ${failure.pageIndex}: ${failure.classification}: ${failure.message}`);
        }
    }

    if (report.aggregation) {
        console.log('\n  Reports:');
        for (const pass of [report.aggregation.combine, report.aggregation.words, report.aggregation.entities]) {
            console.log(`    ${pass.pass}: ${pass.outputPath ?? `${pass.status} (${pass.reason ?? 'no output'})`}`);
        }
    }
}

function printBatchSummary(summary: BatchSummary): void {
    console.log(`\nBatch complete in ${(summary.durationMs / 1000).toFixed(2)}s`);
    console.log(`  Successful: ${summary.successful.length}`);
    console.log(`  Failed:     ${summary.failed.length}`);

    for (const failure of summary.failed) {
        console.log(`    ${failure.documentName}: ${failure.error}`);
    }
    if (summary.errorLogPath) {
        console.log(`  Error log:  ${summary.errorLogPath}`);
    }
}

function handleError(error: unknown): void {
    const err = toError(error);
    if (isFatalSetupError(err)) {
        console.error(`Error: ${err.message}`);
    } else {
        console.error(`Unexpected error: ${err.message}`);
    }
    process.exitCode = 1;
}

const program = new Command();

program
    .name('folio-ocr')
    .description('Render PDF pages, recognize their text and build word and name reports')
    .version(pkg.version);

program
    .command('run')
    .description('Process a PDF file, or every PDF in a directory')
    .argument('<input>', 'PDF file or directory of PDFs')
    .option('-o, --output-dir <dir>', 'Directory receiving <name>_processed folders', '.')
    .option('--dpi <n>', 'Render resolution')
    .option('-l, --lang <langs>', 'Tesseract languages, + joined (e.g. eng+deu)')
    .option('--tesseract-path <path>', 'Tesseract executable')
    .option('-c, --concurrency <n>', 'Pages processed at once')
    .option('-m, --mode <mode>', 'all | range | resume')
    .option('-r, --range <start-end>', 'Pages to process, e.g. 3-10')
    .option('--no-entities', 'Skip the person-name report')
    .option('--log-level <level>', 'debug | info | warn | error')
    .option('--pretty', 'Human readable logs')
    .action(async (input: string, rawOptions: unknown) => {
        try {
            const env = loadEnv();
            const options = parseOptions(runOptionsSchema, rawOptions);
            const rangeMode = parseRangeMode(options.mode, options.range);

            const config: PipelineConfig = {
                outputRoot: options.outputDir,
                render: { dpi: options.dpi, language: options.lang },
                concurrency: options.concurrency ?? env.FOLIO_CONCURRENCY,
                tesseractPath: options.tesseractPath ?? env.TESSERACT_PATH,
                entities: options.entities,
                logging: {
                    level: options.logLevel ?? env.LOG_LEVEL,
                    structured: !options.pretty,
                },
            };

            const folio = await Folio.create(config);

            folio.events.on('run:start', ({ documentName, range, pending }) => {
                if (range) {
                    console.log(`Processing ${documentName}: pages ${range.start}-${range.end}, ${pending} pending`);
                }
            });
            folio.events.on('page:complete', ({ pageIndex, status }) => {
                console.log(`  page ${pageIndex}: ${status}`);
            });
            folio.events.on('batch:document', ({ documentName, position, total, success }) => {
                console.log(`[${position}/${total}] ${documentName}: ${success ? 'done' : 'failed'}`);
            });

            const stat = await fs.stat(input).catch(() => null);

            if (stat?.isDirectory()) {
                if (rangeMode.mode !== 'all') {
                    console.log('Note: directories are always processed in full; --mode/--range ignored.');
                }
                printBatchSummary(await folio.runDirectory(input));
            } else {
                printRunReport(await folio.runDocument(input, { range: rangeMode }));
            }
        } catch (error) {
            handleError(error);
        }
    });

program
    .command('inspect')
    .description('Show page count and resume point of a PDF')
    .argument('<file>', 'PDF file')
    .option('-o, --output-dir <dir>', 'Directory holding <name>_processed folders', '.')
    .action(async (file: string, rawOptions: unknown) => {
        try {
            const env = loadEnv();
            const options = parseOptions(inspectOptionsSchema, rawOptions);
            const folio = await Folio.create(
                {
                    outputRoot: options.outputDir,
                    entities: false,
                    logging: { level: env.LOG_LEVEL === 'debug' ? 'debug' : 'warn', structured: false },
                },
                { entityExtractor: null }
            );

            const inspection = await folio.inspect(file);

            console.log(`${inspection.documentName}`);
            console.log(`  Pages:               ${inspection.pageCount}`);
            console.log(`  Last completed page: ${inspection.lastCompletedPage}`);
            console.log(`  Output:              ${inspection.outputDir}`);

            if (inspection.lastCompletedPage >= inspection.pageCount) {
                console.log('  All pages processed.');
            } else if (inspection.lastCompletedPage > 0) {
                console.log(`  Resume with: folio-ocr run "${file}" --mode resume`);
            }
        } catch (error) {
            handleError(error);
        }
    });

program.parseAsync(process.argv).catch(handleError);
