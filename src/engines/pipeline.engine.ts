import * as fs from 'fs/promises';
import * as path from 'path';
import type { ResolvedConfig } from '../types/config.types.js';
import type { PipelineEngines } from '../types/engine.types.js';
import type {
    DocumentInspection,
    DocumentRef,
    DocumentRunReport,
    RunDocumentOptions,
    RunTallySnapshot,
} from '../types/pipeline.types.js';
import { SetupError, generateCorrelationId, toError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import type { PipelineEventEmitter } from '../utils/events.js';
import { ArtifactLayout, outputDirName } from './artifact.layout.js';
import { PageUnitResolver } from './page-unit.resolver.js';
import { PageWorker } from './page.worker.js';
import { PipelineScheduler } from './pipeline.scheduler.js';
import { Aggregator } from './aggregation/aggregator.js';

const EMPTY_TALLY: RunTallySnapshot = Object.freeze({
    submitted: 0,
    successCount: 0,
    failureCount: 0,
    skippedCount: 0,
    failures: Object.freeze([]),
    durationMs: 0,
});

/**
 * Runs the full pipeline for one document:
 * setup → range resolution → resolver → scheduler → aggregator
 */
export class PipelineEngine {
    constructor(
        private readonly config: ResolvedConfig,
        private readonly engines: PipelineEngines,
        private readonly logger: Logger,
        private readonly events?: PipelineEventEmitter
    ) { }

    /**
     * Default output directory for a document
     */
    outputDirFor(documentPath: string): string {
        return path.join(this.config.outputRoot, outputDirName(documentPath));
    }

    /**
     * Process one PDF. Throws SetupError for unusable input and
     * ValidationError for a bad range; page failures are reported, not thrown.
     */
    async runDocument(documentPath: string, options: RunDocumentOptions = {}): Promise<DocumentRunReport> {
        const correlationId = generateCorrelationId();
        const document = await this.validateDocumentPath(documentPath);
        const logger = this.logger.child({ correlationId, documentName: document.name });

        const pageCount = await this.countPages(document);
        const layout = new ArtifactLayout(options.outputDir ?? this.outputDirFor(document.path));
        await layout.ensure();

        const resolver = new PageUnitResolver(layout);
        const range = await resolver.resolveRange(options.range ?? { mode: 'all' }, pageCount);

        logger.info('Starting document', {
            outputDir: layout.root,
            pageCount,
            range,
            dpi: this.config.render.dpi,
            language: this.config.render.language,
            concurrency: this.config.concurrency,
        });

        if (!range) {
            logger.info('All pages already processed');
            this.events?.emit('run:start', { documentName: document.name, pageCount, range, pending: 0 });
            this.events?.emit('run:complete', { documentName: document.name, tally: EMPTY_TALLY });
            return {
                documentName: document.name,
                outputDir: layout.root,
                pageCount,
                range,
                alreadyCompletePages: pageCount,
                tally: EMPTY_TALLY,
                correlationId,
            };
        }

        const pending = await resolver.pendingUnits(range);
        const alreadyCompletePages = range.end - range.start + 1 - pending.length;

        this.events?.emit('run:start', {
            documentName: document.name,
            pageCount,
            range,
            pending: pending.length,
        });

        const worker = new PageWorker(this.config, this.engines.opener, this.engines.recognizer, logger);
        const scheduler = new PipelineScheduler(worker, logger, this.events);
        const tally = await scheduler.run(document, pending, this.config.concurrency);

        this.events?.emit('run:complete', { documentName: document.name, tally });

        if (tally.failures.length > 0) {
            logger.warn('Detailed failure report', {
                failures: tally.failures.map(f => `Page ${f.pageIndex}: ${f.classification}: ${f.message}`),
            });
        }

        const report: DocumentRunReport = {
            documentName: document.name,
            outputDir: layout.root,
            pageCount,
            range,
            alreadyCompletePages,
            tally,
            correlationId,
        };

        if (tally.successCount + tally.skippedCount + alreadyCompletePages === 0) {
            logger.warn('No completed pages in range, skipping reports');
            return report;
        }

        const aggregator = new Aggregator(this.config, this.engines.entityExtractor, logger, this.events);
        report.aggregation = await aggregator.run(layout, range, document.name);

        return report;
    }

    /**
     * Page count and resume point of a document, without processing anything
     */
    async inspect(documentPath: string, outputDir?: string): Promise<DocumentInspection> {
        const document = await this.validateDocumentPath(documentPath);
        const pageCount = await this.countPages(document);
        const layout = new ArtifactLayout(outputDir ?? this.outputDirFor(document.path));
        const lastCompletedPage = await new PageUnitResolver(layout).lastCompletedPage();

        return {
            documentName: document.name,
            pageCount,
            outputDir: layout.root,
            lastCompletedPage,
        };
    }

    private async validateDocumentPath(documentPath: string): Promise<DocumentRef> {
        let isFile: boolean;
        try {
            isFile = (await fs.stat(documentPath)).isFile();
        } catch {
            throw new SetupError(`Path not found at '${documentPath}'`, documentPath);
        }

        if (!isFile) {
            throw new SetupError(`Path is not a file: ${documentPath}`, documentPath);
        }

        const extension = path.extname(documentPath);
        if (extension.toLowerCase() !== '.pdf') {
            throw new SetupError(`File must be a PDF. Got: '${extension || '(none)'}'`, documentPath);
        }

        return { path: documentPath, name: path.basename(documentPath) };
    }

    /**
     * Open the document once to discover its page count
     */
    private async countPages(document: DocumentRef): Promise<number> {
        const pageCount = await this.readPageCount(document.path).catch((error: unknown) => {
            const cause = toError(error);
            throw new SetupError(`Error reading PDF: ${cause.message}`, document.path, { cause });
        });

        if (pageCount === 0) {
            throw new SetupError('PDF contains 0 pages', document.path);
        }

        return pageCount;
    }

    private async readPageCount(documentPath: string): Promise<number> {
        const handle = await this.engines.opener.open(documentPath);
        try {
            return handle.pageCount;
        } finally {
            await handle.close();
        }
    }
}
