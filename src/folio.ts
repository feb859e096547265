import type { PipelineConfig, ResolvedConfig } from './types/config.types.js';
import type { PipelineEngines } from './types/engine.types.js';
import type {
    BatchSummary,
    DocumentInspection,
    DocumentRunReport,
    RunDocumentOptions,
} from './types/pipeline.types.js';
import { resolveConfig } from './config/resolve.js';
import { createLogger, type Logger } from './utils/logger.js';
import { createEventEmitter, type PipelineEventEmitter } from './utils/events.js';
import { PipelineEngine } from './engines/pipeline.engine.js';
import { BatchCoordinator } from './engines/batch.coordinator.js';
import { PdfDocumentOpener } from './services/pdf.document.js';
import { TesseractRecognizer } from './services/tesseract.recognizer.js';
import { loadEntityExtractor } from './services/entity.extractor.js';

/**
 * Replacements for the default engines. `entityExtractor: null` disables
 * the entity report without trying to load compromise.
 */
export type EngineOverrides = Partial<PipelineEngines>;

/**
 * Main entry point: PDF pages to images, text and reports
 *
 * @example
 * ```typescript
 * import { Folio } from 'folio-ocr';
 *
 * const folio = await Folio.create({ render: { dpi: 200 }, concurrency: 4 });
 * folio.events.on('page:complete', (page) => console.log(page.pageIndex, page.status));
 *
 * const report = await folio.runDocument('scan.pdf', { range: { mode: 'resume' } });
 * const summary = await folio.runDirectory('./inbox');
 * ```
 */
export class Folio {
    readonly events: PipelineEventEmitter;

    private readonly engine: PipelineEngine;
    private readonly batch: BatchCoordinator;

    private constructor(
        private readonly config: ResolvedConfig,
        engines: PipelineEngines,
        private readonly logger: Logger
    ) {
        this.events = createEventEmitter();
        this.engine = new PipelineEngine(config, engines, logger, this.events);
        this.batch = new BatchCoordinator(config, this.engine, logger, this.events);

        this.logger.info('Folio initialized', {
            outputRoot: config.outputRoot,
            dpi: config.render.dpi,
            language: config.render.language,
            concurrency: config.concurrency,
            entities: engines.entityExtractor?.id ?? 'unavailable',
        });
    }

    /**
     * Validate config, wire the default engines and apply overrides
     */
    static async create(userConfig: PipelineConfig = {}, overrides: EngineOverrides = {}): Promise<Folio> {
        const config = resolveConfig(userConfig);
        const logger = createLogger(config.logging);

        const entityExtractor = overrides.entityExtractor !== undefined
            ? overrides.entityExtractor
            : config.entities ? await loadEntityExtractor(logger) : null;

        const engines: PipelineEngines = {
            opener: overrides.opener ?? new PdfDocumentOpener(config.render.dpi),
            recognizer: overrides.recognizer ?? new TesseractRecognizer(config.tesseractPath, logger),
            entityExtractor,
        };

        return new Folio(config, engines, logger);
    }

    getConfig(): ResolvedConfig {
        return this.config;
    }

    /**
     * Process one PDF
     */
    async runDocument(documentPath: string, options?: RunDocumentOptions): Promise<DocumentRunReport> {
        return this.engine.runDocument(documentPath, options);
    }

    /**
     * Process every PDF in a directory, one after another
     */
    async runDirectory(directory: string): Promise<BatchSummary> {
        return this.batch.runDirectory(directory);
    }

    /**
     * Page count and resume point of a PDF
     */
    async inspect(documentPath: string, outputDir?: string): Promise<DocumentInspection> {
        return this.engine.inspect(documentPath, outputDir);
    }

    /**
     * Default output directory of a PDF
     */
    outputDirFor(documentPath: string): string {
        return this.engine.outputDirFor(documentPath);
    }
}
