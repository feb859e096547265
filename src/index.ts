/**
 * folio-ocr: resumable, concurrent PDF page OCR with text reports
 *
 * @packageDocumentation
 */

// Main class
export { Folio, type EngineOverrides } from './folio.js';
export { resolveConfig } from './config/resolve.js';

// Engines
export {
    ArtifactLayout,
    PageUnitResolver,
    PageWorker,
    PipelineScheduler,
    Aggregator,
    PipelineEngine,
    BatchCoordinator,
} from './engines/index.js';

// Default adapters
export {
    PdfDocumentOpener,
    TesseractRecognizer,
    CompromiseEntityExtractor,
    loadEntityExtractor,
} from './services/index.js';

export * from './types/index.js';

// Errors
export {
    FolioError,
    ConfigurationError,
    ValidationError,
    SetupError,
    PageError,
    DocumentOpenError,
    RenderError,
    RecognitionError,
    PersistError,
    AggregationReadError,
    DocumentError,
    isFatalSetupError,
    generateCorrelationId,
} from './errors/index.js';
export type { ErrorContext } from './errors/index.js';

// Utilities
export { createLogger, createEventEmitter, PipelineEventEmitter } from './utils/index.js';
export type { Logger, LogMeta, PipelineEvents } from './utils/index.js';

export { ARTIFACT_LAYOUT, PAGE_PROCESSING, AGGREGATION } from './config/constants.js';
