export type {
    LogConfig,
    RangeMode,
    RenderConfig,
    PipelineConfig,
    ResolvedConfig,
} from './config.types.js';
export {
    DEFAULT_RENDER_CONFIG,
    DEFAULT_LOG_CONFIG,
    DEFAULT_TESSERACT_PATH,
    defaultConcurrency,
    pipelineConfigSchema,
    rangeModeSchema,
} from './config.types.js';

export type {
    DocumentRef,
    PageUnit,
    PageErrorDetail,
    PageResult,
    PageFailure,
    RunTallySnapshot,
    PageRange,
    RunDocumentOptions,
    DocumentRunReport,
    DocumentInspection,
    BatchOutcome,
    BatchSummary,
} from './pipeline.types.js';

export type {
    WordStat,
    EntityStat,
    ReadFailure,
    PassReport,
    WordStatistics,
    AggregationReport,
} from './report.types.js';

export type {
    DocumentHandle,
    DocumentOpener,
    Recognizer,
    EntitySpan,
    EntityExtractor,
    PipelineEngines,
} from './engine.types.js';

export {
    PageStatusEnum,
    AggregationPassEnum,
    PassStatusEnum,
} from './enums.js';
export type {
    PageStatusEnumType,
    AggregationPassEnumType,
    PassStatusEnumType,
} from './enums.js';
