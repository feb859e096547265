export { createLogger } from './logger.js';
export type { Logger, LogMeta } from './logger.js';

export { hashBuffer, shortHash } from './hash.js';

export { PipelineEventEmitter, createEventEmitter } from './events.js';
export type { PipelineEvents } from './events.js';

export { escapeCsvField, toCsv, formatPageList } from './csv.js';
export type { CsvCell } from './csv.js';

export { inCompletionOrder } from './completion.js';
export type { Settled } from './completion.js';

export { withSuppressedStderr } from './diagnostics.js';
export { fileExists } from './fs.js';
