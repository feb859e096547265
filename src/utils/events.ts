import { EventEmitter } from 'events';
import type { PageResult, PageRange, RunTallySnapshot, BatchOutcome } from '../types/pipeline.types.js';
import type { PassReport } from '../types/report.types.js';

/**
 * Event types emitted by the pipeline
 */
export interface PipelineEvents {
    // Single document runs
    'run:start': { documentName: string; pageCount: number; range: PageRange | null; pending: number };
    'page:complete': PageResult & { documentName: string };
    'run:complete': { documentName: string; tally: RunTallySnapshot };
    'aggregate:pass': PassReport & { documentName: string };

    // Batch runs
    'batch:start': { directory: string; documentCount: number };
    'batch:document': BatchOutcome & { position: number; total: number };
}

/**
 * Type-safe event emitter for pipeline progress
 */
export class PipelineEventEmitter extends EventEmitter {
    emit<K extends keyof PipelineEvents>(
        event: K,
        data: PipelineEvents[K]
    ): boolean {
        return super.emit(event, data);
    }

    on<K extends keyof PipelineEvents>(
        event: K,
        listener: (data: PipelineEvents[K]) => void
    ): this {
        return super.on(event, listener);
    }

    once<K extends keyof PipelineEvents>(
        event: K,
        listener: (data: PipelineEvents[K]) => void
    ): this {
        return super.once(event, listener);
    }

    off<K extends keyof PipelineEvents>(
        event: K,
        listener: (data: PipelineEvents[K]) => void
    ): this {
        return super.off(event, listener);
    }
}

/**
 * Create a new event emitter instance
 */
export function createEventEmitter(): PipelineEventEmitter {
    return new PipelineEventEmitter();
}
