import pLimit from 'p-limit';
import type { DocumentRef, PageResult, PageUnit, RunTallySnapshot } from '../types/pipeline.types.js';
import { PageStatusEnum } from '../types/enums.js';
import { toError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import type { PipelineEventEmitter } from '../utils/events.js';
import { inCompletionOrder } from '../utils/completion.js';
import type { PageWorker } from './page.worker.js';
import { RunTally } from './run.tally.js';

/**
 * Runs page units of one document on a bounded worker pool.
 *
 * All units are submitted at once; p-limit keeps at most `concurrency` in
 * flight. Results are drained in completion order by a single consumer that
 * owns the tally. Failed pages are not retried within a run.
 */
export class PipelineScheduler {
    constructor(
        private readonly worker: PageWorker,
        private readonly logger: Logger,
        private readonly events?: PipelineEventEmitter
    ) { }

    async run(document: DocumentRef, units: readonly PageUnit[], concurrency: number): Promise<RunTallySnapshot> {
        const startTime = Date.now();
        const limit = pLimit(concurrency);
        const tally = new RunTally(units.length);

        this.logger.info('Scheduling pages', {
            documentName: document.name,
            pending: units.length,
            concurrency,
        });

        const submissions = units.map(unit => limit(() => this.worker.process(document, unit)));

        for await (const settled of inCompletionOrder(submissions)) {
            const result: PageResult = settled.ok
                ? settled.value
                : this.unexpectedFailure(units[settled.index], settled.error);

            tally.record(result);
            this.events?.emit('page:complete', { ...result, documentName: document.name });
        }

        const snapshot = tally.finalize(Date.now() - startTime);

        this.logger.info('Scheduling complete', {
            documentName: document.name,
            successCount: snapshot.successCount,
            failureCount: snapshot.failureCount,
            skippedCount: snapshot.skippedCount,
            durationMs: snapshot.durationMs,
        });

        return snapshot;
    }

    /**
     * The worker never rejects; this guards the tally invariant if it does
     */
    private unexpectedFailure(unit: PageUnit | undefined, error: unknown): PageResult {
        const err = toError(error);
        this.logger.error('Page worker rejected unexpectedly', {
            pageIndex: unit?.pageIndex,
            error: err.message,
        });
        return {
            pageIndex: unit?.pageIndex ?? 0,
            status: PageStatusEnum.FAILURE,
            error: { classification: 'UnexpectedError', message: err.message },
            durationMs: 0,
        };
    }
}
