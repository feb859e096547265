import type { PageFailure, PageResult, RunTallySnapshot } from '../types/pipeline.types.js';
import { PageStatusEnum } from '../types/enums.js';

/**
 * Accumulates page results for one run.
 * Owned by the scheduler's single result consumer; never shared with workers.
 */
export class RunTally {
    private readonly submitted: number;
    private successCount = 0;
    private failureCount = 0;
    private skippedCount = 0;
    private readonly failures: PageFailure[] = [];

    constructor(submitted: number) {
        this.submitted = submitted;
    }

    record(result: PageResult): void {
        switch (result.status) {
            case PageStatusEnum.SUCCESS:
                this.successCount++;
                break;
            case PageStatusEnum.SKIPPED_ALREADY_DONE:
                this.skippedCount++;
                break;
            case PageStatusEnum.FAILURE:
                this.failureCount++;
                this.failures.push({
                    pageIndex: result.pageIndex,
                    classification: result.error?.classification ?? 'UnknownError',
                    message: result.error?.message ?? 'Unknown failure',
                });
                break;
        }
    }

    /**
     * Recorded results so far
     */
    get recorded(): number {
        return this.successCount + this.failureCount + this.skippedCount;
    }

    finalize(durationMs: number): RunTallySnapshot {
        return Object.freeze({
            submitted: this.submitted,
            successCount: this.successCount,
            failureCount: this.failureCount,
            skippedCount: this.skippedCount,
            failures: Object.freeze([...this.failures].sort((a, b) => a.pageIndex - b.pageIndex)),
            durationMs,
        });
    }
}
