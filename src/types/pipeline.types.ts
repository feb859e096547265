import type { PageStatusEnumType } from './enums.js';
import type { RangeMode } from './config.types.js';
import type { AggregationReport } from './report.types.js';

/**
 * A document to be processed. The page count is discovered by opening it.
 */
export interface DocumentRef {
    /** Absolute or relative path to the PDF */
    path: string;
    /** Display name (file name with extension) */
    name: string;
}

/**
 * Smallest schedulable piece of work: one page of one document.
 * Artifact paths are pure functions of the page index.
 */
export interface PageUnit {
    /** 1-based page index */
    pageIndex: number;
    imagePath: string;
    textPath: string;
}

/**
 * Classified failure of a page
 */
export interface PageErrorDetail {
    /** Error class name, e.g. `RenderError` */
    classification: string;
    message: string;
}

/**
 * Outcome of executing one PageUnit
 */
export interface PageResult {
    readonly pageIndex: number;
    readonly status: PageStatusEnumType;
    readonly error?: PageErrorDetail;
    readonly durationMs: number;
}

/**
 * One entry of the detailed failure report
 */
export interface PageFailure extends PageErrorDetail {
    pageIndex: number;
}

/**
 * Finalized tally of one scheduler run
 */
export interface RunTallySnapshot {
    readonly submitted: number;
    readonly successCount: number;
    readonly failureCount: number;
    readonly skippedCount: number;
    /** Sorted by page index */
    readonly failures: readonly PageFailure[];
    readonly durationMs: number;
}

/**
 * Inclusive page range
 */
export interface PageRange {
    start: number;
    end: number;
}

/**
 * Options for a single-document run
 */
export interface RunDocumentOptions {
    /** Page selection (default: all pages) */
    range?: RangeMode;
    /**
     * Output directory for this document. Defaults to
     * `<outputRoot>/<stem>_processed`.
     */
    outputDir?: string;
}

/**
 * Result of one single-document pipeline run
 */
export interface DocumentRunReport {
    documentName: string;
    outputDir: string;
    pageCount: number;
    /** Resolved range, or null when resume found nothing left to do */
    range: PageRange | null;
    /** Pages of the range that were already complete before scheduling */
    alreadyCompletePages: number;
    tally: RunTallySnapshot;
    /** Absent when no page of the range was complete */
    aggregation?: AggregationReport;
    correlationId: string;
}

/**
 * Resume information for a document
 */
export interface DocumentInspection {
    documentName: string;
    pageCount: number;
    outputDir: string;
    /** Highest fully completed page, 0 when none */
    lastCompletedPage: number;
}

/**
 * Per-document entry of a batch run, in processing order
 */
export interface BatchOutcome {
    documentName: string;
    success: boolean;
    outputDir?: string;
    error?: string;
    report?: DocumentRunReport;
}

/**
 * Result of a batch run over a directory
 */
export interface BatchSummary {
    directory: string;
    outcomes: BatchOutcome[];
    successful: string[];
    failed: Array<{ documentName: string; error: string }>;
    durationMs: number;
    /** Set when at least one document failed */
    errorLogPath?: string;
}
