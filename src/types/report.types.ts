import type { AggregationPassEnumType, PassStatusEnumType } from './enums.js';

/**
 * Per-word aggregate. `pages` is never empty.
 */
export interface WordStat {
    word: string;
    totalOccurrences: number;
    pages: Set<number>;
}

/**
 * Per-entity aggregate. `pages` is never empty.
 */
export interface EntityStat {
    name: string;
    totalOccurrences: number;
    pages: Set<number>;
}

/**
 * A page excluded from a pass because its artifact could not be read or parsed
 */
export interface ReadFailure {
    pageIndex: number;
    message: string;
}

/**
 * Outcome of one aggregation pass
 */
export interface PassReport {
    pass: AggregationPassEnumType;
    status: PassStatusEnumType;
    outputPath?: string;
    /** Pages missing, failed or unreadable, ascending */
    skippedPages: number[];
    readErrors: ReadFailure[];
    /** Why the pass was skipped or empty */
    reason?: string;
}

/**
 * Word statistics computed by the word pass
 */
export interface WordStatistics {
    totalWords: number;
    /** page index -> token count, for analyzed pages */
    pageCounts: Map<number, number>;
    /** Insertion order is first-encountered order */
    words: Map<string, WordStat>;
}

/**
 * All three passes of one aggregation
 */
export interface AggregationReport {
    combine: PassReport;
    words: PassReport;
    entities: PassReport;
}
