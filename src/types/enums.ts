/**
 * Outcome of one page unit
 */
export const PageStatusEnum = {
    SUCCESS: 'SUCCESS',
    FAILURE: 'FAILURE',
    SKIPPED_ALREADY_DONE: 'SKIPPED_ALREADY_DONE',
} as const;

export type PageStatusEnumType = (typeof PageStatusEnum)[keyof typeof PageStatusEnum];

/**
 * Aggregation passes run after scheduling
 */
export const AggregationPassEnum = {
    COMBINE: 'combine',
    WORDS: 'words',
    ENTITIES: 'entities',
} as const;

export type AggregationPassEnumType = (typeof AggregationPassEnum)[keyof typeof AggregationPassEnum];

/**
 * Result status of one aggregation pass
 */
export const PassStatusEnum = {
    /** Report file written */
    WRITTEN: 'written',
    /** Nothing to report, no file written */
    EMPTY: 'empty',
    /** Pass not run (e.g. no entity extractor available) */
    SKIPPED: 'skipped',
} as const;

export type PassStatusEnumType = (typeof PassStatusEnum)[keyof typeof PassStatusEnum];
