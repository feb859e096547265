/**
 * System constants for folio-ocr
 * Centralizes magic numbers and on-disk names
 */

// ============================================
// Artifact Layout
// ============================================

export const ARTIFACT_LAYOUT = {
    IMAGE_DIR: 'images',
    TEXT_DIR: 'text',
    IMAGE_EXTENSION: 'png',
    TEXT_EXTENSION: 'txt',
    /** Page numbers are zero padded to this width in artifact names */
    PAGE_PAD_WIDTH: 4,
    COMBINED_FILE: 'combined.txt',
    WORD_REPORT_FILE: 'word_report.csv',
    ENTITY_REPORT_FILE: 'entity_report.csv',
    /** Written next to the source documents in batch mode */
    ERROR_LOG_FILE: 'error_log.txt',
    /** Suffix of per-document output folders */
    OUTPUT_DIR_SUFFIX: '_processed',
} as const;

// ============================================
// Page Processing
// ============================================

export const PAGE_PROCESSING = {
    /**
     * Marker at the start of a text artifact whose page failed.
     * Distinguishes a failed page from a page recognized as empty.
     */
    FAILURE_SENTINEL: 'OCR FAILED FOR THIS PAGE',

    /** pdf.js renders at 72 DPI for scale 1 */
    BASE_DPI: 72,
} as const;

// ============================================
// Aggregation
// ============================================

export const AGGREGATION = {
    /** Tokens must be longer than this to count as words */
    MIN_WORD_LENGTH_EXCLUSIVE: 2,

    /** Length of the path hash appended to colliding output folder names */
    COLLISION_HASH_LENGTH: 8,

    /** Width of the separator rules in error_log.txt */
    ERROR_LOG_RULE_WIDTH: 70,
} as const;

// ============================================
// Type exports for type-safe access
// ============================================

export type ArtifactLayoutConstants = typeof ARTIFACT_LAYOUT;
export type PageProcessing = typeof PAGE_PROCESSING;
export type AggregationConstants = typeof AGGREGATION;
