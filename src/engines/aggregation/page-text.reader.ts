import type { AggregationPassEnumType } from '../../types/enums.js';
import type { PageRange } from '../../types/pipeline.types.js';
import type { ReadFailure } from '../../types/report.types.js';
import { AggregationReadError } from '../../errors/index.js';
import type { Logger } from '../../utils/logger.js';
import type { ArtifactLayout } from '../artifact.layout.js';

/**
 * Text of one usable page
 */
export interface PageText {
    pageIndex: number;
    text: string;
}

/**
 * Usable pages of a range plus everything that was left out
 */
export interface PageTextScan {
    pages: PageText[];
    skippedPages: number[];
    readErrors: ReadFailure[];
}

/**
 * Read every text artifact of `range` in ascending page order.
 * Missing and failed pages are skipped; unreadable pages are logged as
 * AggregationReadError and skipped.
 */
export async function scanPageTexts(
    layout: ArtifactLayout,
    range: PageRange,
    pass: AggregationPassEnumType,
    logger: Logger
): Promise<PageTextScan> {
    const scan: PageTextScan = { pages: [], skippedPages: [], readErrors: [] };

    for (let pageIndex = range.start; pageIndex <= range.end; pageIndex++) {
        const state = await layout.readPageText(pageIndex);

        switch (state.kind) {
            case 'text':
                scan.pages.push({ pageIndex, text: state.text });
                break;
            case 'missing':
            case 'failed':
                scan.skippedPages.push(pageIndex);
                break;
            case 'unreadable': {
                const readError = new AggregationReadError(state.error.message, pageIndex, pass, {
                    cause: state.error,
                });
                recordReadError(scan, readError, logger);
                break;
            }
        }
    }

    return scan;
}

/**
 * Exclude a page from a pass after a read or parse error
 */
export function recordReadError(scan: PageTextScan, error: AggregationReadError, logger: Logger): void {
    logger.warn('Page excluded from report', {
        pass: error.pass,
        pageIndex: error.pageIndex,
        error: error.message,
    });
    scan.readErrors.push({ pageIndex: error.pageIndex, message: error.message });
    if (!scan.skippedPages.includes(error.pageIndex)) {
        scan.skippedPages.push(error.pageIndex);
        scan.skippedPages.sort((a, b) => a - b);
    }
}
