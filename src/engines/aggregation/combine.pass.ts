import * as fs from 'fs/promises';
import type { PageRange } from '../../types/pipeline.types.js';
import type { PassReport } from '../../types/report.types.js';
import { AggregationPassEnum, PassStatusEnum } from '../../types/enums.js';
import type { Logger } from '../../utils/logger.js';
import type { ArtifactLayout } from '../artifact.layout.js';
import { scanPageTexts, type PageText } from './page-text.reader.js';

/**
 * Concatenate page texts with a page delimiter, in page order
 */
export function formatCombinedText(pages: readonly PageText[]): string {
    return pages
        .map(page => `--- Page ${page.pageIndex} ---\n${page.text}\n\n`)
        .join('');
}

/**
 * Write combined.txt from the text artifacts of `range`
 */
export async function runCombinePass(
    layout: ArtifactLayout,
    range: PageRange,
    logger: Logger
): Promise<PassReport> {
    const scan = await scanPageTexts(layout, range, AggregationPassEnum.COMBINE, logger);

    if (scan.pages.length === 0) {
        logger.info('No text content to combine');
        return {
            pass: AggregationPassEnum.COMBINE,
            status: PassStatusEnum.EMPTY,
            skippedPages: scan.skippedPages,
            readErrors: scan.readErrors,
            reason: 'No page has recognized text',
        };
    }

    await fs.writeFile(layout.combinedPath, formatCombinedText(scan.pages), 'utf-8');

    logger.info('Combined text saved', {
        outputPath: layout.combinedPath,
        pages: scan.pages.length,
        skippedPages: scan.skippedPages.length,
    });

    return {
        pass: AggregationPassEnum.COMBINE,
        status: PassStatusEnum.WRITTEN,
        outputPath: layout.combinedPath,
        skippedPages: scan.skippedPages,
        readErrors: scan.readErrors,
    };
}
