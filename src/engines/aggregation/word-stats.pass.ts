import * as fs from 'fs/promises';
import type { PageRange } from '../../types/pipeline.types.js';
import type { PassReport, WordStat, WordStatistics } from '../../types/report.types.js';
import { AggregationPassEnum, PassStatusEnum } from '../../types/enums.js';
import { AGGREGATION } from '../../config/constants.js';
import type { Logger } from '../../utils/logger.js';
import { formatPageList, toCsv, type CsvCell } from '../../utils/csv.js';
import type { ArtifactLayout } from '../artifact.layout.js';
import { scanPageTexts, type PageText } from './page-text.reader.js';

const TOKEN_PATTERN = /(?<![\p{L}\p{N}_])[a-z0-9]+(?![\p{L}\p{N}_])/gu;

/**
 * Lowercased alphanumeric tokens longer than two characters
 */
export function tokenize(text: string): string[] {
    const matches = text.toLowerCase().match(TOKEN_PATTERN) ?? [];
    return matches.filter(token => token.length > AGGREGATION.MIN_WORD_LENGTH_EXCLUSIVE);
}

/**
 * Build word statistics from page texts (expected in ascending page order)
 */
export function collectWordStatistics(pages: readonly PageText[]): WordStatistics {
    const stats: WordStatistics = {
        totalWords: 0,
        pageCounts: new Map(),
        words: new Map(),
    };

    for (const page of pages) {
        const tokens = tokenize(page.text);
        stats.pageCounts.set(page.pageIndex, tokens.length);
        stats.totalWords += tokens.length;

        for (const token of tokens) {
            const existing = stats.words.get(token);
            if (existing) {
                existing.totalOccurrences++;
                existing.pages.add(page.pageIndex);
            } else {
                stats.words.set(token, {
                    word: token,
                    totalOccurrences: 1,
                    pages: new Set([page.pageIndex]),
                });
            }
        }
    }

    return stats;
}

/**
 * Words by descending occurrence. Array.prototype.sort is stable, so equal
 * counts keep first-encountered order.
 */
export function rankWords(stats: WordStatistics): WordStat[] {
    return [...stats.words.values()].sort((a, b) => b.totalOccurrences - a.totalOccurrences);
}

/**
 * Three-section CSV: document summary, per-page counts, word occurrences
 */
export function formatWordReport(stats: WordStatistics): string {
    const rows: CsvCell[][] = [
        ['=== DOCUMENT SUMMARY ==='],
        ['Type', 'Value'],
        ['Total Words', stats.totalWords],
        ['Total Pages Analyzed', stats.pageCounts.size],
        ['Unique Words', stats.words.size],
        [],
        ['=== PER-PAGE WORD COUNTS ==='],
        ['Page Number', 'Word Count'],
    ];

    const pageIndices = [...stats.pageCounts.keys()].sort((a, b) => a - b);
    for (const pageIndex of pageIndices) {
        rows.push([pageIndex, stats.pageCounts.get(pageIndex) ?? 0]);
    }

    rows.push([]);
    rows.push(['=== WORD OCCURRENCE DETAILS ===']);
    rows.push(['Word', 'Total Occurrences', 'Pages']);

    for (const stat of rankWords(stats)) {
        rows.push([stat.word, stat.totalOccurrences, formatPageList(stat.pages)]);
    }

    return toCsv(rows);
}

/**
 * Write word_report.csv from the text artifacts of `range`
 */
export async function runWordStatsPass(
    layout: ArtifactLayout,
    range: PageRange,
    logger: Logger
): Promise<PassReport> {
    const scan = await scanPageTexts(layout, range, AggregationPassEnum.WORDS, logger);
    const stats = collectWordStatistics(scan.pages);

    if (stats.totalWords === 0) {
        logger.info('No words found to analyze');
        return {
            pass: AggregationPassEnum.WORDS,
            status: PassStatusEnum.EMPTY,
            skippedPages: scan.skippedPages,
            readErrors: scan.readErrors,
            reason: 'No words found',
        };
    }

    await fs.writeFile(layout.wordReportPath, formatWordReport(stats), 'utf-8');

    logger.info('Word count report saved', {
        outputPath: layout.wordReportPath,
        totalWords: stats.totalWords,
        uniqueWords: stats.words.size,
    });

    return {
        pass: AggregationPassEnum.WORDS,
        status: PassStatusEnum.WRITTEN,
        outputPath: layout.wordReportPath,
        skippedPages: scan.skippedPages,
        readErrors: scan.readErrors,
    };
}
