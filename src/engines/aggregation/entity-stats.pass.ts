import * as fs from 'fs/promises';
import type { PageRange } from '../../types/pipeline.types.js';
import type { EntityStat, PassReport } from '../../types/report.types.js';
import type { EntityExtractor, EntitySpan } from '../../types/engine.types.js';
import { AggregationPassEnum, PassStatusEnum } from '../../types/enums.js';
import { AggregationReadError, toError } from '../../errors/index.js';
import type { Logger } from '../../utils/logger.js';
import { formatPageList, toCsv, type CsvCell } from '../../utils/csv.js';
import type { ArtifactLayout } from '../artifact.layout.js';
import { recordReadError, scanPageTexts } from './page-text.reader.js';

/**
 * Entities by descending occurrence, ties in first-encountered order
 */
export function rankEntities(entities: Map<string, EntityStat>): EntityStat[] {
    return [...entities.values()].sort((a, b) => b.totalOccurrences - a.totalOccurrences);
}

export function formatEntityReport(entities: Map<string, EntityStat>): string {
    const rows: CsvCell[][] = [
        ['=== PERSON ENTITIES ==='],
        ['Name', 'Total Occurrences', 'Pages'],
    ];
    for (const stat of rankEntities(entities)) {
        rows.push([stat.name, stat.totalOccurrences, formatPageList(stat.pages)]);
    }
    return toCsv(rows);
}

/**
 * Write entity_report.csv, or report the pass as skipped when no
 * extractor is available
 */
export async function runEntityStatsPass(
    layout: ArtifactLayout,
    range: PageRange,
    extractor: EntityExtractor | null,
    logger: Logger
): Promise<PassReport> {
    if (!extractor) {
        logger.info('Entity report skipped: no entity recognizer available');
        return {
            pass: AggregationPassEnum.ENTITIES,
            status: PassStatusEnum.SKIPPED,
            skippedPages: [],
            readErrors: [],
            reason: 'No entity recognizer available',
        };
    }

    const scan = await scanPageTexts(layout, range, AggregationPassEnum.ENTITIES, logger);
    const entities = new Map<string, EntityStat>();

    for (const page of scan.pages) {
        let spans: EntitySpan[];
        try {
            spans = await extractor.extractPersonEntities(page.text);
        } catch (error) {
            const cause = toError(error);
            recordReadError(
                scan,
                new AggregationReadError(cause.message, page.pageIndex, AggregationPassEnum.ENTITIES, { cause }),
                logger
            );
            continue;
        }

        for (const span of spans) {
            const name = span.name.trim();
            if (!name) continue;

            const existing = entities.get(name);
            if (existing) {
                existing.totalOccurrences++;
                existing.pages.add(page.pageIndex);
            } else {
                entities.set(name, { name, totalOccurrences: 1, pages: new Set([page.pageIndex]) });
            }
        }
    }

    if (entities.size === 0) {
        logger.info('No person names detected');
        return {
            pass: AggregationPassEnum.ENTITIES,
            status: PassStatusEnum.EMPTY,
            skippedPages: scan.skippedPages,
            readErrors: scan.readErrors,
            reason: 'No person names detected',
        };
    }

    await fs.writeFile(layout.entityReportPath, formatEntityReport(entities), 'utf-8');

    logger.info('Entity report saved', {
        outputPath: layout.entityReportPath,
        extractor: extractor.id,
        uniqueNames: entities.size,
    });

    return {
        pass: AggregationPassEnum.ENTITIES,
        status: PassStatusEnum.WRITTEN,
        outputPath: layout.entityReportPath,
        skippedPages: scan.skippedPages,
        readErrors: scan.readErrors,
    };
}
