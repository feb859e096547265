import type { ResolvedConfig } from '../../types/config.types.js';
import type { EntityExtractor } from '../../types/engine.types.js';
import type { PageRange } from '../../types/pipeline.types.js';
import type { AggregationReport, PassReport } from '../../types/report.types.js';
import { AggregationPassEnum, PassStatusEnum } from '../../types/enums.js';
import type { Logger } from '../../utils/logger.js';
import type { PipelineEventEmitter } from '../../utils/events.js';
import type { ArtifactLayout } from '../artifact.layout.js';
import { runCombinePass } from './combine.pass.js';
import { runWordStatsPass } from './word-stats.pass.js';
import { runEntityStatsPass } from './entity-stats.pass.js';

/**
 * Post-passes over completed text artifacts. Output depends only on the
 * artifacts and the page range, never on processing order.
 */
export class Aggregator {
    constructor(
        private readonly config: ResolvedConfig,
        private readonly entityExtractor: EntityExtractor | null,
        private readonly logger: Logger,
        private readonly events?: PipelineEventEmitter
    ) { }

    async run(layout: ArtifactLayout, range: PageRange, documentName: string): Promise<AggregationReport> {
        const logger = this.logger.child({ documentName });

        const combine = this.publish(documentName, await runCombinePass(layout, range, logger));
        const words = this.publish(documentName, await runWordStatsPass(layout, range, logger));
        const entities = this.publish(documentName, this.config.entities
            ? await runEntityStatsPass(layout, range, this.entityExtractor, logger)
            : {
                pass: AggregationPassEnum.ENTITIES,
                status: PassStatusEnum.SKIPPED,
                skippedPages: [],
                readErrors: [],
                reason: 'Disabled by configuration',
            });

        return { combine, words, entities };
    }

    private publish(documentName: string, report: PassReport): PassReport {
        this.events?.emit('aggregate:pass', { ...report, documentName });
        return report;
    }
}
