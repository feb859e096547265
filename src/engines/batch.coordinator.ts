import * as fs from 'fs/promises';
import * as path from 'path';
import type { ResolvedConfig } from '../types/config.types.js';
import type { BatchOutcome, BatchSummary } from '../types/pipeline.types.js';
import { ARTIFACT_LAYOUT, AGGREGATION } from '../config/constants.js';
import { DocumentError, SetupError, toError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import type { PipelineEventEmitter } from '../utils/events.js';
import { hashBuffer, shortHash } from '../utils/hash.js';
import { outputDirName } from './artifact.layout.js';
import type { PipelineEngine } from './pipeline.engine.js';

/**
 * Local wall-clock timestamp, `YYYY-MM-DD HH:mm:ss`
 */
export function formatTimestamp(date: Date): string {
    const pad = (value: number): string => String(value).padStart(2, '0');
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
        + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * One error_log.txt entry. `cause` is the error the document failed with.
 */
export function formatErrorLogEntry(documentName: string, cause: Error, at: Date): string {
    const rule = '='.repeat(AGGREGATION.ERROR_LOG_RULE_WIDTH);
    const thin = '-'.repeat(AGGREGATION.ERROR_LOG_RULE_WIDTH);
    return `\n${rule}\n`
        + `[${formatTimestamp(at)}] ERROR processing: ${documentName}\n`
        + `${thin}\n`
        + `${cause.name}: ${cause.message}\n`
        + `${rule}\n\n`;
}

/**
 * PDF files of a directory (extension matched case-insensitively), sorted by name
 */
export async function listDocuments(directory: string): Promise<string[]> {
    const entries = await fs.readdir(directory, { withFileTypes: true });
    return entries
        .filter(entry => entry.isFile() && path.extname(entry.name).toLowerCase() === '.pdf')
        .map(entry => entry.name)
        .sort();
}

/**
 * Hands out output folder names, appending a short path hash when a name
 * was already given out (case-insensitive) earlier in the same batch
 */
export class OutputDirAllocator {
    private readonly claimed = new Set<string>();

    allocate(documentPath: string): string {
        const base = outputDirName(documentPath);
        let name = base;

        if (this.claimed.has(base.toLowerCase())) {
            const digest = shortHash(hashBuffer(path.resolve(documentPath)), AGGREGATION.COLLISION_HASH_LENGTH);
            name = `${base}_${digest}`;
        }

        this.claimed.add(name.toLowerCase());
        return name;
    }
}

/**
 * Runs every PDF in a directory through the pipeline engine, one document
 * at a time. A failing document is logged and recorded; the batch goes on.
 */
export class BatchCoordinator {
    constructor(
        private readonly config: ResolvedConfig,
        private readonly engine: PipelineEngine,
        private readonly logger: Logger,
        private readonly events?: PipelineEventEmitter
    ) { }

    async runDirectory(directory: string): Promise<BatchSummary> {
        const startTime = Date.now();

        let names: string[];
        try {
            names = await listDocuments(directory);
        } catch (error) {
            throw new SetupError(`Directory not readable: ${directory}`, directory, { cause: toError(error) });
        }

        const summary: BatchSummary = {
            directory,
            outcomes: [],
            successful: [],
            failed: [],
            durationMs: 0,
        };

        this.events?.emit('batch:start', { directory, documentCount: names.length });

        if (names.length === 0) {
            this.logger.warn('No PDF files found', { directory });
            summary.durationMs = Date.now() - startTime;
            return summary;
        }

        this.logger.info('Batch started', { directory, documentCount: names.length });

        const allocator = new OutputDirAllocator();
        const errorLogPath = path.join(directory, ARTIFACT_LAYOUT.ERROR_LOG_FILE);

        for (const [index, name] of names.entries()) {
            const documentPath = path.join(directory, name);
            const outputDir = path.join(this.config.outputRoot, allocator.allocate(documentPath));
            let outcome: BatchOutcome;

            try {
                const report = await this.engine.runDocument(documentPath, { range: { mode: 'all' }, outputDir });
                outcome = { documentName: name, success: true, outputDir, report };
                summary.successful.push(name);
            } catch (error) {
                const cause = toError(error);
                const documentError = new DocumentError(
                    `${cause.name}: ${cause.message}`,
                    name,
                    { cause, operation: 'runDocument' }
                );

                this.logger.error('Document failed', {
                    documentName: name,
                    error: documentError.toJSON(),
                });

                outcome = { documentName: name, success: false, outputDir, error: cause.message };
                summary.failed.push({ documentName: name, error: cause.message });

                if (await this.appendErrorLog(errorLogPath, name, cause)) {
                    summary.errorLogPath = errorLogPath;
                }
            }

            summary.outcomes.push(outcome);
            this.events?.emit('batch:document', { ...outcome, position: index + 1, total: names.length });
        }

        summary.durationMs = Date.now() - startTime;

        this.logger.info('Batch completed', {
            directory,
            successful: summary.successful.length,
            failed: summary.failed.length,
            durationMs: summary.durationMs,
        });

        return summary;
    }

    /**
     * Returns false when the log could not be written
     */
    private async appendErrorLog(errorLogPath: string, documentName: string, cause: Error): Promise<boolean> {
        try {
            await fs.appendFile(errorLogPath, formatErrorLogEntry(documentName, cause, new Date()), 'utf-8');
            return true;
        } catch (error) {
            this.logger.warn('Could not write error log', {
                errorLogPath,
                error: toError(error).message,
            });
            return false;
        }
    }
}
