import * as fs from 'fs/promises';
import type { ResolvedConfig } from '../types/config.types.js';
import type { DocumentHandle, DocumentOpener, Recognizer } from '../types/engine.types.js';
import type { DocumentRef, PageResult, PageUnit } from '../types/pipeline.types.js';
import { PageStatusEnum } from '../types/enums.js';
import {
    type ErrorContext,
    DocumentOpenError,
    PageError,
    PersistError,
    RecognitionError,
    RenderError,
    toError,
} from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import { withSuppressedStderr } from '../utils/diagnostics.js';
import { formatFailureSentinel, isUnitComplete } from './artifact.layout.js';

type PageErrorClass = new (message: string, pageIndex: number, context?: ErrorContext) => PageError;

/**
 * Executes one page: render, recognize, persist.
 *
 * Idempotent: a page whose artifacts are complete is returned as skipped
 * without touching the document. Never throws; any failure is written as a
 * sentinel into the text artifact and returned as a FAILURE result.
 */
export class PageWorker {
    constructor(
        private readonly config: ResolvedConfig,
        private readonly opener: DocumentOpener,
        private readonly recognizer: Recognizer,
        private readonly logger: Logger
    ) { }

    async process(document: DocumentRef, unit: PageUnit): Promise<PageResult> {
        const startTime = Date.now();
        const { pageIndex } = unit;

        if (await isUnitComplete(unit)) {
            return {
                pageIndex,
                status: PageStatusEnum.SKIPPED_ALREADY_DONE,
                durationMs: Date.now() - startTime,
            };
        }

        let handle: DocumentHandle | undefined;

        try {
            handle = await this.step(DocumentOpenError, pageIndex, () => this.opener.open(document.path));
            const openHandle = handle;

            const image = await this.step(RenderError, pageIndex, () =>
                openHandle.renderPage(pageIndex, this.config.render.dpi)
            );
            await this.step(PersistError, pageIndex, () => fs.writeFile(unit.imagePath, image));

            const text = await this.step(RecognitionError, pageIndex, () =>
                withSuppressedStderr(() => this.recognizer.recognize(image, this.config.render.language))
            );
            await this.step(PersistError, pageIndex, () => fs.writeFile(unit.textPath, text.trim(), 'utf-8'));

            this.logger.debug('Page processed', { documentName: document.name, pageIndex, characters: text.length });

            return {
                pageIndex,
                status: PageStatusEnum.SUCCESS,
                durationMs: Date.now() - startTime,
            };
        } catch (error) {
            const err = toError(error);
            const classification = err.name;

            await this.writeSentinel(unit, classification, err.message);

            this.logger.warn('Page failed', {
                documentName: document.name,
                pageIndex,
                classification,
                error: err.message,
            });

            return {
                pageIndex,
                status: PageStatusEnum.FAILURE,
                error: { classification, message: err.message },
                durationMs: Date.now() - startTime,
            };
        } finally {
            if (handle) {
                await handle.close().catch((closeError: unknown) => {
                    this.logger.warn('Failed to close document handle', {
                        pageIndex,
                        error: toError(closeError).message,
                    });
                });
            }
        }
    }

    /**
     * Run one step, classifying any error it raises
     */
    private async step<T>(ErrorClass: PageErrorClass, pageIndex: number, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (error) {
            if (error instanceof PageError) {
                throw error;
            }
            const cause = toError(error);
            throw new ErrorClass(cause.message, pageIndex, { cause });
        }
    }

    private async writeSentinel(unit: PageUnit, classification: string, message: string): Promise<void> {
        try {
            await fs.writeFile(unit.textPath, formatFailureSentinel(classification, message), 'utf-8');
        } catch (error) {
            this.logger.error('Failed to write failure marker', {
                pageIndex: unit.pageIndex,
                error: toError(error).message,
            });
        }
    }
}
