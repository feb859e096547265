import type { RangeMode } from '../types/config.types.js';
import type { PageRange, PageUnit } from '../types/pipeline.types.js';
import { ValidationError } from '../errors/index.js';
import { isUnitComplete, type ArtifactLayout } from './artifact.layout.js';

/**
 * Decides which pages of a document still need work.
 * Pure filesystem inspection; never writes.
 */
export class PageUnitResolver {
    constructor(private readonly layout: ArtifactLayout) { }

    /**
     * Units in `[start, end]`, ascending, whose artifacts are not complete.
     * A missing output directory leaves every page pending.
     */
    async pendingUnits(range: PageRange): Promise<PageUnit[]> {
        const pending: PageUnit[] = [];
        for (let pageIndex = range.start; pageIndex <= range.end; pageIndex++) {
            const unit = this.layout.unit(pageIndex);
            if (!(await isUnitComplete(unit))) {
                pending.push(unit);
            }
        }
        return pending;
    }

    /**
     * Whether a single page satisfies the completion predicate
     */
    async isComplete(pageIndex: number): Promise<boolean> {
        return isUnitComplete(this.layout.unit(pageIndex));
    }

    /**
     * Highest fully completed page index, or 0.
     * Pages holding a failure marker are never counted.
     */
    async lastCompletedPage(): Promise<number> {
        const candidates = await this.layout.listImagePages();

        for (let i = candidates.length - 1; i >= 0; i--) {
            const pageIndex = candidates[i];
            if (pageIndex !== undefined && await this.isComplete(pageIndex)) {
                return pageIndex;
            }
        }
        return 0;
    }

    /**
     * Turn a range mode into a concrete page range.
     * Returns null when `resume` finds every page already done.
     */
    async resolveRange(mode: RangeMode, pageCount: number): Promise<PageRange | null> {
        switch (mode.mode) {
            case 'all':
                return { start: 1, end: pageCount };

            case 'range':
                if (mode.start < 1 || mode.end > pageCount || mode.start > mode.end) {
                    throw new ValidationError(
                        `Invalid page range ${mode.start}-${mode.end}. Range must be between 1 and ${pageCount}.`,
                        'range',
                        { start: mode.start, end: mode.end, pageCount }
                    );
                }
                return { start: mode.start, end: mode.end };

            case 'resume': {
                const last = await this.lastCompletedPage();
                const start = last + 1;
                if (start > pageCount) {
                    return null;
                }
                return { start, end: pageCount };
            }
        }
    }
}
