import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ArtifactLayout } from '../../src/engines/artifact.layout.js';
import { PageUnitResolver } from '../../src/engines/page-unit.resolver.js';
import { ValidationError } from '../../src/errors/index.js';
import { createTempDir, removeTempDir, writeCompletePage, writeFailedPage } from '../mocks/index.js';

describe('PageUnitResolver', () => {
    let root: string;
    let layout: ArtifactLayout;
    let resolver: PageUnitResolver;

    beforeEach(async () => {
        root = await createTempDir();
        layout = new ArtifactLayout(path.join(root, 'doc_processed'));
        resolver = new PageUnitResolver(layout);
    });

    afterEach(async () => {
        await removeTempDir(root);
    });

    describe('pendingUnits', () => {
        it('should treat every page as pending when nothing exists yet', async () => {
            const pending = await resolver.pendingUnits({ start: 1, end: 3 });

            expect(pending.map(unit => unit.pageIndex)).toEqual([1, 2, 3]);
            expect(pending[0]).toEqual(layout.unit(1));
        });

        it('should leave out complete pages and keep failed ones', async () => {
            await writeCompletePage(layout, 1, 'one');
            await writeFailedPage(layout, 2);
            await writeCompletePage(layout, 4, 'four');

            const pending = await resolver.pendingUnits({ start: 1, end: 5 });

            expect(pending.map(unit => unit.pageIndex)).toEqual([2, 3, 5]);
        });

        it('should stay inside the range', async () => {
            const pending = await resolver.pendingUnits({ start: 4, end: 6 });
            expect(pending.map(unit => unit.pageIndex)).toEqual([4, 5, 6]);
        });
    });

    describe('lastCompletedPage', () => {
        it('should be 0 for a missing output directory', async () => {
            expect(await resolver.lastCompletedPage()).toBe(0);
        });

        it('should stop before a page holding the failure sentinel', async () => {
            await writeCompletePage(layout, 1, 'one');
            await writeCompletePage(layout, 2, 'two');
            await writeFailedPage(layout, 3);

            expect(await resolver.lastCompletedPage()).toBe(2);
        });

        it('should return the highest complete page', async () => {
            await writeCompletePage(layout, 1, 'one');
            await writeCompletePage(layout, 3, 'three');

            expect(await resolver.lastCompletedPage()).toBe(3);
        });
    });

    describe('resolveRange', () => {
        it('should cover the whole document in all mode', async () => {
            expect(await resolver.resolveRange({ mode: 'all' }, 5)).toEqual({ start: 1, end: 5 });
        });

        it('should accept a valid explicit range', async () => {
            expect(await resolver.resolveRange({ mode: 'range', start: 2, end: 4 }, 5)).toEqual({ start: 2, end: 4 });
        });

        it('should reject a range outside the document', async () => {
            await expect(resolver.resolveRange({ mode: 'range', start: 0, end: 2 }, 5))
                .rejects.toThrow('Invalid page range 0-2. Range must be between 1 and 5.');
            await expect(resolver.resolveRange({ mode: 'range', start: 3, end: 6 }, 5))
                .rejects.toBeInstanceOf(ValidationError);
            await expect(resolver.resolveRange({ mode: 'range', start: 4, end: 2 }, 5))
                .rejects.toBeInstanceOf(ValidationError);
        });

        it('should resume after the last completed page', async () => {
            await writeCompletePage(layout, 1, 'one');
            await writeCompletePage(layout, 2, 'two');
            await writeFailedPage(layout, 3);

            expect(await resolver.resolveRange({ mode: 'resume' }, 5)).toEqual({ start: 3, end: 5 });
        });

        it('should resume from page 1 without prior progress', async () => {
            expect(await resolver.resolveRange({ mode: 'resume' }, 4)).toEqual({ start: 1, end: 4 });
        });

        it('should return null when resume finds everything done', async () => {
            await writeCompletePage(layout, 1, 'one');
            await writeCompletePage(layout, 2, 'two');

            expect(await resolver.resolveRange({ mode: 'resume' }, 2)).toBeNull();
        });
    });
});
