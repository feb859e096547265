import * as fs from 'fs/promises';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
    ArtifactLayout,
    formatFailureSentinel,
    isFailureSentinel,
    isUnitComplete,
    outputDirName,
    padPageIndex,
} from '../../src/engines/artifact.layout.js';
import { createTempDir, removeTempDir, writeCompletePage, writeFailedPage } from '../mocks/index.js';

describe('ArtifactLayout', () => {
    let root: string;
    let layout: ArtifactLayout;

    beforeEach(async () => {
        root = await createTempDir();
        layout = new ArtifactLayout(path.join(root, 'doc_processed'));
    });

    afterEach(async () => {
        await removeTempDir(root);
    });

    describe('paths', () => {
        it('should zero pad page numbers to four digits', () => {
            expect(padPageIndex(7)).toBe('0007');
            expect(layout.imagePath(7)).toBe(path.join(root, 'doc_processed', 'images', '0007.png'));
            expect(layout.textPath(7)).toBe(path.join(root, 'doc_processed', 'text', '0007.txt'));
        });

        it('should never truncate wider page numbers', () => {
            expect(padPageIndex(12345)).toBe('12345');
        });

        it('should place reports at the root', () => {
            expect(layout.combinedPath).toBe(path.join(root, 'doc_processed', 'combined.txt'));
            expect(layout.wordReportPath).toBe(path.join(root, 'doc_processed', 'word_report.csv'));
            expect(layout.entityReportPath).toBe(path.join(root, 'doc_processed', 'entity_report.csv'));
        });
    });

    describe('outputDirName', () => {
        it('should replace whitespace runs with underscores', () => {
            expect(outputDirName('/scans/My Scan  2.pdf')).toBe('My_Scan_2_processed');
        });

        it('should drop only the last extension', () => {
            expect(outputDirName('report.v2.PDF')).toBe('report.v2_processed');
        });
    });

    describe('failure sentinel', () => {
        it('should be recognized at the start of the text only', () => {
            const sentinel = formatFailureSentinel('RenderError', 'bad page');
            expect(sentinel).toBe('OCR FAILED FOR THIS PAGE: RenderError: bad page');
            expect(isFailureSentinel(sentinel)).toBe(true);
            expect(isFailureSentinel('Notes: OCR FAILED FOR THIS PAGE')).toBe(false);
        });
    });

    describe('isUnitComplete', () => {
        it('should require both image and text', async () => {
            await layout.ensure();
            await fs.writeFile(layout.imagePath(1), 'png');
            expect(await isUnitComplete(layout.unit(1))).toBe(false);

            await fs.writeFile(layout.textPath(1), 'hello', 'utf-8');
            expect(await isUnitComplete(layout.unit(1))).toBe(true);
        });

        it('should accept an empty recognized text', async () => {
            await writeCompletePage(layout, 2, '');
            expect(await isUnitComplete(layout.unit(2))).toBe(true);
        });

        it('should reject a page holding the failure sentinel', async () => {
            await writeFailedPage(layout, 3);
            expect(await isUnitComplete(layout.unit(3))).toBe(false);
        });

        it('should reject text without an image', async () => {
            await layout.ensure();
            await fs.writeFile(layout.textPath(4), 'orphan', 'utf-8');
            expect(await isUnitComplete(layout.unit(4))).toBe(false);
        });
    });

    describe('readPageText', () => {
        it('should classify text, failed and missing pages', async () => {
            await writeCompletePage(layout, 1, 'The cat sat.');
            await writeFailedPage(layout, 2);

            expect(await layout.readPageText(1)).toEqual({ kind: 'text', pageIndex: 1, text: 'The cat sat.' });
            expect(await layout.readPageText(2)).toEqual({ kind: 'failed', pageIndex: 2 });
            expect(await layout.readPageText(3)).toEqual({ kind: 'missing', pageIndex: 3 });
        });

        it('should report other read errors as unreadable', async () => {
            await layout.ensure();
            // A directory where the text file should be
            await fs.mkdir(layout.textPath(5));

            const state = await layout.readPageText(5);
            expect(state.kind).toBe('unreadable');
        });
    });

    describe('listImagePages', () => {
        it('should return an empty list when the directory is missing', async () => {
            expect(await layout.listImagePages()).toEqual([]);
        });

        it('should list numeric image names in ascending order', async () => {
            await layout.ensure();
            for (const name of ['0010.png', '0002.png', 'cover.png', '0003.txt']) {
                await fs.writeFile(path.join(layout.imageDir, name), 'x');
            }

            expect(await layout.listImagePages()).toEqual([2, 10]);
        });
    });
});
