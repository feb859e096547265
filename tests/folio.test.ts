import * as fs from 'fs/promises';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Folio } from '../src/folio.js';
import { ConfigurationError } from '../src/errors/index.js';
import {
    createFakeOpener,
    createFakeRecognizer,
    createPdfFile,
    createTempDir,
    removeTempDir,
} from './mocks/index.js';

describe('Folio', () => {
    let root: string;

    beforeEach(async () => {
        root = await createTempDir();
    });

    afterEach(async () => {
        await removeTempDir(root);
    });

    it('should reject invalid configuration', async () => {
        await expect(Folio.create({ concurrency: -1 })).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should resolve configuration with defaults', async () => {
        const folio = await Folio.create(
            { outputRoot: root, logging: { level: 'error' } },
            { entityExtractor: null }
        );

        const config = folio.getConfig();
        expect(config.outputRoot).toBe(path.resolve(root));
        expect(config.render.dpi).toBe(300);
        expect(folio.outputDirFor('/scans/Annual Report.pdf')).toBe(path.join(path.resolve(root), 'Annual_Report_processed'));
    });

    it('should run a document end to end with injected engines', async () => {
        const pdfPath = await createPdfFile(root, 'letter.pdf');
        const folio = await Folio.create(
            { outputRoot: path.join(root, 'out'), concurrency: 2, logging: { level: 'error' } },
            {
                opener: createFakeOpener({ 'letter.pdf': { pageCount: 2 } }),
                recognizer: createFakeRecognizer({ 1: 'Dear reader', 2: 'Kind regards' }),
                entityExtractor: null,
            }
        );
        const statuses: string[] = [];
        folio.events.on('page:complete', ({ status }) => statuses.push(status));

        const report = await folio.runDocument(pdfPath);

        expect(report.tally.successCount).toBe(2);
        expect(statuses).toEqual(['SUCCESS', 'SUCCESS']);
        expect(await fs.readFile(path.join(root, 'out', 'letter_processed', 'combined.txt'), 'utf-8'))
            .toBe('--- Page 1 ---\nDear reader\n\n--- Page 2 ---\nKind regards\n\n');

        const inspection = await folio.inspect(pdfPath);
        expect(inspection.lastCompletedPage).toBe(2);
    });

    it('should run a directory', async () => {
        const inputDir = path.join(root, 'in');
        await fs.mkdir(inputDir);
        await createPdfFile(inputDir, 'one.pdf');
        const folio = await Folio.create(
            { outputRoot: path.join(root, 'out'), logging: { level: 'error' } },
            {
                opener: createFakeOpener({ 'one.pdf': { pageCount: 1 } }),
                recognizer: createFakeRecognizer({ 1: 'content' }),
                entityExtractor: null,
            }
        );

        const summary = await folio.runDirectory(inputDir);

        expect(summary.successful).toEqual(['one.pdf']);
    });
});
