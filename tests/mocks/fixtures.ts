/**
 * Test fixtures
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { ResolvedConfig } from '../../src/types/config.types.js';
import { resolveConfig } from '../../src/config/resolve.js';
import { ArtifactLayout, formatFailureSentinel } from '../../src/engines/artifact.layout.js';

export async function createTempDir(prefix = 'folio-test-'): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}

export function createTestConfig(outputRoot: string, overrides: Partial<ResolvedConfig> = {}): ResolvedConfig {
    return {
        ...resolveConfig({ outputRoot, concurrency: 2, logging: { level: 'error' } }),
        ...overrides,
    };
}

/**
 * Placeholder PDF file; the fake opener never reads it
 */
export async function createPdfFile(dir: string, name: string): Promise<string> {
    const filePath = path.join(dir, name);
    await fs.writeFile(filePath, '%PDF-1.4 placeholder');
    return filePath;
}

/**
 * Write a completed page (image + text)
 */
export async function writeCompletePage(layout: ArtifactLayout, pageIndex: number, text: string): Promise<void> {
    await layout.ensure();
    await fs.writeFile(layout.imagePath(pageIndex), 'png');
    await fs.writeFile(layout.textPath(pageIndex), text, 'utf-8');
}

/**
 * Write a page that failed: image present, sentinel text
 */
export async function writeFailedPage(layout: ArtifactLayout, pageIndex: number): Promise<void> {
    await layout.ensure();
    await fs.writeFile(layout.imagePath(pageIndex), 'png');
    await fs.writeFile(layout.textPath(pageIndex), formatFailureSentinel('RecognitionError', 'boom'), 'utf-8');
}
