import * as fs from 'fs/promises';
import * as path from 'path';
import { ARTIFACT_LAYOUT, PAGE_PROCESSING } from '../config/constants.js';
import type { PageUnit } from '../types/pipeline.types.js';
import { errnoCode, fileExists } from '../utils/fs.js';
import { toError } from '../errors/index.js';

/**
 * State of a page's text artifact as seen by a report pass
 */
export type PageTextState =
    | { kind: 'text'; pageIndex: number; text: string }
    | { kind: 'missing'; pageIndex: number }
    | { kind: 'failed'; pageIndex: number }
    | { kind: 'unreadable'; pageIndex: number; error: Error };

/**
 * Zero-padded page number used in artifact names
 */
export function padPageIndex(pageIndex: number): string {
    return String(pageIndex).padStart(ARTIFACT_LAYOUT.PAGE_PAD_WIDTH, '0');
}

/**
 * Whether text artifact content marks a failed page
 */
export function isFailureSentinel(content: string): boolean {
    return content.startsWith(PAGE_PROCESSING.FAILURE_SENTINEL);
}

/**
 * Text written in place of recognized text when a page fails
 */
export function formatFailureSentinel(classification: string, message: string): string {
    return `${PAGE_PROCESSING.FAILURE_SENTINEL}: ${classification}: ${message}`;
}

/**
 * Completion predicate: image present, text present and not a failure marker
 */
export async function isUnitComplete(unit: PageUnit): Promise<boolean> {
    if (!(await fileExists(unit.imagePath))) {
        return false;
    }

    try {
        const text = await fs.readFile(unit.textPath, 'utf-8');
        return !isFailureSentinel(text);
    } catch {
        return false;
    }
}

/**
 * On-disk layout of one document's output directory.
 * All paths are pure functions of the root and page index.
 */
export class ArtifactLayout {
    readonly root: string;
    readonly imageDir: string;
    readonly textDir: string;

    constructor(root: string) {
        this.root = root;
        this.imageDir = path.join(root, ARTIFACT_LAYOUT.IMAGE_DIR);
        this.textDir = path.join(root, ARTIFACT_LAYOUT.TEXT_DIR);
    }

    imagePath(pageIndex: number): string {
        return path.join(this.imageDir, `${padPageIndex(pageIndex)}.${ARTIFACT_LAYOUT.IMAGE_EXTENSION}`);
    }

    textPath(pageIndex: number): string {
        return path.join(this.textDir, `${padPageIndex(pageIndex)}.${ARTIFACT_LAYOUT.TEXT_EXTENSION}`);
    }

    unit(pageIndex: number): PageUnit {
        return {
            pageIndex,
            imagePath: this.imagePath(pageIndex),
            textPath: this.textPath(pageIndex),
        };
    }

    get combinedPath(): string {
        return path.join(this.root, ARTIFACT_LAYOUT.COMBINED_FILE);
    }

    get wordReportPath(): string {
        return path.join(this.root, ARTIFACT_LAYOUT.WORD_REPORT_FILE);
    }

    get entityReportPath(): string {
        return path.join(this.root, ARTIFACT_LAYOUT.ENTITY_REPORT_FILE);
    }

    /**
     * Create the image and text directories
     */
    async ensure(): Promise<void> {
        await fs.mkdir(this.imageDir, { recursive: true });
        await fs.mkdir(this.textDir, { recursive: true });
    }

    /**
     * Read a page's text artifact for aggregation
     */
    async readPageText(pageIndex: number): Promise<PageTextState> {
        try {
            const text = await fs.readFile(this.textPath(pageIndex), 'utf-8');
            if (isFailureSentinel(text)) {
                return { kind: 'failed', pageIndex };
            }
            return { kind: 'text', pageIndex, text };
        } catch (error) {
            if (errnoCode(error) === 'ENOENT') {
                return { kind: 'missing', pageIndex };
            }
            return { kind: 'unreadable', pageIndex, error: toError(error) };
        }
    }

    /**
     * Page indices that have an image artifact, parsed from file names made only of digits
     */
    async listImagePages(): Promise<number[]> {
        let entries: string[];
        try {
            entries = await fs.readdir(this.imageDir);
        } catch (error) {
            if (errnoCode(error) === 'ENOENT') {
                return [];
            }
            throw error;
        }

        const pattern = new RegExp(`^(\\d+)\\.${ARTIFACT_LAYOUT.IMAGE_EXTENSION}$`);
        const pages: number[] = [];
        for (const entry of entries) {
            const match = pattern.exec(entry);
            if (match?.[1]) {
                pages.push(Number.parseInt(match[1], 10));
            }
        }
        return pages.sort((a, b) => a - b);
    }
}

/**
 * Output folder name for a document: `<stem with whitespace as _>_processed`
 */
export function outputDirName(documentPath: string): string {
    const stem = path.basename(documentPath, path.extname(documentPath));
    return `${stem.replace(/\s+/g, '_')}${ARTIFACT_LAYOUT.OUTPUT_DIR_SUFFIX}`;
}
