import * as fs from 'fs/promises';
import { pdf } from 'pdf-to-img';
import type { DocumentHandle, DocumentOpener } from '../types/engine.types.js';
import { PAGE_PROCESSING } from '../config/constants.js';
import { DEFAULT_RENDER_CONFIG } from '../types/config.types.js';

type RenderedDocument = Awaited<ReturnType<typeof pdf>>;

/**
 * pdf.js render scale for a target resolution
 */
export function scaleForDpi(dpi: number): number {
    return dpi / PAGE_PROCESSING.BASE_DPI;
}

/**
 * Handle over one PDF file, backed by pdf-to-img.
 * pdf-to-img fixes the scale when a document is loaded, so one loaded
 * document is kept per requested scale.
 */
export class PdfDocumentHandle implements DocumentHandle {
    private readonly rendered = new Map<number, RenderedDocument>();
    private closed = false;

    private constructor(
        private readonly source: Buffer,
        readonly pageCount: number,
        initial: RenderedDocument,
        initialScale: number
    ) {
        this.rendered.set(initialScale, initial);
    }

    /**
     * Load the file once at the resolution pages will be rendered at
     */
    static async load(filePath: string, dpi: number): Promise<PdfDocumentHandle> {
        const source = await fs.readFile(filePath);
        const scale = scaleForDpi(dpi);
        const document = await pdf(source, { scale });
        return new PdfDocumentHandle(source, document.length, document, scale);
    }

    async renderPage(pageIndex: number, dpi: number): Promise<Buffer> {
        if (this.closed) {
            throw new Error('Document handle is closed');
        }
        if (!Number.isInteger(pageIndex) || pageIndex < 1 || pageIndex > this.pageCount) {
            throw new RangeError(`Page ${pageIndex} is outside 1-${this.pageCount}`);
        }

        const scale = scaleForDpi(dpi);
        let document = this.rendered.get(scale);
        if (!document) {
            document = await pdf(this.source, { scale });
            this.rendered.set(scale, document);
        }

        return document.getPage(pageIndex);
    }

    async close(): Promise<void> {
        this.closed = true;
        this.rendered.clear();
    }
}

/**
 * Opens PDFs from disk, loaded for rendering at `dpi`. Every call reads and
 * loads the file again, so handles share no state.
 */
export class PdfDocumentOpener implements DocumentOpener {
    constructor(private readonly dpi: number = DEFAULT_RENDER_CONFIG.dpi) { }

    async open(filePath: string): Promise<DocumentHandle> {
        return PdfDocumentHandle.load(filePath, this.dpi);
    }
}
