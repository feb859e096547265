/**
 * An open document. Owned by exactly one page unit (or the setup step)
 * and closed before the owner returns.
 */
export interface DocumentHandle {
    /** Number of pages in the document */
    readonly pageCount: number;

    /**
     * Rasterize a page
     * @param pageIndex - 1-based page index
     * @param dpi - Target resolution
     * @returns PNG bytes
     */
    renderPage(pageIndex: number, dpi: number): Promise<Buffer>;

    /** Release the handle */
    close(): Promise<void>;
}

/**
 * Opens documents. Every call returns an independent handle.
 */
export interface DocumentOpener {
    open(path: string): Promise<DocumentHandle>;
}

/**
 * Text recognition engine
 */
export interface Recognizer {
    /**
     * Recognize text in an image
     * @param image - PNG bytes
     * @param language - `+` joined language codes
     */
    recognize(image: Buffer, language: string): Promise<string>;
}

/**
 * Character span of an entity in the page text
 */
export interface EntitySpan {
    name: string;
    span: { start: number; end: number };
}

/**
 * Named-entity recognizer restricted to person names
 */
export interface EntityExtractor {
    /** Short identifier for logs */
    readonly id: string;
    extractPersonEntities(text: string): Promise<EntitySpan[]>;
}

/**
 * Collaborators a pipeline needs. `entityExtractor` is null when no
 * recognizer is installed.
 */
export interface PipelineEngines {
    opener: DocumentOpener;
    recognizer: Recognizer;
    entityExtractor: EntityExtractor | null;
}
