/**
 * Error context for correlation and tracing
 */
export interface ErrorContext {
    /** Correlation ID of the run that raised the error */
    correlationId?: string;
    /** Timestamp when error occurred */
    timestamp?: Date;
    /** Original cause of the error */
    cause?: Error;
    /** Operation that was being performed */
    operation?: string;
}

/**
 * Generate a unique correlation ID
 */
export function generateCorrelationId(): string {
    return `folio_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
}

/**
 * Base error class for folio-ocr
 * All errors extend this class for consistent handling
 */
export class FolioError extends Error {
    public readonly code: string;
    public readonly details?: Record<string, unknown>;
    public readonly correlationId: string;
    public readonly timestamp: Date;
    public readonly cause?: Error;
    public readonly operation?: string;

    constructor(
        message: string,
        code: string,
        details?: Record<string, unknown>,
        context?: ErrorContext
    ) {
        super(message);
        this.name = 'FolioError';
        this.code = code;
        this.details = details;
        this.correlationId = context?.correlationId ?? generateCorrelationId();
        this.timestamp = context?.timestamp ?? new Date();
        this.cause = context?.cause;
        this.operation = context?.operation;
        Error.captureStackTrace(this, this.constructor);
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            correlationId: this.correlationId,
            timestamp: this.timestamp.toISOString(),
            operation: this.operation,
            cause: this.cause ? {
                name: this.cause.name,
                message: this.cause.message,
            } : undefined,
        };
    }
}

/**
 * Normalize any thrown value into an Error
 */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

/**
 * Wrap an unknown error into a FolioError
 */
export function wrapError(
    error: unknown,
    ErrorClass: new (message: string, details?: Record<string, unknown>, context?: ErrorContext) => FolioError,
    operation?: string
): FolioError {
    if (error instanceof FolioError) {
        return error;
    }

    const originalError = toError(error);
    return new ErrorClass(
        originalError.message,
        { originalError: originalError.name },
        { cause: originalError, operation }
    );
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends FolioError {
    constructor(message: string, details?: Record<string, unknown>, context?: ErrorContext) {
        super(message, 'CONFIGURATION_ERROR', details, context);
        this.name = 'ConfigurationError';
    }
}

/**
 * Validation errors
 */
export class ValidationError extends FolioError {
    public readonly field?: string;

    constructor(message: string, field?: string, details?: Record<string, unknown>) {
        super(message, 'VALIDATION_ERROR', { field, ...details });
        this.name = 'ValidationError';
        this.field = field;
    }
}

/**
 * Unrecoverable input problems detected before any page is scheduled:
 * missing path, non-PDF file, unreadable or empty document
 */
export class SetupError extends FolioError {
    public readonly path?: string;

    constructor(message: string, path?: string, context?: ErrorContext) {
        super(message, 'SETUP_ERROR', { path }, context);
        this.name = 'SetupError';
        this.path = path;
    }
}

/**
 * Failure while processing a single page. Never escapes the page worker.
 */
export class PageError extends FolioError {
    public readonly pageIndex: number;

    constructor(message: string, pageIndex: number, code: string = 'PAGE_ERROR', context?: ErrorContext) {
        super(message, code, { pageIndex }, context);
        this.name = 'PageError';
        this.pageIndex = pageIndex;
    }
}

export class DocumentOpenError extends PageError {
    constructor(message: string, pageIndex: number, context?: ErrorContext) {
        super(message, pageIndex, 'DOCUMENT_OPEN_ERROR', context);
        this.name = 'DocumentOpenError';
    }
}

export class RenderError extends PageError {
    constructor(message: string, pageIndex: number, context?: ErrorContext) {
        super(message, pageIndex, 'RENDER_ERROR', context);
        this.name = 'RenderError';
    }
}

export class RecognitionError extends PageError {
    constructor(message: string, pageIndex: number, context?: ErrorContext) {
        super(message, pageIndex, 'RECOGNITION_ERROR', context);
        this.name = 'RecognitionError';
    }
}

export class PersistError extends PageError {
    constructor(message: string, pageIndex: number, context?: ErrorContext) {
        super(message, pageIndex, 'PERSIST_ERROR', context);
        this.name = 'PersistError';
    }
}

/**
 * An artifact that could not be read or parsed during a report pass.
 * The page is excluded from that report only.
 */
export class AggregationReadError extends FolioError {
    public readonly pageIndex: number;
    public readonly pass: string;

    constructor(message: string, pageIndex: number, pass: string, context?: ErrorContext) {
        super(message, 'AGGREGATION_READ_ERROR', { pageIndex, pass }, context);
        this.name = 'AggregationReadError';
        this.pageIndex = pageIndex;
        this.pass = pass;
    }
}

/**
 * Any failure of one document's pipeline inside a batch run
 */
export class DocumentError extends FolioError {
    public readonly documentName: string;

    constructor(message: string, documentName: string, context?: ErrorContext) {
        super(message, 'DOCUMENT_ERROR', { documentName }, context);
        this.name = 'DocumentError';
        this.documentName = documentName;
    }
}

/**
 * Errors that must stop the process with a non-zero exit code
 */
export function isFatalSetupError(error: unknown): boolean {
    return error instanceof SetupError
        || error instanceof ValidationError
        || error instanceof ConfigurationError;
}
