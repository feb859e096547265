import { describe, it, expect } from 'vitest';
import {
    FolioError,
    ConfigurationError,
    ValidationError,
    SetupError,
    PageError,
    RenderError,
    RecognitionError,
    PersistError,
    DocumentOpenError,
    AggregationReadError,
    DocumentError,
    isFatalSetupError,
    toError,
    wrapError,
} from '../src/errors/index.js';

describe('Error Classes', () => {
    describe('FolioError', () => {
        it('should create with message and code', () => {
            const error = new FolioError('Test error', 'TEST_CODE');
            expect(error.message).toBe('Test error');
            expect(error.code).toBe('TEST_CODE');
            expect(error.name).toBe('FolioError');
        });

        it('should generate a correlation id when none is given', () => {
            const error = new FolioError('Test error', 'TEST');
            expect(error.correlationId).toMatch(/^folio_\d+_[a-z0-9]+$/);
        });

        it('should keep a provided correlation id and cause', () => {
            const cause = new Error('root');
            const error = new FolioError('Test error', 'TEST', undefined, { correlationId: 'run-1', cause });
            expect(error.correlationId).toBe('run-1');
            expect(error.cause).toBe(cause);
        });

        it('should serialize to JSON', () => {
            const error = new FolioError('Test error', 'TEST', { key: 'value' }, {
                cause: new TypeError('bad'),
                operation: 'render',
            });
            const json = error.toJSON();
            expect(json.name).toBe('FolioError');
            expect(json.code).toBe('TEST');
            expect(json.message).toBe('Test error');
            expect(json.details).toEqual({ key: 'value' });
            expect(json.operation).toBe('render');
            expect(json.cause).toEqual({ name: 'TypeError', message: 'bad' });
        });
    });

    describe('SetupError', () => {
        it('should carry the path', () => {
            const error = new SetupError('PDF contains 0 pages', '/tmp/a.pdf');
            expect(error.name).toBe('SetupError');
            expect(error.code).toBe('SETUP_ERROR');
            expect(error.path).toBe('/tmp/a.pdf');
            expect(error.details).toEqual({ path: '/tmp/a.pdf' });
        });
    });

    describe('PageError family', () => {
        const cases: Array<[string, new (message: string, pageIndex: number) => PageError, string]> = [
            ['DocumentOpenError', DocumentOpenError, 'DOCUMENT_OPEN_ERROR'],
            ['RenderError', RenderError, 'RENDER_ERROR'],
            ['RecognitionError', RecognitionError, 'RECOGNITION_ERROR'],
            ['PersistError', PersistError, 'PERSIST_ERROR'],
        ];

        it.each(cases)('%s should have name, code and page', (name, ErrorClass, code) => {
            const error = new ErrorClass('failed', 7);
            expect(error).toBeInstanceOf(PageError);
            expect(error.name).toBe(name);
            expect(error.code).toBe(code);
            expect(error.pageIndex).toBe(7);
        });
    });

    describe('AggregationReadError', () => {
        it('should carry page and pass', () => {
            const error = new AggregationReadError('EACCES', 3, 'words');
            expect(error.pageIndex).toBe(3);
            expect(error.pass).toBe('words');
            expect(error.code).toBe('AGGREGATION_READ_ERROR');
        });
    });

    describe('DocumentError', () => {
        it('should carry the document name', () => {
            const error = new DocumentError('failed', 'b.pdf');
            expect(error.documentName).toBe('b.pdf');
            expect(error.code).toBe('DOCUMENT_ERROR');
        });
    });

    describe('ValidationError', () => {
        it('should store the field', () => {
            const error = new ValidationError('Invalid range', 'range', { start: 5 });
            expect(error.field).toBe('range');
            expect(error.details).toEqual({ field: 'range', start: 5 });
        });
    });
});

describe('Error helpers', () => {
    it('toError should wrap non-errors', () => {
        const error = toError('plain string');
        expect(error).toBeInstanceOf(Error);
        expect(error.message).toBe('plain string');
    });

    it('toError should return errors unchanged', () => {
        const original = new Error('x');
        expect(toError(original)).toBe(original);
    });

    it('wrapError should convert unknown errors', () => {
        const wrapped = wrapError(new RangeError('out of range'), ConfigurationError, 'load');
        expect(wrapped).toBeInstanceOf(ConfigurationError);
        expect(wrapped.message).toBe('out of range');
        expect(wrapped.operation).toBe('load');
        expect(wrapped.details).toEqual({ originalError: 'RangeError' });
    });

    it('wrapError should pass FolioErrors through', () => {
        const original = new SetupError('missing');
        expect(wrapError(original, ConfigurationError)).toBe(original);
    });

    it('isFatalSetupError should match setup, validation and configuration errors only', () => {
        expect(isFatalSetupError(new SetupError('x'))).toBe(true);
        expect(isFatalSetupError(new ValidationError('x'))).toBe(true);
        expect(isFatalSetupError(new ConfigurationError('x'))).toBe(true);
        expect(isFatalSetupError(new RenderError('x', 1))).toBe(false);
        expect(isFatalSetupError(new DocumentError('x', 'a.pdf'))).toBe(false);
        expect(isFatalSetupError(new Error('x'))).toBe(false);
    });
});
