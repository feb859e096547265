import { describe, it, expect } from 'vitest';
import { TesseractRecognizer, buildTesseractArgs } from '../../src/services/tesseract.recognizer.js';
import { createMockLogger } from '../mocks/index.js';

describe('TesseractRecognizer', () => {
    it('should pipe the image through stdin and read text from stdout', () => {
        expect(buildTesseractArgs('eng')).toEqual(['stdin', 'stdout', '-l', 'eng']);
        expect(buildTesseractArgs('eng+deu')).toEqual(['stdin', 'stdout', '-l', 'eng+deu']);
    });

    it('should reject when the executable cannot be started', async () => {
        const recognizer = new TesseractRecognizer('/nonexistent/folio-test-tesseract', createMockLogger());

        await expect(recognizer.recognize(Buffer.from('png'), 'eng'))
            .rejects.toThrow("Could not start Tesseract at '/nonexistent/folio-test-tesseract'");
    });
});
