export { PdfDocumentOpener, PdfDocumentHandle, scaleForDpi } from './pdf.document.js';
export { TesseractRecognizer, buildTesseractArgs } from './tesseract.recognizer.js';
export { CompromiseEntityExtractor, loadEntityExtractor, locateSpans } from './entity.extractor.js';
