export * from './types';
export { DocumentTextSource, TimeoutError, withTimeout, type TextSourceOptions } from './text-source';
export { PdfJsLoader, groupTextItems, type PositionedText } from './pdf';
export { TesseractOcrEngine, bundledLangPath, type TesseractOptions } from './ocr';
