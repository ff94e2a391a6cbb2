/**
 * Compare API entry point
 */

import {
  logger,
  config,
  DocumentTextSource,
  PdfJsLoader,
  TesseractOcrEngine,
  OpenAiNarrator,
  loadDefaultGlossary,
} from '@quote-compare/shared';
import { createApp } from './app';

const ocr = new TesseractOcrEngine({
  language: config.ocrLanguage,
  langPath: config.ocrLangPath || undefined,
});

const app = createApp({
  reader: new DocumentTextSource(new PdfJsLoader(), ocr),
  narrator: OpenAiNarrator.fromConfig(),
  glossary: loadDefaultGlossary(),
});

const server = app.listen(config.port, () => {
  logger.info('Compare API started', { port: config.port });
});

async function shutdown(signal: string): Promise<void> {
  logger.info('Shutting down', { signal });
  server.close();
  await ocr.close();
  process.exit(0);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
