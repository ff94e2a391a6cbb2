/**
 * Document Text Source
 *
 * Per-page text acquisition with OCR fallback. A page whose text layer holds
 * no more than a header or footer is rasterized and recognized instead. Page
 * failures are recorded and never stop the remaining pages; a document that
 * cannot be opened yields no text.
 */

import { config } from '../config';
import { errorMessage } from '../errors';
import { logger } from '../logger';
import { ocrDurationHistogram, pagesProcessedCounter } from '../metrics';
import type { Outcome, PageText } from '../types';
import type { DocumentReader, OcrEngine, PdfDocument, PdfLoader, PdfPage } from './types';

export interface TextSourceOptions {
  /** Trimmed text-layer length a page must exceed to skip OCR. */
  minPageTextChars: number;
  /** Rasterization resolution for OCR. */
  ocrDpi: number;
  /** Upper bound for rendering plus recognizing one page. */
  ocrPageTimeoutMs: number;
}

function defaultOptions(): TextSourceOptions {
  return {
    minPageTextChars: config.minPageTextChars,
    ocrDpi: config.ocrDpi,
    ocrPageTimeoutMs: config.ocrPageTimeoutMs,
  };
}

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Reject with a TimeoutError if `promise` has not settled within `ms`.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class DocumentTextSource implements DocumentReader {
  private readonly options: TextSourceOptions;

  constructor(
    private readonly loader: PdfLoader,
    private readonly ocr: OcrEngine,
    options: Partial<TextSourceOptions> = {}
  ) {
    this.options = { ...defaultOptions(), ...options };
  }

  /**
   * Text of every page, in page order, joined by newlines. Unreadable
   * documents give ''.
   */
  async extractText(content: Uint8Array, name: string): Promise<string> {
    const outcome = await this.readDocument(content, name);
    if (!outcome.ok) return '';
    return outcome.value.map((page) => page.text).join('\n');
  }

  async readDocument(content: Uint8Array, name: string): Promise<Outcome<PageText[]>> {
    let document: PdfDocument;
    try {
      document = await this.loader.open(content);
    } catch (error) {
      logger.warn('PDF read error', { document_name: name, error: errorMessage(error) });
      return { ok: false, error: errorMessage(error) };
    }

    const pages: PageText[] = [];
    try {
      for (let pageNumber = 1; pageNumber <= document.pageCount; pageNumber++) {
        const page = await this.readPage(document, pageNumber, name);
        pagesProcessedCounter.inc({ method: page.method });
        pages.push(page);
      }
    } finally {
      await document.close().catch((error: unknown) => {
        logger.warn('Failed to release PDF document', {
          document_name: name,
          error: errorMessage(error),
        });
      });
    }

    logger.debug('Document text extracted', {
      document_name: name,
      page_count: pages.length,
      ocr_pages: pages.filter((p) => p.method === 'ocr').length,
      failed_pages: pages.filter((p) => p.method === 'failed').length,
    });

    return { ok: true, value: pages };
  }

  /**
   * The abandoned page may still occupy the engine; later pages must not
   * queue behind it.
   */
  private async resetOcr(name: string): Promise<void> {
    if (!this.ocr.reset) return;
    try {
      await this.ocr.reset();
    } catch (error) {
      logger.warn('OCR engine reset failed', { document_name: name, error: errorMessage(error) });
    }
  }

  private async readPage(document: PdfDocument, pageNumber: number, name: string): Promise<PageText> {
    let page: PdfPage;
    try {
      page = await document.getPage(pageNumber);
    } catch (error) {
      logger.warn('Could not load PDF page', {
        document_name: name,
        page_number: pageNumber,
        error: errorMessage(error),
      });
      return { page_number: pageNumber, text: '', method: 'failed', error: errorMessage(error) };
    }

    let layerText = '';
    try {
      layerText = await page.extractText();
    } catch (error) {
      logger.debug('Text layer unreadable, using OCR', {
        document_name: name,
        page_number: pageNumber,
        error: errorMessage(error),
      });
    }

    if (layerText.trim().length > this.options.minPageTextChars) {
      return { page_number: pageNumber, text: layerText, method: 'text' };
    }

    const startTime = Date.now();
    try {
      const text = await withTimeout(
        page.renderImage(this.options.ocrDpi).then((image) => this.ocr.recognize(image)),
        this.options.ocrPageTimeoutMs,
        `OCR of page ${pageNumber}`
      );
      ocrDurationHistogram.observe({ status: 'success' }, (Date.now() - startTime) / 1000);
      return { page_number: pageNumber, text, method: 'ocr' };
    } catch (error) {
      ocrDurationHistogram.observe({ status: 'error' }, (Date.now() - startTime) / 1000);
      logger.warn('OCR failed', {
        document_name: name,
        page_number: pageNumber,
        error: errorMessage(error),
      });
      if (error instanceof TimeoutError) {
        await this.resetOcr(name);
      }
      return { page_number: pageNumber, text: '', method: 'failed', error: errorMessage(error) };
    }
  }
}
