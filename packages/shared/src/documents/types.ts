/**
 * Document Reading Types
 *
 * Seams between page text acquisition and the libraries behind it, so the
 * PDF engine and the OCR engine can be swapped or faked.
 */

import type { Outcome, PageText } from '../types';

export interface PdfPage {
  readonly pageNumber: number;
  /** Text recovered from the page's text layer, lines separated by '\n'. */
  extractText(): Promise<string>;
  /** Rasterize the page to a PNG at the given resolution. */
  renderImage(dpi: number): Promise<Buffer>;
}

export interface PdfDocument {
  readonly pageCount: number;
  getPage(pageNumber: number): Promise<PdfPage>;
  close(): Promise<void>;
}

export interface PdfLoader {
  open(content: Uint8Array): Promise<PdfDocument>;
}

export interface OcrEngine {
  recognize(image: Buffer): Promise<string>;
  /** Abandon queued and running work; later calls start fresh. */
  reset?(): Promise<void>;
  close?(): Promise<void>;
}

/**
 * Anything that turns document bytes into per-page text. A document that
 * cannot be opened is a failed outcome, never a rejection.
 */
export interface DocumentReader {
  readDocument(content: Uint8Array, name: string): Promise<Outcome<PageText[]>>;
}
