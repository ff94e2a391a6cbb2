/**
 * PDF Access
 *
 * pdfjs-dist backed PdfLoader. Text comes from the page's text layer;
 * rasterizing for OCR draws into an @napi-rs/canvas surface.
 */

import path from 'path';
import type { PDFDocumentProxy, PDFPageProxy } from 'pdfjs-dist';
import type { PdfDocument, PdfLoader, PdfPage } from './types';

type PdfJsModule = typeof import('pdfjs-dist/legacy/build/pdf.mjs');

/** PDF user space is 72 units per inch. */
const PDF_POINTS_PER_INCH = 72;

let pdfjsModule: Promise<PdfJsModule> | null = null;

/**
 * Load pdfjs on first use and point it at the worker bundled with the package.
 */
function loadPdfJs(): Promise<PdfJsModule> {
  if (!pdfjsModule) {
    pdfjsModule = import('pdfjs-dist/legacy/build/pdf.mjs').then((pdfjsLib) => {
      pdfjsLib.GlobalWorkerOptions.workerSrc = path.join(
        path.dirname(require.resolve('pdfjs-dist/package.json')),
        'legacy/build/pdf.worker.mjs'
      );
      return pdfjsLib;
    });
  }
  return pdfjsModule;
}

/** A positioned run of text: `transform[4]` is x, `transform[5]` is y. */
export interface PositionedText {
  str: string;
  transform: number[];
}

/**
 * Rebuild page text from text items, preserving line structure.
 *
 * Items are grouped by rounded Y position (text on the same visual line may
 * have slight Y variations), lines sorted top to bottom and items within a
 * line left to right.
 */
export function groupTextItems(items: readonly PositionedText[]): string {
  const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

  for (const item of items) {
    if (item.str.trim() === '') continue;

    const y = Math.round(item.transform[5]);
    const x = Math.round(item.transform[4]);

    const line = itemsByY.get(y);
    if (line) {
      line.push({ x, str: item.str });
    } else {
      itemsByY.set(y, [{ x, str: item.str }]);
    }
  }

  const lines: string[] = [];
  const sortedYPositions = Array.from(itemsByY.keys()).sort((a, b) => b - a);
  for (const y of sortedYPositions) {
    const lineItems = (itemsByY.get(y) ?? []).sort((a, b) => a.x - b.x);
    const lineText = lineItems.map((item) => item.str).join(' ').trim();
    if (lineText) {
      lines.push(lineText);
    }
  }

  return lines.join('\n');
}

async function readTextLayer(page: PDFPageProxy): Promise<string> {
  const textContent = await page.getTextContent();
  const items: PositionedText[] = [];
  for (const item of textContent.items) {
    if ('str' in item) items.push({ str: item.str, transform: item.transform });
  }
  return groupTextItems(items);
}

class PdfJsPage implements PdfPage {
  constructor(
    readonly pageNumber: number,
    private readonly page: PDFPageProxy
  ) {}

  extractText(): Promise<string> {
    return readTextLayer(this.page);
  }

  async renderImage(dpi: number): Promise<Buffer> {
    const { createCanvas } = await import('@napi-rs/canvas');
    const viewport = this.page.getViewport({ scale: dpi / PDF_POINTS_PER_INCH });
    const canvas = createCanvas(Math.ceil(viewport.width), Math.ceil(viewport.height));
    const context = canvas.getContext('2d');

    try {
      await this.page.render({ canvas: null, canvasContext: context, viewport }).promise;
    } finally {
      this.page.cleanup();
    }

    return canvas.toBuffer('image/png');
  }
}

class PdfJsDocument implements PdfDocument {
  constructor(private readonly pdf: PDFDocumentProxy) {}

  get pageCount(): number {
    return this.pdf.numPages;
  }

  async getPage(pageNumber: number): Promise<PdfPage> {
    const page = await this.pdf.getPage(pageNumber);
    return new PdfJsPage(pageNumber, page);
  }

  close(): Promise<void> {
    return this.pdf.destroy();
  }
}

export class PdfJsLoader implements PdfLoader {
  async open(content: Uint8Array): Promise<PdfDocument> {
    const pdfjsLib = await loadPdfJs();
    // pdfjs transfers the buffer it is given; hand it a copy
    const data = new Uint8Array(content);
    const pdf = await pdfjsLib.getDocument({ data, isEvalSupported: false }).promise;
    return new PdfJsDocument(pdf);
  }
}
