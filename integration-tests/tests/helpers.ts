/**
 * Test Helpers
 *
 * In-process stand-ins for the PDF engine and OCR. A fake document is
 * addressed by its bytes: the UTF-8 content names an entry in the loader's
 * library.
 */

import type { AddressInfo } from 'net';
import type { Server } from 'http';
import type {
  OcrEngine,
  PdfDocument,
  PdfLoader,
  PdfPage,
  RankedRow,
  SourceDocument,
} from '@quote-compare/shared';

export interface FakePageSpec {
  /** Text layer content. */
  text?: string;
  textError?: string;
  /** What OCR will read from this page's image. */
  ocrText?: string;
  renderError?: string;
  loadError?: string;
}

class FakePdfPage implements PdfPage {
  constructor(
    readonly pageNumber: number,
    private readonly spec: FakePageSpec
  ) {}

  async extractText(): Promise<string> {
    if (this.spec.textError) throw new Error(this.spec.textError);
    return this.spec.text ?? '';
  }

  async renderImage(dpi: number): Promise<Buffer> {
    if (this.spec.renderError) throw new Error(this.spec.renderError);
    return Buffer.from(`${dpi}:${this.spec.ocrText ?? ''}`, 'utf-8');
  }
}

export class FakePdfLoader implements PdfLoader {
  closed = 0;

  constructor(private readonly library: Record<string, FakePageSpec[]>) {}

  async open(content: Uint8Array): Promise<PdfDocument> {
    const key = Buffer.from(content).toString('utf-8');
    if (!Object.prototype.hasOwnProperty.call(this.library, key)) {
      throw new Error('Invalid PDF structure');
    }
    const pages = this.library[key];

    return {
      pageCount: pages.length,
      getPage: async (pageNumber: number) => {
        const spec = pages[pageNumber - 1];
        if (spec.loadError) throw new Error(spec.loadError);
        return new FakePdfPage(pageNumber, spec);
      },
      close: async () => {
        this.closed++;
      },
    };
  }
}

/**
 * Reads back what FakePdfPage.renderImage wrote, minus the dpi prefix.
 */
export class FakeOcrEngine implements OcrEngine {
  readonly calls: number[] = [];
  failWith: string | null = null;
  hang = false;

  async recognize(image: Buffer): Promise<string> {
    const [dpi, ...rest] = image.toString('utf-8').split(':');
    this.calls.push(Number(dpi));
    if (this.hang) return new Promise<string>(() => undefined);
    if (this.failWith) throw new Error(this.failWith);
    return rest.join(':');
  }
}

export function fakeDocument(name: string, key: string): SourceDocument {
  return { name, content: Buffer.from(key, 'utf-8') };
}

export function rankedRow(overrides: Partial<RankedRow> = {}): RankedRow {
  return {
    plan_name: 'Gold',
    expected_annual_cost: 3800,
    cost_score: 0.963,
    coverage_score: 1,
    network_score: 0.5,
    composite_score: 0.928,
    premium: 1000,
    deductible: 500,
    coinsurance: 0.2,
    out_of_pocket_max: 3000,
    coverage_limit: 1000000,
    annual_benefit_max: null,
    network_size: 2000,
    ...overrides,
  };
}

export function baseUrlOf(server: Server): string {
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return `http://127.0.0.1:${address.port}`;
}

/**
 * Response body parsed as JSON, typed by the caller.
 */
export async function readJson<T>(response: Response): Promise<T> {
  return JSON.parse(await response.text());
}

/**
 * Runs one recognition at a time, like a single tesseract worker. Each job
 * takes the delay listed for the text it reads; reset drops the queue.
 */
export class SerialOcrEngine implements OcrEngine {
  resets = 0;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly delays: Record<string, number>) {}

  recognize(image: Buffer): Promise<string> {
    const text = image.toString('utf-8').split(':').slice(1).join(':');
    const job = this.queue
      .then(() => new Promise<void>((resolve) => setTimeout(resolve, this.delays[text] ?? 0)))
      .then(() => text);
    this.queue = job.catch(() => undefined);
    return job;
  }

  async reset(): Promise<void> {
    this.resets++;
    this.queue = Promise.resolve();
  }
}
