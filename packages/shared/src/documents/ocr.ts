/**
 * OCR Engine
 *
 * tesseract.js backed OcrEngine. One worker is created lazily and reused for
 * every page; a worker that failed to start is retried on the next page.
 */

import path from 'path';
import { createWorker, type Worker } from 'tesseract.js';
import { errorMessage } from '../errors';
import { logger } from '../logger';
import type { OcrEngine } from './types';

export interface TesseractOptions {
  language: string;
  /** Directory or URL holding <language>.traineddata; defaults to the installed @tesseract.js-data package. */
  langPath?: string;
}

/** Tesseract LSTM engine mode */
const OEM_LSTM_ONLY = 1;

/** Model folder inside each @tesseract.js-data/<language> package. */
const BUNDLED_MODEL_DIR = '4.0.0_best_int';

/**
 * Directory of the installed @tesseract.js-data package for `language`, or
 * undefined when it is not installed.
 */
export function bundledLangPath(language: string): string | undefined {
  try {
    const manifest = require.resolve(`@tesseract.js-data/${language}/package.json`);
    return path.join(path.dirname(manifest), BUNDLED_MODEL_DIR);
  } catch (error) {
    logger.debug('No bundled OCR language data', { language, error: errorMessage(error) });
    return undefined;
  }
}

export class TesseractOcrEngine implements OcrEngine {
  private worker: Promise<Worker> | null = null;

  constructor(private readonly options: TesseractOptions) {}

  private getWorker(): Promise<Worker> {
    if (!this.worker) {
      const langPath = this.options.langPath || bundledLangPath(this.options.language);
      logger.info('Starting OCR worker', { language: this.options.language, lang_path: langPath });
      const pending = createWorker(this.options.language, OEM_LSTM_ONLY, langPath ? { langPath } : {});
      pending.catch(() => {
        if (this.worker === pending) this.worker = null;
      });
      this.worker = pending;
    }
    return this.worker;
  }

  async recognize(image: Buffer): Promise<string> {
    const worker = await this.getWorker();
    const { data } = await worker.recognize(image);
    return data.text;
  }

  /**
   * Terminate the worker, abandoning any job it is running. The next page
   * starts a new one.
   */
  async reset(): Promise<void> {
    if (!this.worker) return;
    const pending = this.worker;
    this.worker = null;
    try {
      const worker = await pending;
      await worker.terminate();
    } catch (error) {
      logger.warn('OCR worker shutdown failed', { error: errorMessage(error) });
    }
  }

  close(): Promise<void> {
    return this.reset();
  }
}
