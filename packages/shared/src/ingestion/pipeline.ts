/**
 * PDF Ingestion Pipeline
 *
 * documents -> page text -> field parsing -> QuoteRecord, one document at a
 * time. Every document ends in an outcome; a failure is logged and counted,
 * and the batch carries on with the next document.
 */

import path from 'path';
import { ulid } from 'ulid';
import { runWithContextAsync } from '../context';
import type { DocumentReader } from '../documents/types';
import { errorMessage } from '../errors';
import { parseFields } from '../extractors/quote/parser';
import { logger } from '../logger';
import { documentsProcessedCounter } from '../metrics';
import { createQuoteRecord } from '../quote';
import type {
  DocumentOutcome,
  IngestionReport,
  ParsedFields,
  QuoteRecord,
  SourceDocument,
} from '../types';

export type FieldParser = (text: string) => ParsedFields;

/**
 * Base name of a document with its extension removed: 'quotes/Gold.pdf' -> 'Gold'
 */
export function planNameFromDocument(name: string): string {
  return path.parse(path.basename(name)).name;
}

export class PdfIngestionPipeline {
  constructor(
    private readonly reader: DocumentReader,
    private readonly parse: FieldParser = parseFields
  ) {}

  /**
   * Records for every document that yielded at least one field, in input order.
   */
  async extractQuotes(documents: SourceDocument[]): Promise<QuoteRecord[]> {
    const report = await this.ingestDocuments(documents);
    return report.quotes;
  }

  async ingestDocuments(documents: SourceDocument[]): Promise<IngestionReport> {
    return runWithContextAsync({ batchId: ulid() }, async () => {
      logger.info('Ingesting documents', { document_count: documents.length });

      const quotes: QuoteRecord[] = [];
      const outcomes: DocumentOutcome[] = [];

      for (const [index, document] of documents.entries()) {
        const { outcome, quote } = await runWithContextAsync(
          { documentName: document.name },
          () => this.ingestDocument(document, index)
        );

        documentsProcessedCounter.inc({ status: outcome.status });
        outcomes.push(outcome);
        if (quote) quotes.push(quote);
      }

      logger.info('Ingestion complete', {
        document_count: documents.length,
        quote_count: quotes.length,
        skipped: outcomes.filter((o) => o.status === 'no_fields').length,
        failed: outcomes.filter((o) => o.status === 'failed').length,
      });

      return { quotes, documents: outcomes };
    });
  }

  private async ingestDocument(
    document: SourceDocument,
    index: number
  ): Promise<{ outcome: DocumentOutcome; quote?: QuoteRecord }> {
    try {
      logger.info('Processing document', { bytes: document.content.byteLength });

      const read = await this.reader.readDocument(document.content, document.name);
      if (!read.ok) {
        return {
          outcome: { name: document.name, status: 'failed', fields: {}, error: read.error },
        };
      }

      const text = read.value.map((page) => page.text).join('\n');
      const fields = this.parse(text);
      logger.info('Extracted fields', { fields });

      if (Object.keys(fields).length === 0) {
        logger.warn('No valid fields found');
        return { outcome: { name: document.name, status: 'no_fields', fields } };
      }

      const quote = createQuoteRecord(
        { ...fields, plan_name: planNameFromDocument(document.name) },
        index
      );

      return {
        outcome: { name: document.name, status: 'extracted', fields, plan_name: quote.plan_name },
        quote,
      };
    } catch (error) {
      logger.error('Error processing document', error);
      return {
        outcome: { name: document.name, status: 'failed', fields: {}, error: errorMessage(error) },
      };
    }
  }
}
