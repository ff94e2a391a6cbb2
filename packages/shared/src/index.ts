/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Errors
export {
  QuoteCompareError,
  ValidationError,
  EmptyBatchError,
  UnsupportedFormatError,
  TabularParseError,
  isQuoteCompareError,
  errorMessage,
} from './errors';

// Types
export * from './types';

// Quote records
export { createQuoteRecord, normalizeCoinsurance, DEFAULT_COINSURANCE } from './quote';

// Metrics
export {
  register,
  documentsProcessedCounter,
  pagesProcessedCounter,
  ocrDurationHistogram,
  tabularFilesCounter,
  narratorRequestsCounter,
  narratorRequestDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  parseCompareRequest,
  parseExtractRequest,
  parseParseRequest,
  validateTabularRows,
  type ValidationResult,
} from './schemas';

// Field extraction
export * from './extractors';

// Document text (PDF text layer + OCR)
export * from './documents';

// Ingestion
export * from './ingestion';

// Scoring
export * from './scoring';

// Tabular quote files
export * from './tabular';

// Narration
export * from './narrator';

// Glossary
export * from './glossary';
