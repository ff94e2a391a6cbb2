/**
 * Prometheus Metrics
 *
 * Metrics for document ingestion, OCR, narration and the HTTP API.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Ingestion Metrics
// ============================================================================

export const documentsProcessedCounter = new promClient.Counter({
  name: 'quote_compare_documents_processed_total',
  help: 'Total number of documents processed by the ingestion pipeline',
  labelNames: ['status'],
  registers: [register],
});

export const pagesProcessedCounter = new promClient.Counter({
  name: 'quote_compare_pages_processed_total',
  help: 'Total number of PDF pages read, by how their text was obtained',
  labelNames: ['method'],
  registers: [register],
});

export const ocrDurationHistogram = new promClient.Histogram({
  name: 'quote_compare_ocr_duration_seconds',
  help: 'Duration of rendering and recognizing one page',
  labelNames: ['status'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

export const tabularFilesCounter = new promClient.Counter({
  name: 'quote_compare_tabular_files_total',
  help: 'Total number of tabular quote files parsed',
  labelNames: ['format', 'status'],
  registers: [register],
});

// ============================================================================
// Narrator Metrics
// ============================================================================

export const narratorRequestsCounter = new promClient.Counter({
  name: 'quote_compare_narrator_requests_total',
  help: 'Total number of explanation requests, by who answered them',
  labelNames: ['source', 'status'],
  registers: [register],
});

export const narratorRequestDurationHistogram = new promClient.Histogram({
  name: 'quote_compare_narrator_request_duration_seconds',
  help: 'Duration of LLM narrator requests',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'quote_compare_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'quote_compare_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
