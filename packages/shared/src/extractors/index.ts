/**
 * Extractors - text normalization and quote field parsing
 */

export { cleanNumber } from './text-normalizer';
export * from './quote';
