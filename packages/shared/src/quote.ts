/**
 * QuoteRecord construction
 */

import type { QuoteInput, QuoteRecord } from './types';

export const DEFAULT_COINSURANCE = 0.2;

/**
 * Coinsurance above 1 is a percentage (20 -> 0.2). Results are capped at 1,
 * so applying this twice gives the same value.
 */
export function normalizeCoinsurance(value: number): number {
  if (value > 1) return Math.min(value / 100, 1);
  return value;
}

function amount(value: number | null | undefined): number {
  if (value === null || value === undefined || !Number.isFinite(value) || value < 0) {
    return 0;
  }
  return value;
}

function optionalAmount(value: number | null | undefined): number | undefined {
  if (value === null || value === undefined || !Number.isFinite(value)) return undefined;
  return Math.max(0, value);
}

/**
 * Build an immutable QuoteRecord, applying field defaults.
 *
 * @param placeholderIndex - zero-based position used for the `Plan N` name
 *   when the input has none
 */
export function createQuoteRecord(input: QuoteInput, placeholderIndex = 0): QuoteRecord {
  const name = input.plan_name?.trim();
  const coinsurance =
    input.coinsurance === null || input.coinsurance === undefined || !Number.isFinite(input.coinsurance)
      ? DEFAULT_COINSURANCE
      : normalizeCoinsurance(Math.max(0, input.coinsurance));

  const record: QuoteRecord = {
    plan_name: name ? name : `Plan ${placeholderIndex + 1}`,
    premium: amount(input.premium),
    deductible: amount(input.deductible),
    coinsurance,
    out_of_pocket_max: amount(input.out_of_pocket_max),
    coverage_limit: optionalAmount(input.coverage_limit),
    annual_benefit_max: optionalAmount(input.annual_benefit_max),
    network_size: optionalAmount(input.network_size),
  };

  return Object.freeze(record);
}
