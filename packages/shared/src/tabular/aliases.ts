/**
 * Column aliases for tabular quote files
 *
 * Keys are lower-cased, trimmed column names; values are QuoteRecord fields.
 */

import type { QuoteField } from '../types';

export const COLUMN_ALIASES: Readonly<Record<string, QuoteField>> = Object.freeze({
  plan_name: 'plan_name',
  plan: 'plan_name',
  name: 'plan_name',
  premium: 'premium',
  annual_premium: 'premium',
  deductible: 'deductible',
  coinsurance: 'coinsurance',
  coin: 'coinsurance',
  oop_max: 'out_of_pocket_max',
  out_of_pocket_max: 'out_of_pocket_max',
  coverage_limit: 'coverage_limit',
  sum_insured: 'coverage_limit',
  annual_benefit_max: 'annual_benefit_max',
  network_size: 'network_size',
  network: 'network_size',
});

/**
 * Canonical field for a column name, or the name itself when unrecognized.
 */
export function canonicalColumn(column: string): string {
  const key = column.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(COLUMN_ALIASES, key) ? COLUMN_ALIASES[key] : column;
}
