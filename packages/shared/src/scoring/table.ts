/**
 * Ranked table output
 */

import type { RankedQuote, RankedRow } from '../types';

export const RANKED_COLUMNS: ReadonlyArray<keyof RankedRow> = [
  'plan_name',
  'expected_annual_cost',
  'cost_score',
  'coverage_score',
  'network_score',
  'composite_score',
  'premium',
  'deductible',
  'coinsurance',
  'out_of_pocket_max',
  'coverage_limit',
  'annual_benefit_max',
  'network_size',
];

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

export function toRankedRow(quote: RankedQuote): RankedRow {
  return {
    plan_name: quote.plan_name,
    expected_annual_cost: roundTo(quote.expected_annual_cost, 2),
    cost_score: roundTo(quote.cost_score, 3),
    coverage_score: roundTo(quote.coverage_score, 3),
    network_score: roundTo(quote.network_score, 3),
    composite_score: roundTo(quote.composite_score, 3),
    premium: quote.premium,
    deductible: quote.deductible,
    coinsurance: quote.coinsurance,
    out_of_pocket_max: quote.out_of_pocket_max,
    coverage_limit: quote.coverage_limit ?? null,
    annual_benefit_max: quote.annual_benefit_max ?? null,
    network_size: quote.network_size ?? null,
  };
}

export function toRankedTable(ranked: readonly RankedQuote[]): RankedRow[] {
  return ranked.map(toRankedRow);
}

/**
 * Render rows as a Markdown table, columns in RANKED_COLUMNS order.
 */
export function toMarkdownTable(rows: readonly RankedRow[]): string {
  const lines = [
    `| ${RANKED_COLUMNS.join(' | ')} |`,
    `| ${RANKED_COLUMNS.map(() => '---').join(' | ')} |`,
  ];
  for (const row of rows) {
    lines.push(`| ${RANKED_COLUMNS.map((column) => String(row[column] ?? '')).join(' | ')} |`);
  }
  return lines.join('\n');
}
