/**
 * Deterministic summary used when no narrator answers.
 */

import type { FamilyProfile, RankedRow } from '../types';

function money(value: number): string {
  return `$${value.toLocaleString('en-US')}`;
}

function percent(fraction: number): string {
  return `${Math.round(fraction * 100)}%`;
}

/**
 * Highest composite score; the first such row on ties.
 */
export function topRow(table: readonly RankedRow[]): RankedRow | undefined {
  let best: RankedRow | undefined;
  for (const row of table) {
    if (!best || row.composite_score > best.composite_score) {
      best = row;
    }
  }
  return best;
}

export function buildLocalSummary(table: readonly RankedRow[], profile: FamilyProfile): string {
  const best = topRow(table);
  if (!best) {
    return 'No quotes available for analysis.';
  }

  const bullets = [
    `- **Best Plan:** ${best.plan_name}`,
    `- **Coverage Score:** ${best.coverage_score}`,
    `- **Deductible:** ${money(best.deductible)}`,
    `- **Coinsurance:** ${percent(best.coinsurance)}`,
    `- **Out-of-Pocket Max:** ${money(best.out_of_pocket_max)}`,
  ];

  return [
    '### Analysis',
    ...bullets,
    '',
    '### Recommended Plan',
    `**${best.plan_name}** is the most suitable option for a ${profile.income_level.toLowerCase()} income family of ${profile.family_size}. ` +
      'It balances coverage, deductible, and coinsurance most effectively.',
  ].join('\n');
}
