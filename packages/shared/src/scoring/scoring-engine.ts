/**
 * Scoring Engine
 *
 * Ranks a batch of quotes by a weighted blend of cost, coverage and network
 * scores. Coverage and network are scaled against the best quote in the
 * batch, so scores are only comparable within one ranking.
 */

import { EmptyBatchError } from '../errors';
import { logger } from '../logger';
import type { QuoteRecord, RankedQuote, WeightVector } from '../types';
import { expectedCost } from './cost-model';

export const DEFAULT_WEIGHTS: Readonly<WeightVector> = Object.freeze({
  cost: 0.6,
  coverage: 0.3,
  network: 0.1,
});

/** Expected cost at which cost_score is 0.5. */
export const COST_SCORE_SCALE = 100000;

const MIN_WEIGHT_SUM = 1e-9;

function weight(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value) || value < 0) return 0;
  return value;
}

/**
 * Scale weights to sum to 1. Negative or non-finite weights count as 0; an
 * all-zero vector becomes equal weights.
 */
export function normalizeWeights(weights: Partial<WeightVector> = DEFAULT_WEIGHTS): WeightVector {
  const cost = weight(weights.cost);
  const coverage = weight(weights.coverage);
  const network = weight(weights.network);
  const total = cost + coverage + network;

  if (total < MIN_WEIGHT_SUM) {
    return { cost: 1 / 3, coverage: 1 / 3, network: 1 / 3 };
  }

  return { cost: cost / total, coverage: coverage / total, network: network / total };
}

export function costScore(cost: number): number {
  return 1 / (1 + cost / COST_SCORE_SCALE);
}

/**
 * Rank quotes by composite score, best first. Equal scores keep input order.
 * Inputs are not modified.
 */
export function rank(
  quotes: readonly QuoteRecord[],
  expectedClaims: number,
  avgClaimAmount: number,
  weights: Partial<WeightVector> = DEFAULT_WEIGHTS
): RankedQuote[] {
  if (quotes.length === 0) {
    throw new EmptyBatchError();
  }

  const w = normalizeWeights(weights);
  const maxNetwork = quotes.reduce((max, q) => Math.max(max, q.network_size || 0), 0) || 1;
  const maxCoverage =
    quotes.reduce(
      (max, q) => Math.max(max, (q.coverage_limit || 0) + (q.annual_benefit_max || 0)),
      0
    ) || 1;

  const ranked = quotes.map((quote): RankedQuote => {
    const cost = expectedCost(quote, expectedClaims, avgClaimAmount);
    const cost_score = costScore(cost);
    // TODO: decide with product whether coverage_limit and annual_benefit_max
    // should be summed here, as they are for maxCoverage
    const coverage_score = (quote.coverage_limit || quote.annual_benefit_max || 0) / maxCoverage;
    const network_score = (quote.network_size || 0) / maxNetwork;
    const composite_score =
      w.cost * cost_score + w.coverage * coverage_score + w.network * network_score;

    return Object.freeze({
      ...quote,
      expected_annual_cost: cost,
      cost_score,
      coverage_score,
      network_score,
      composite_score,
    });
  });

  // Array.prototype.sort is stable
  ranked.sort((a, b) => b.composite_score - a.composite_score);

  logger.debug('Ranked quotes', {
    quote_count: ranked.length,
    weights: w,
    top_plan: ranked[0].plan_name,
  });

  return ranked;
}
