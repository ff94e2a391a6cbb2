/**
 * Cost Model
 *
 * Expected annual cost of a quote: the premium plus the member's share of
 * claims, capped at the out-of-pocket maximum.
 */

import type { QuoteRecord } from '../types';

/**
 * Member liability for one claim: the whole deductible layer, then the
 * coinsurance share of the amount above it.
 */
export function perClaimLiability(quote: QuoteRecord, avgClaimAmount: number): number {
  const deductible = quote.deductible || 0;
  const coinsurance = quote.coinsurance || 0;
  return deductible + coinsurance * Math.max(0, avgClaimAmount - deductible);
}

/**
 * The stated out-of-pocket maximum, or deductible + coinsurance x claim when
 * the quote states none.
 */
export function outOfPocketCap(quote: QuoteRecord, avgClaimAmount: number): number {
  if (quote.out_of_pocket_max) return quote.out_of_pocket_max;
  return (quote.deductible || 0) + (quote.coinsurance || 0) * avgClaimAmount;
}

export function expectedCost(
  quote: QuoteRecord,
  expectedClaims: number,
  avgClaimAmount: number
): number {
  const premium = quote.premium || 0;
  const claimsCost = expectedClaims * perClaimLiability(quote, avgClaimAmount);
  return premium + Math.min(claimsCost, outOfPocketCap(quote, avgClaimAmount));
}
