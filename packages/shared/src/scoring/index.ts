export { expectedCost, perClaimLiability, outOfPocketCap } from './cost-model';
export {
  rank,
  normalizeWeights,
  costScore,
  DEFAULT_WEIGHTS,
  COST_SCORE_SCALE,
} from './scoring-engine';
export { toRankedRow, toRankedTable, toMarkdownTable, roundTo, RANKED_COLUMNS } from './table';
