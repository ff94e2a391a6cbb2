/**
 * Ranked table and Markdown rendering tests
 */

import {
  createQuoteRecord,
  rank,
  toRankedTable,
  toMarkdownTable,
  roundTo,
  RANKED_COLUMNS,
} from '@quote-compare/shared';
import { rankedRow } from './helpers';

describe('toRankedTable', () => {
  it('should round scores to 3 decimals and cost to 2', () => {
    const quotes = [
      createQuoteRecord({
        plan_name: 'Gold',
        premium: 1000,
        deductible: 500,
        coinsurance: 0.2,
        out_of_pocket_max: 3000,
        coverage_limit: 1000000,
        network_size: 2000,
      }),
      createQuoteRecord({
        plan_name: 'Silver',
        premium: 2000,
        deductible: 0,
        coinsurance: 0.1,
        out_of_pocket_max: 2000,
        coverage_limit: 500000,
        network_size: 4000,
      }),
    ];

    const [gold, silver] = toRankedTable(rank(quotes, 2, 5000));

    expect(gold).toEqual(rankedRow());
    expect(silver).toEqual({
      plan_name: 'Silver',
      expected_annual_cost: 3000,
      cost_score: 0.971,
      coverage_score: 0.5,
      network_score: 1,
      composite_score: 0.833,
      premium: 2000,
      deductible: 0,
      coinsurance: 0.1,
      out_of_pocket_max: 2000,
      coverage_limit: 500000,
      annual_benefit_max: null,
      network_size: 4000,
    });
  });

  it('should list columns in output order', () => {
    const [row] = toRankedTable(rank([createQuoteRecord({})], 1, 5000));
    expect(Object.keys(row)).toEqual([...RANKED_COLUMNS]);
  });
});

describe('roundTo', () => {
  it('should round half up', () => {
    expect(roundTo(1.005, 2)).toBe(1.01);
    expect(roundTo(0.9635, 3)).toBe(0.964);
    expect(roundTo(2, 3)).toBe(2);
  });
});

describe('toMarkdownTable', () => {
  it('should render a header, separator and one line per row', () => {
    const markdown = toMarkdownTable([rankedRow()]);

    expect(markdown.split('\n')).toEqual([
      '| plan_name | expected_annual_cost | cost_score | coverage_score | network_score | composite_score | premium | deductible | coinsurance | out_of_pocket_max | coverage_limit | annual_benefit_max | network_size |',
      '| --- | --- | --- | --- | --- | --- | --- | --- | --- | --- | --- | --- | --- |',
      '| Gold | 3800 | 0.963 | 1 | 0.5 | 0.928 | 1000 | 500 | 0.2 | 3000 | 1000000 |  | 2000 |',
    ]);
  });

  it('should render only the header for no rows', () => {
    expect(toMarkdownTable([]).split('\n')).toHaveLength(2);
  });
});
