/**
 * Local glossary retrieval tests
 */

import { LocalGlossary, loadDefaultGlossary, tokenize, GLOSSARY_FALLBACK_ANSWER } from '@quote-compare/shared';

const STOP_WORDS = new Set(['the', 'is', 'you', 'before', 'of', 'a', 'what']);

const ENTRIES = [
  { term: 'Deductible', definition: 'The deductible is the amount you pay before the plan pays.' },
  { term: 'Premium', definition: 'The premium is the monthly price of the plan.' },
  { term: 'Network', definition: 'A network is the group of doctors.' },
];

describe('tokenize', () => {
  it('should produce unigrams then bigrams without stop words', () => {
    expect(tokenize('The out-of-pocket max', new Set(['the', 'of', 'out']))).toEqual([
      'pocket',
      'max',
      'pocket max',
    ]);
  });

  it('should ignore single characters', () => {
    expect(tokenize('a b cd', new Set())).toEqual(['cd']);
  });
});

describe('LocalGlossary', () => {
  const glossary = new LocalGlossary(ENTRIES, STOP_WORDS);

  it('should return only entries that share a term with the query', () => {
    const hits = glossary.retrieve('What is a deductible?');

    expect(hits).toHaveLength(1);
    expect(hits[0].term).toBe('Deductible');
    expect(hits[0].score).toBeGreaterThan(0);
    expect(hits[0].score).toBeLessThan(1);
  });

  it('should rank the more specific passage first', () => {
    // "plan" carries more weight in the shorter premium definition
    expect(glossary.retrieve('plan').map((hit) => hit.term)).toEqual(['Premium', 'Deductible']);
    expect(glossary.retrieve('plan', 1).map((hit) => hit.term)).toEqual(['Premium']);
  });

  it('should find nothing for unrelated or empty queries', () => {
    expect(glossary.retrieve('xyz')).toEqual([]);
    expect(glossary.retrieve('   ')).toEqual([]);
    expect(glossary.retrieve('the')).toEqual([]);
  });

  it('should answer with the matching definitions', () => {
    expect(glossary.answer('deductible')).toBe(ENTRIES[0].definition);
    expect(glossary.answer('plan')).toBe(`${ENTRIES[1].definition} ${ENTRIES[0].definition}`);
  });

  it('should ask for a term-specific question when nothing matches', () => {
    expect(glossary.answer('hello there')).toBe(GLOSSARY_FALLBACK_ANSWER);
  });
});

describe('loadDefaultGlossary', () => {
  it('should load the bundled glossary', () => {
    const glossary = loadDefaultGlossary();

    expect(glossary.size).toBe(14);
    expect(glossary.retrieve('What is coinsurance?', 1)[0].term).toBe('Coinsurance');
    expect(glossary.retrieve('deductible', 1)[0].term).toBe('Deductible');
  });
});
