/**
 * Local Glossary
 *
 * TF-IDF retrieval over a small insurance glossary. Unigrams and bigrams,
 * stop words removed, smoothed idf and l2-normalized vectors, so cosine
 * similarity is a dot product. No external API is involved.
 */

import fs from 'fs';
import path from 'path';
import { config } from '../config';
import { logger } from '../logger';

export interface GlossaryEntry {
  term: string;
  definition: string;
}

export interface GlossaryHit extends GlossaryEntry {
  score: number;
}

type SparseVector = Map<string, number>;

export const GLOSSARY_FALLBACK_ANSWER = "Please ask a term-specific question, e.g., 'What is deductible?'";

const TOKEN_PATTERN = /\b\w\w+\b/g;

export function tokenize(text: string, stopWords: ReadonlySet<string>): string[] {
  const words = (text.toLowerCase().match(TOKEN_PATTERN) ?? []).filter((w) => !stopWords.has(w));
  const bigrams: string[] = [];
  for (let i = 0; i + 1 < words.length; i++) {
    bigrams.push(`${words[i]} ${words[i + 1]}`);
  }
  return [...words, ...bigrams];
}

function termCounts(terms: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const term of terms) {
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }
  return counts;
}

function normalize(vector: SparseVector): SparseVector {
  let norm = 0;
  for (const value of vector.values()) norm += value * value;
  norm = Math.sqrt(norm);
  if (norm === 0) return vector;

  const result: SparseVector = new Map();
  for (const [term, value] of vector) result.set(term, value / norm);
  return result;
}

function dot(a: SparseVector, b: SparseVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let sum = 0;
  for (const [term, value] of small) {
    const other = large.get(term);
    if (other !== undefined) sum += value * other;
  }
  return sum;
}

export class LocalGlossary {
  private readonly idf = new Map<string, number>();
  private readonly vectors: SparseVector[];

  constructor(
    private readonly entries: readonly GlossaryEntry[],
    private readonly stopWords: ReadonlySet<string> = new Set()
  ) {
    const documents = entries.map((entry) => termCounts(tokenize(entry.definition, stopWords)));

    const documentFrequency = new Map<string, number>();
    for (const counts of documents) {
      for (const term of counts.keys()) {
        documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      }
    }

    const n = documents.length;
    for (const [term, df] of documentFrequency) {
      this.idf.set(term, Math.log((1 + n) / (1 + df)) + 1);
    }

    this.vectors = documents.map((counts) => this.weigh(counts));
  }

  get size(): number {
    return this.entries.length;
  }

  private weigh(counts: Map<string, number>): SparseVector {
    const vector: SparseVector = new Map();
    for (const [term, count] of counts) {
      const idf = this.idf.get(term);
      if (idf !== undefined) vector.set(term, count * idf);
    }
    return normalize(vector);
  }

  /**
   * Up to `k` entries most similar to the query, best first. Entries that
   * share no term with the query are not returned.
   */
  retrieve(query: string, k = 2): GlossaryHit[] {
    if (!query.trim() || k <= 0) return [];

    const queryVector = this.weigh(termCounts(tokenize(query, this.stopWords)));
    if (queryVector.size === 0) return [];

    return this.vectors
      .map((vector, index) => ({ index, score: dot(queryVector, vector) }))
      .filter((hit) => hit.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, k)
      .map(({ index, score }) => ({ ...this.entries[index], score }));
  }

  answer(query: string, k = 2): string {
    const hits = this.retrieve(query, k);
    if (hits.length === 0) return GLOSSARY_FALLBACK_ANSWER;
    return hits.map((hit) => hit.definition).join(' ');
  }
}

function isGlossaryEntry(value: unknown): value is GlossaryEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'term' in value &&
    'definition' in value &&
    typeof value.term === 'string' &&
    typeof value.definition === 'string'
  );
}

function readJsonFile(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

function resolveDataFile(fileName: string): string {
  const possiblePaths = [
    ...(config.dataPath ? [path.join(config.dataPath, fileName)] : []),
    path.join(__dirname, '../../data', fileName),
    path.join(process.cwd(), 'packages/shared/data', fileName),
  ];

  const found = possiblePaths.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new Error(`Data file not found: ${fileName}`);
  }
  return found;
}

export function loadGlossaryEntries(filePath: string): GlossaryEntry[] {
  const data = readJsonFile(filePath);
  if (!Array.isArray(data)) {
    throw new Error(`Glossary file must hold an array: ${filePath}`);
  }
  return data.filter(isGlossaryEntry).map((entry) => ({ term: entry.term, definition: entry.definition }));
}

export function loadStopWords(filePath: string): Set<string> {
  const data = readJsonFile(filePath);
  if (!Array.isArray(data)) {
    throw new Error(`Stop word file must hold an array: ${filePath}`);
  }
  return new Set(data.filter((word): word is string => typeof word === 'string'));
}

/**
 * Glossary built from glossary.json and stopwords.json in the data directory.
 */
export function loadDefaultGlossary(): LocalGlossary {
  const entries = loadGlossaryEntries(resolveDataFile('glossary.json'));
  const stopWords = loadStopWords(resolveDataFile('stopwords.json'));
  logger.debug('Glossary loaded', { entries: entries.length, stop_words: stopWords.size });
  return new LocalGlossary(entries, stopWords);
}
