/**
 * Quote Document Extraction Patterns
 *
 * One rule per recognized label. Rules are evaluated independently against
 * the full document text and only the first match of each is used, which on
 * most quote sheets is the summary line.
 *
 * The numeric run may contain commas, spaces and line breaks: table cells in
 * PDF text often wrap a value across lines ("6\n500").
 */

import type { QuoteNumericField } from '../../types';
import { normalizeCoinsurance } from '../../quote';

export interface FieldRule {
  field: QuoteNumericField;
  /** Human-readable label, for diagnostics. */
  label: string;
  /** Case-insensitive, non-global; capture group 1 is the numeric run. */
  pattern: RegExp;
  postProcess?: (value: number) => number;
}

/**
 * Digits, commas and whitespace following a label and any non-digit filler
 */
const AMOUNT = String.raw`[^\d]*(\d[\d,\s]*)`;

function labelled(label: string): RegExp {
  return new RegExp(String.raw`\b(?:${label})${AMOUNT}`, 'i');
}

/**
 * Ordered list of field rules. When two rules target the same field the
 * earlier one wins if it matches.
 */
export const FIELD_RULES: readonly FieldRule[] = [
  {
    field: 'premium',
    label: 'annual premium | premium',
    pattern: labelled(String.raw`annual\s+premium|premium`),
  },
  {
    field: 'deductible',
    label: 'deductible',
    pattern: labelled('deductible'),
  },
  {
    field: 'coinsurance',
    label: 'coinsurance',
    pattern: /\bcoinsurance[^\d]*(\d+)%?/i,
    // 20 -> 0.2
    postProcess: normalizeCoinsurance,
  },
  {
    field: 'out_of_pocket_max',
    label: 'out of pocket [maximum | max]',
    pattern: labelled(String.raw`out[- ]?of[- ]?pocket(?:\s*maximum|\s*max)?`),
  },
  {
    field: 'coverage_limit',
    label: 'coverage limit | sum insured',
    pattern: labelled(String.raw`coverage\s*limit|sum\s*insured`),
  },
  {
    field: 'network_size',
    label: 'network size',
    pattern: labelled(String.raw`network\s*size`),
  },
];
