/**
 * Shared TypeScript Types
 *
 * Types for the quote comparison pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Quotes
// ============================================================================

/** Numeric fields a quote can carry. */
export type QuoteNumericField =
  | 'premium'
  | 'deductible'
  | 'coinsurance'
  | 'out_of_pocket_max'
  | 'coverage_limit'
  | 'annual_benefit_max'
  | 'network_size';

export type QuoteField = 'plan_name' | QuoteNumericField;

/** One insurance quote. Amounts are annual. */
export interface QuoteRecord {
  readonly plan_name: string;
  readonly premium: number;
  readonly deductible: number;
  /** Fraction in [0, 1] paid by the insured after the deductible. */
  readonly coinsurance: number;
  readonly out_of_pocket_max: number;
  readonly coverage_limit?: number;
  readonly annual_benefit_max?: number;
  readonly network_size?: number;
}

/** Loose input for building a QuoteRecord; every field is optional. */
export type QuoteInput = Partial<Record<QuoteNumericField, number | null>> & {
  plan_name?: string | null;
};

/** Field values recovered from document text. */
export type ParsedFields = Partial<Record<QuoteNumericField, number>>;

// ============================================================================
// Scoring
// ============================================================================

export interface WeightVector {
  cost: number;
  coverage: number;
  network: number;
}

export interface RankedQuote extends QuoteRecord {
  readonly expected_annual_cost: number;
  readonly cost_score: number;
  readonly coverage_score: number;
  readonly network_score: number;
  readonly composite_score: number;
}

/** Output table row: rounded scores, absent optional fields as null. */
export interface RankedRow {
  plan_name: string;
  expected_annual_cost: number;
  cost_score: number;
  coverage_score: number;
  network_score: number;
  composite_score: number;
  premium: number;
  deductible: number;
  coinsurance: number;
  out_of_pocket_max: number;
  coverage_limit: number | null;
  annual_benefit_max: number | null;
  network_size: number | null;
}

export interface ClaimsAssumption {
  expectedClaims: number;
  avgClaimAmount: number;
}

// ============================================================================
// Family profile (narrator context)
// ============================================================================

export interface FamilyProfile {
  region: string;
  income_level: string;
  family_size: number;
  ages?: number[];
}

// ============================================================================
// Documents & ingestion
// ============================================================================

export interface SourceDocument {
  /** Display name, usually the original filename. */
  name: string;
  content: Uint8Array;
}

export type PageExtractionMethod = 'text' | 'ocr' | 'failed';

export interface PageText {
  page_number: number;
  text: string;
  method: PageExtractionMethod;
  error?: string;
}

/** Either a value or a recorded failure for one unit of work. */
export type Outcome<T> = { ok: true; value: T } | { ok: false; error: string };

export type DocumentStatus = 'extracted' | 'no_fields' | 'failed';

export interface DocumentOutcome {
  name: string;
  status: DocumentStatus;
  fields: ParsedFields;
  plan_name?: string;
  error?: string;
}

export interface IngestionReport {
  quotes: QuoteRecord[];
  documents: DocumentOutcome[];
}

// ============================================================================
// API Types
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}

export interface CompareRequest {
  quotes: QuoteInput[];
  expected_claims?: number;
  avg_claim_amount?: number;
  weights?: Partial<WeightVector>;
  question?: string;
  profile?: Partial<FamilyProfile>;
}

export interface CompareResponse {
  ranked: RankedRow[];
  markdown: string;
  explanation: string;
  /** Who wrote the explanation: the narrator, or the local summary. */
  explanation_source: 'narrator' | 'local';
}

export interface ExtractRequest {
  documents: Array<{ name: string; content_base64: string }>;
}

export interface ParseRequest {
  filename: string;
  content_base64: string;
}
