/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export interface Config {
  // HTTP
  port: number;

  // Narrator (OpenAI)
  openaiApiKey: string;
  narratorModel: string;
  narratorTemperature: number;
  narratorMaxTokens: number;
  narratorTimeoutMs: number;

  // Document text extraction
  minPageTextChars: number;
  ocrDpi: number;
  ocrLanguage: string;
  ocrLangPath: string;
  ocrPageTimeoutMs: number;

  // Scoring defaults
  defaultExpectedClaims: number;
  defaultAvgClaimAmount: number;
  defaultWeightCost: number;
  defaultWeightCoverage: number;
  defaultWeightNetwork: number;

  // File locations
  contractsPath: string;
  dataPath: string;
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const config: Config = {
  // HTTP
  port: parseInt(process.env.PORT || '8080', 10),

  // Narrator (OpenAI)
  openaiApiKey: process.env.OPENAI_API_KEY || '',
  narratorModel: process.env.NARRATOR_MODEL || 'gpt-4o-mini',
  narratorTemperature: parseNumber(process.env.NARRATOR_TEMPERATURE, 0.5),
  narratorMaxTokens: parseInt(process.env.NARRATOR_MAX_TOKENS || '750', 10),
  narratorTimeoutMs: parseInt(process.env.NARRATOR_TIMEOUT_MS || '60000', 10),

  // Document text extraction
  minPageTextChars: parseInt(process.env.MIN_PAGE_TEXT_CHARS || '50', 10),
  ocrDpi: parseInt(process.env.OCR_DPI || '300', 10),
  ocrLanguage: process.env.OCR_LANGUAGE || 'eng',
  ocrLangPath: process.env.OCR_LANG_PATH || '',
  ocrPageTimeoutMs: parseInt(process.env.OCR_PAGE_TIMEOUT_MS || '60000', 10),

  // Scoring defaults
  defaultExpectedClaims: parseInt(process.env.DEFAULT_EXPECTED_CLAIMS || '1', 10),
  defaultAvgClaimAmount: parseNumber(process.env.DEFAULT_AVG_CLAIM_AMOUNT, 50000),
  defaultWeightCost: parseNumber(process.env.WEIGHT_COST, 0.6),
  defaultWeightCoverage: parseNumber(process.env.WEIGHT_COVERAGE, 0.3),
  defaultWeightNetwork: parseNumber(process.env.WEIGHT_NETWORK, 0.1),

  // File locations
  contractsPath: process.env.CONTRACTS_PATH || '',
  dataPath: process.env.DATA_PATH || '',
};
