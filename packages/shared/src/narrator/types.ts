/**
 * Narrator Types
 *
 * A narrator turns a ranked table and a question into prose. It is optional:
 * everything upstream works without one.
 */

import type { CompareResponse, FamilyProfile, RankedRow } from '../types';

export interface NarrationRequest {
  table: RankedRow[];
  question: string;
  profile: FamilyProfile;
}

export interface Narrator {
  readonly name: string;
  narrate(request: NarrationRequest): Promise<string>;
}

export type ExplanationSource = CompareResponse['explanation_source'];

export interface Explanation {
  text: string;
  source: ExplanationSource;
}

export const DEFAULT_PROFILE: Readonly<FamilyProfile> = Object.freeze({
  region: 'United States',
  income_level: 'Middle',
  family_size: 4,
});
