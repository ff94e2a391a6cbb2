/**
 * Explanation with local fallback
 */

import { errorMessage } from '../errors';
import { logger } from '../logger';
import { narratorRequestsCounter } from '../metrics';
import type { FamilyProfile, RankedRow } from '../types';
import { buildLocalSummary } from './local-summary';
import type { Explanation, Narrator } from './types';

/**
 * Ask the narrator to explain the ranking. With no narrator or an empty
 * table, and whenever the narrator fails or says nothing, answer with the
 * local summary instead.
 */
export async function explainRanking(
  table: RankedRow[],
  question: string,
  profile: FamilyProfile,
  narrator: Narrator | null
): Promise<Explanation> {
  if (!narrator || table.length === 0) {
    narratorRequestsCounter.inc({ source: 'local', status: 'success' });
    return { text: buildLocalSummary(table, profile), source: 'local' };
  }

  try {
    const text = await narrator.narrate({ table, question, profile });
    if (!text.trim()) {
      throw new Error('Narrator returned no text');
    }
    narratorRequestsCounter.inc({ source: 'narrator', status: 'success' });
    return { text, source: 'narrator' };
  } catch (error) {
    narratorRequestsCounter.inc({ source: 'narrator', status: 'error' });
    logger.warn('Narrator unavailable, using local summary', {
      narrator: narrator.name,
      error: errorMessage(error),
    });
    return { text: buildLocalSummary(table, profile), source: 'local' };
  }
}
