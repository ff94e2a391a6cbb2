/**
 * Quote Document Parser
 *
 * Best-effort recovery of quote fields from unstructured document text.
 * A missing field is acceptable; callers apply defaults.
 */

import type { ParsedFields } from '../../types';
import { cleanNumber } from '../text-normalizer';
import { FIELD_RULES, type FieldRule } from './patterns';

/**
 * Parse key insurance fields from text.
 */
export function parseFields(
  text: string,
  rules: readonly FieldRule[] = FIELD_RULES
): ParsedFields {
  const fields: ParsedFields = {};
  if (!text) return fields;

  for (const rule of rules) {
    if (fields[rule.field] !== undefined) continue;

    const match = rule.pattern.exec(text);
    if (!match || match[1] === undefined) continue;

    // Rejoin values split across lines, e.g. '6\n500'
    const combined = match[1].replace(/\s+/g, '');
    const value = cleanNumber(combined);
    fields[rule.field] = rule.postProcess ? rule.postProcess(value) : value;
  }

  return fields;
}

/**
 * Summary of the configured rules
 */
export function describeFieldRules(
  rules: readonly FieldRule[] = FIELD_RULES
): Array<{ field: string; label: string }> {
  return rules.map((rule) => ({ field: rule.field, label: rule.label }));
}
