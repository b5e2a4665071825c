// src/ai/extractors/clauseExtractor.ts
// Rule-based clause detection: literal phrase matching against CLAUSE_RULES.
// Used when the model returns no clauses, and by the regex fallback extractor.

import type { Clause } from '../../types/analysis';
import { DEFAULT_LANGUAGE, localize, type Language } from '../localization';
import { CLAUSE_RULES, type ClauseRule } from './clauseRules';

/** Only the head of a document is scanned. */
export const CLAUSE_SCAN_LIMIT = 10_000;

/**
 * Detect known clause types in contract text.
 *
 * Case-insensitive. At most one clause per type, in table order (not text order).
 *
 * @example
 * extractClauses('The Employee shall not join a competing business.')
 * // → [{ type: 'Non-Compete', risk_level: 'High', explanation: '...' }]
 */
export function extractClauses(
  text: string,
  language: Language = DEFAULT_LANGUAGE,
  rules: readonly ClauseRule[] = CLAUSE_RULES
): Clause[] {
  const haystack = text.slice(0, CLAUSE_SCAN_LIMIT).toLowerCase();
  const clauses: Clause[] = [];

  for (const rule of rules) {
    if (!rule.phrases.some((phrase) => haystack.includes(phrase))) continue;
    clauses.push({
      type: localize(rule.label, language),
      risk_level: rule.riskLevel,
      explanation: localize(rule.explanation, language),
    });
  }

  return clauses;
}
