// src/analysis/normalize.ts
// Turns repaired model output into the fixed result shapes.
//
// Missing keys and values of the wrong type become the documented default
// for that field; nothing here throws.

import { isJsonObject, type JsonObject, type JsonValue } from '../ai/jsonRepair';
import {
  CLAUSE_DETAIL_DEFAULTS,
  MISSING_LABELS,
  localize,
  type ClauseDetailText,
  type Language,
} from '../ai/localization';
import { CONTRACT_KIND_LABELS } from '../ai/extractors/entityExtractor';
import { extractClauses } from '../ai/extractors/clauseExtractor';
import {
  type Clause,
  type ClauseDetail,
  type ClauseRiskLevel,
  type ComplianceResult,
  type ComplianceViolation,
  type ContractAnalysis,
  type DetailedRisk,
  type DetectedRiskFlag,
  type RiskAssessment,
  type RiskLevel,
} from '../types/analysis';

/* ============= Primitives ============= */

function nonEmptyString(v: JsonValue | undefined): string | undefined {
  return typeof v === 'string' && v.trim() ? v.trim() : undefined;
}

function normalizeStringList(v: JsonValue | undefined): string[] {
  if (!Array.isArray(v)) return [];
  const out: string[] = [];
  for (const item of v) {
    const s = nonEmptyString(item);
    if (s) out.push(s);
  }
  return out;
}

const RISK_LEVELS: Readonly<Record<string, RiskLevel>> = {
  high: 'High',
  medium: 'Medium',
  low: 'Low',
};

/** Case-insensitive "High" / "Medium" / "Low"; anything else is undefined. */
export function normalizeRiskLevel(v: JsonValue | undefined): RiskLevel | undefined {
  return typeof v === 'string' ? RISK_LEVELS[v.trim().toLowerCase()] : undefined;
}

/* ============= Contract Analysis ============= */

/** "Role: Name" from a string or a { role, name } object. */
function normalizeParty(v: JsonValue): string | undefined {
  if (typeof v === 'string') return nonEmptyString(v);
  if (!isJsonObject(v)) return undefined;

  const name = nonEmptyString(v.name);
  if (!name) return undefined;
  const role = nonEmptyString(v.role);
  return role ? `${role}: ${name}` : name;
}

function normalizeClause(v: JsonValue): Clause | undefined {
  if (!isJsonObject(v)) return undefined;
  const riskLevel: ClauseRiskLevel = normalizeRiskLevel(v.risk_level) ?? 'Unknown';
  return {
    type: nonEmptyString(v.type) ?? 'Unknown',
    risk_level: riskLevel,
    explanation: nonEmptyString(v.explanation) ?? '',
  };
}

export function normalizeContractAnalysis(
  raw: JsonObject,
  text: string,
  language: Language
): ContractAnalysis {
  const parties: string[] = [];
  if (Array.isArray(raw.parties)) {
    for (const p of raw.parties) {
      const party = normalizeParty(p);
      if (party) parties.push(party);
    }
  }

  const clauses: Clause[] = [];
  if (Array.isArray(raw.clauses)) {
    for (const c of raw.clauses) {
      const clause = normalizeClause(c);
      if (clause) clauses.push(clause);
    }
  }

  return {
    contract_type:
      nonEmptyString(raw.contract_type) ?? localize(CONTRACT_KIND_LABELS.unknown, language),
    parties,
    dates: normalizeStringList(raw.dates),
    amounts: normalizeStringList(raw.amounts),
    // Model found no clauses: fall back to the rule table over the full text
    clauses: clauses.length > 0 ? clauses : extractClauses(text, language),
  };
}

/* ============= Risk Assessment ============= */

export const DEFAULT_RISK_SCORE = 50;

export function defaultDetectedRisks(): Record<DetectedRiskFlag, boolean> {
  return {
    penalty_clause: false,
    indemnity_present: false,
    unilateral_termination: false,
    auto_renewal: false,
    liability_cap_missing: false,
    non_compete_present: false,
    ip_transfer_present: false,
  };
}

/** Integer 0–100; non-numeric input gives the default score. */
export function normalizeScore(v: JsonValue | undefined): number {
  if (typeof v !== 'number' || !Number.isFinite(v)) return DEFAULT_RISK_SCORE;
  return Math.min(100, Math.max(0, Math.round(v)));
}

function normalizeDetectedRisks(v: JsonValue | undefined): Record<string, boolean> {
  const flags: Record<string, boolean> = defaultDetectedRisks();
  if (!isJsonObject(v)) return flags;
  for (const [key, value] of Object.entries(v)) {
    if (typeof value === 'boolean') flags[key] = value;
  }
  return flags;
}

function normalizeDetailedRisks(v: JsonValue | undefined, language: Language): DetailedRisk[] {
  if (!Array.isArray(v)) return [];
  const out: DetailedRisk[] = [];
  for (const item of v) {
    if (!isJsonObject(item)) continue;
    const category = nonEmptyString(item.category);
    const description = nonEmptyString(item.description);
    if (!category && !description) continue;
    out.push({
      category: category ?? localize(MISSING_LABELS.riskCategory, language),
      description: description ?? '',
    });
  }
  return out;
}

export function normalizeRiskAssessment(raw: JsonObject, language: Language): RiskAssessment {
  return {
    overall_score: normalizeScore(raw.overall_score),
    legal_risk: normalizeRiskLevel(raw.legal_risk) ?? 'Medium',
    financial_risk: normalizeRiskLevel(raw.financial_risk) ?? 'Medium',
    compliance_risk: normalizeRiskLevel(raw.compliance_risk) ?? 'Medium',
    detected_risks: normalizeDetectedRisks(raw.detected_risks),
    detailed_risks: normalizeDetailedRisks(raw.detailed_risks, language),
  };
}

/* ============= Compliance ============= */

function normalizeViolations(v: JsonValue | undefined, language: Language): ComplianceViolation[] {
  if (!Array.isArray(v)) return [];
  const out: ComplianceViolation[] = [];
  for (const item of v) {
    if (!isJsonObject(item)) continue;
    const law = nonEmptyString(item.law);
    const issue = nonEmptyString(item.issue);
    if (!law && !issue) continue;
    out.push({ law: law ?? localize(MISSING_LABELS.law, language), issue: issue ?? '' });
  }
  return out;
}

export function normalizeComplianceResult(raw: JsonObject, language: Language): ComplianceResult {
  return {
    is_compliant: typeof raw.is_compliant === 'boolean' ? raw.is_compliant : true,
    applicable_laws: normalizeStringList(raw.applicable_laws),
    violations: normalizeViolations(raw.violations, language),
    recommendations: normalizeStringList(raw.recommendations),
  };
}

/* ============= Clause Detail ============= */

export function localizeClauseDetail(text: ClauseDetailText, language: Language): ClauseDetail {
  return {
    explanation: localize(text.explanation, language),
    issues: localize(text.issues, language),
    recommendations: localize(text.recommendations, language),
    applicable_laws: localize(text.applicable_laws, language),
  };
}

/** Strings pass through; lists of strings are joined one per line. */
function normalizeText(v: JsonValue | undefined): string | undefined {
  if (Array.isArray(v)) {
    const lines = normalizeStringList(v);
    return lines.length > 0 ? lines.join('\n') : undefined;
  }
  return nonEmptyString(v);
}

export function normalizeClauseDetail(raw: JsonObject, language: Language): ClauseDetail {
  const defaults = localizeClauseDetail(CLAUSE_DETAIL_DEFAULTS, language);
  return {
    explanation: normalizeText(raw.explanation) ?? defaults.explanation,
    issues: normalizeText(raw.issues) ?? defaults.issues,
    recommendations: normalizeText(raw.recommendations) ?? defaults.recommendations,
    applicable_laws: normalizeText(raw.applicable_laws) ?? defaults.applicable_laws,
  };
}
