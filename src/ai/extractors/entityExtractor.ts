// src/ai/extractors/entityExtractor.ts
// Regex fallback extraction: contract type, parties, dates, amounts.
//
// Runs without the model. Used when the model call fails or its response
// cannot be repaired, so output must always be fully populated.

import type { Clause, ContractAnalysis } from '../../types/analysis';
import {
  DEFAULT_LANGUAGE,
  GENERAL_TERMS_CLAUSE,
  NO_AMOUNTS_FOUND,
  NO_DATES_FOUND,
  NO_PARTIES_FOUND,
  localize,
  type Language,
  type LocalizedText,
} from '../localization';
import { extractClauses } from './clauseExtractor';

/* ============= Contract Type ============= */

export type ContractKind = 'employment' | 'service' | 'nda' | 'sale' | 'unknown';

export const CONTRACT_KIND_LABELS: Readonly<Record<ContractKind, LocalizedText>> = {
  employment: { english: 'Employment Agreement', hindi: 'रोजगार समझौता' },
  service: { english: 'Service Agreement', hindi: 'सेवा समझौता' },
  nda: { english: 'Non-Disclosure Agreement', hindi: 'गोपनीयता समझौता' },
  sale: { english: 'Sale/Purchase Agreement', hindi: 'बिक्री/खरीद समझौता' },
  unknown: { english: 'Unknown', hindi: 'अज्ञात' },
};

const TYPE_SCAN_LIMIT = 500;

// Priority order; first hit wins. Plain substring tests, so "NDA" also
// matches inside words such as "STANDARD".
const CONTRACT_KIND_MARKERS: ReadonlyArray<[ContractKind, readonly string[]]> = [
  ['employment', ['EMPLOYMENT']],
  ['service', ['SERVICE']],
  ['nda', ['NON-DISCLOSURE', 'NDA']],
  ['sale', ['SALE', 'PURCHASE']],
];

export function detectContractKind(text: string): ContractKind {
  const head = text.slice(0, TYPE_SCAN_LIMIT).toUpperCase();
  for (const [kind, markers] of CONTRACT_KIND_MARKERS) {
    if (markers.some((m) => head.includes(m))) return kind;
  }
  return 'unknown';
}

/* ============= Helpers ============= */

const MAX_AMOUNTS = 5;
const MAX_DATES = 5;
const MAX_COMPANIES = 3;
const MAX_PERSONS = 3;

function uniqueCapped(values: Iterable<string>, cap: number): string[] {
  const out: string[] = [];
  for (const v of values) {
    if (out.length >= cap) break;
    if (!out.includes(v)) out.push(v);
  }
  return out;
}

/* ============= Amounts ============= */

const CURRENCY = String.raw`INR|USD|EUR|GBP|Rs`;
const AMOUNT = String.raw`\b(?:INR|USD|EUR|GBP|Rs\.?)\s*\d+(?:,\d+)*(?:\.\d+)?(?:\s*(?:per|\/-|\/)\s*\w+)?`;
// Context never runs into the next currency code, so each window holds one figure
const CONTEXT = String.raw`(?:(?!${CURRENCY})[\w ]){0,30}`;

const AMOUNT_RE = new RegExp(AMOUNT, 'g');
const AMOUNT_IN_CONTEXT_RE = new RegExp(`${CONTEXT}(${AMOUNT})${CONTEXT}`, 'g');

/**
 * Currency-code amounts ("INR 1,50,000 per month", "USD 2000").
 * The first pass reads each figure with up to 30 characters of context on
 * either side; a bare scan runs only when that finds nothing.
 */
export function extractAmounts(text: string): string[] {
  const amounts = uniqueCapped(
    Array.from(text.matchAll(AMOUNT_IN_CONTEXT_RE), (m) => m[1].trim()),
    MAX_AMOUNTS
  );
  if (amounts.length > 0) return amounts;

  return uniqueCapped(
    Array.from(text.matchAll(AMOUNT_RE), (m) => m[0].trim()),
    MAX_AMOUNTS
  );
}

/* ============= Dates ============= */

const MONTHS =
  'January|February|March|April|May|June|July|August|September|October|November|December';
const DATE_RE = new RegExp(String.raw`\b(?:${MONTHS})\s+\d{1,2},\s+\d{4}`, 'g');

const DATE_CONTEXT_CHARS = 60;
const DATE_CONTEXT_WORDS = 6;

function trimContextPunctuation(s: string): string {
  return s.replace(/^[ .,;:]+/, '').replace(/[ .,;:]+$/, '');
}

/**
 * "Month D, YYYY" dates, each labelled with the words just before its
 * first occurrence: "January 15, 2024 — dated".
 */
export function extractDates(text: string): string[] {
  const dates = uniqueCapped(
    Array.from(text.matchAll(DATE_RE), (m) => m[0]),
    MAX_DATES
  );

  return dates.map((date) => {
    const idx = text.indexOf(date);
    if (idx <= 0) return date;

    const before = text.slice(Math.max(0, idx - DATE_CONTEXT_CHARS), idx).trim();
    const words = before.split(/\s+/).filter(Boolean).slice(-DATE_CONTEXT_WORDS);
    const context = trimContextPunctuation(words.join(' '));

    return context.length > 3 ? `${date} — ${context}` : date;
  });
}

/* ============= Parties ============= */

const COMPANY_RE =
  /\b([A-Z][A-Za-z&]*(?:[ \t]+[A-Z][A-Za-z&]*)*?[ \t]+(?:Private[ \t]+Limited|PRIVATE[ \t]+LIMITED|Pvt\.?[ \t]*Ltd\.?|PVT\.?[ \t]*LTD\.?|Limited|LIMITED|Ltd\.?|LTD\.?))(?![A-Za-z])/g;

// The honorific may end a line; the name itself stays on one line
const PERSON_RE = /\b(?:Mrs|Mr|Ms|Dr)\.?\s+([A-Z][a-z]+(?:[ \t]+[A-Z][a-z]+)+)/g;

export function extractCompanies(text: string): string[] {
  return uniqueCapped(
    Array.from(text.matchAll(COMPANY_RE), (m) => m[1].trim()),
    MAX_COMPANIES
  );
}

export function extractPersons(text: string): string[] {
  return uniqueCapped(
    Array.from(text.matchAll(PERSON_RE), (m) => m[1].trim()),
    MAX_PERSONS
  );
}

interface PartyRoles {
  firstCompany: string;
  otherCompanies: string;
  person: string;
}

const PARTY_ROLES: Readonly<Record<ContractKind, PartyRoles>> = {
  employment: { firstCompany: 'Employer', otherCompanies: 'Employer', person: 'Employee' },
  service: { firstCompany: 'Client', otherCompanies: 'Service Provider', person: 'Signatory' },
  nda: { firstCompany: 'Disclosing Party', otherCompanies: 'Receiving Party', person: 'Signatory' },
  sale: { firstCompany: 'Party', otherCompanies: 'Party', person: 'Individual' },
  unknown: { firstCompany: 'Party', otherCompanies: 'Party', person: 'Individual' },
};

/**
 * "Role: Name" strings. Roles depend on the contract kind and, for
 * companies, on order of appearance.
 */
export function extractParties(text: string, kind: ContractKind): string[] {
  const roles = PARTY_ROLES[kind];
  const companies = extractCompanies(text).map(
    (name, i) => `${i === 0 ? roles.firstCompany : roles.otherCompanies}: ${name}`
  );
  const persons = extractPersons(text).map((name) => `${roles.person}: ${name}`);
  return [...companies, ...persons];
}

/* ============= Entry Point ============= */

/**
 * Build a complete ContractAnalysis from raw text with regular expressions
 * and the clause rule table. Every list is non-empty: missing entities are
 * replaced by a localized placeholder.
 */
export function basicExtraction(
  text: string,
  language: Language = DEFAULT_LANGUAGE
): ContractAnalysis {
  const kind = detectContractKind(text);

  const parties = extractParties(text, kind);
  const dates = extractDates(text);
  const amounts = extractAmounts(text);

  let clauses: Clause[] = extractClauses(text, language);
  if (clauses.length === 0) {
    clauses = [
      {
        type: localize(GENERAL_TERMS_CLAUSE.type, language),
        risk_level: 'Medium',
        explanation: localize(GENERAL_TERMS_CLAUSE.explanation, language),
      },
    ];
  }

  return {
    contract_type: localize(CONTRACT_KIND_LABELS[kind], language),
    parties: parties.length > 0 ? parties : [localize(NO_PARTIES_FOUND, language)],
    dates: dates.length > 0 ? dates : [localize(NO_DATES_FOUND, language)],
    amounts: amounts.length > 0 ? amounts : [localize(NO_AMOUNTS_FOUND, language)],
    clauses,
  };
}
