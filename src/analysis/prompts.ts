// src/analysis/prompts.ts
// Message builders for the analysis, risk, compliance and clause-detail calls.
//
// Every prompt asks for raw JSON only and sets hard length ceilings; output
// that still overruns the token budget is handled by the JSON repair engine.

import type { ChatMessage } from '../ai/types';
import { OUTPUT_LANGUAGE_INSTRUCTION, localize, type Language } from '../ai/localization';
import type { Clause } from '../types/analysis';

/* ============= Text Budgets ============= */

export const ANALYSIS_TEXT_LIMIT = 5000;
export const RISK_TEXT_LIMIT = 4000;
export const COMPLIANCE_TEXT_LIMIT = 3000;
export const CLAUSE_DETAIL_TEXT_LIMIT = 2000;

/* ============= Shared ============= */

const RAW_JSON_RULE =
  'Output ONLY raw JSON. No markdown. No ```json blocks. No text before or after.';

const NO_CASE_LAW_RULE = 'No case law names. No court citations. No legal precedents.';

function systemPrompt(role: string, rules: string[]): string {
  const numbered = rules.map((r, i) => `${i + 1}. ${r}`).join('\n');
  return `You are a JSON API for ${role}.\n\nABSOLUTE RULES:\n${numbered}`;
}

function userPrompt(language: Language, sections: string[]): string {
  return [localize(OUTPUT_LANGUAGE_INSTRUCTION, language), ...sections]
    .filter(Boolean)
    .join('\n\n');
}

function example(value: object): string {
  return JSON.stringify(value, null, 2);
}

/* ============= Contract Analysis ============= */

const ANALYSIS_SYSTEM = systemPrompt('contract analysis', [
  RAW_JSON_RULE,
  'Each clause "explanation" must be under 25 words. One sentence only.',
  NO_CASE_LAW_RULE,
  'Exactly 5-9 clauses with a mix of High/Medium/Low risk levels.',
  'Total response must be under 1500 tokens.',
  'PARTIES: every party string MUST start with its role (Employer/Employee/Client/Service Provider/Landlord/Tenant etc), then a colon, then the name. Include ALL parties.',
  'DATES: every date string MUST have context after " — " (e.g. "Jan 1, 2024 — Contract Start Date"). Never bare dates.',
  'AMOUNTS: every amount MUST include frequency (per month/per year/one-time) AND purpose (salary/rent/penalty/deposit etc). List each monetary value separately.',
]);

const ANALYSIS_EXAMPLE = example({
  contract_type: 'Service Agreement',
  parties: [
    'Client: Harbour Logistics Private Limited',
    'Service Provider: Greenline Data Services LLP',
    'Signatory: Ms. Ananya Iyer, Director of Harbour Logistics',
  ],
  dates: [
    'June 3, 2024 — Agreement Execution Date',
    'July 1, 2024 — Service Commencement Date',
    'June 30, 2025 — Initial Term End Date',
  ],
  amounts: [
    'INR 1,80,000/month — Service Fee (payable by the 7th of each month)',
    'INR 3,00,000 — Security Deposit (refundable on expiry)',
    '18% per annum — Late Payment Interest',
  ],
  clauses: [
    { type: 'Non-Compete', risk_level: 'High', explanation: 'Bars working with competing carriers for one year after termination.' },
    { type: 'Confidentiality', risk_level: 'Low', explanation: 'Mutual obligation to protect shipment and pricing data.' },
    { type: 'Termination', risk_level: 'Medium', explanation: 'Either party may terminate with 30 days written notice.' },
    { type: 'Indemnification', risk_level: 'High', explanation: 'Provider bears uncapped liability for third-party data claims.' },
    { type: 'Payment Terms', risk_level: 'Medium', explanation: 'Monthly invoices with a 15-day payment window and late interest.' },
  ],
});

const ANALYSIS_REMINDER =
  'IMPORTANT: Every party MUST have a role prefix (Employer/Employee/Client/Vendor etc). ' +
  'Every date MUST have context after an em dash. Every amount MUST have frequency and purpose. ' +
  'Extract ALL parties, ALL dates, and ALL monetary values from the contract.';

export function buildAnalysisMessages(text: string, language: Language): ChatMessage[] {
  return [
    { role: 'system', content: ANALYSIS_SYSTEM },
    {
      role: 'user',
      content: userPrompt(language, [
        `Contract text:\n${text.slice(0, ANALYSIS_TEXT_LIMIT)}`,
        `Return JSON exactly like this example (but with ACTUAL values from the contract above):\n${ANALYSIS_EXAMPLE}`,
        ANALYSIS_REMINDER,
      ]),
    },
  ];
}

/* ============= Risk Assessment ============= */

const RISK_SYSTEM = systemPrompt('contract risk assessment', [
  RAW_JSON_RULE,
  'Every "description" must be under 25 words. One sentence only.',
  NO_CASE_LAW_RULE,
  'Maximum 5 entries in detailed_risks.',
  'Risk levels: only "High", "Medium", or "Low". Never "Unknown".',
  'Total response must be under 600 tokens.',
]);

const RISK_EXAMPLE = example({
  overall_score: 65,
  legal_risk: 'Medium',
  financial_risk: 'High',
  compliance_risk: 'Low',
  detected_risks: {
    penalty_clause: true,
    indemnity_present: true,
    unilateral_termination: true,
    auto_renewal: false,
    liability_cap_missing: true,
    non_compete_present: true,
    ip_transfer_present: true,
  },
  detailed_risks: [{ category: '...', description: '...' }],
});

export function buildRiskMessages(text: string, language: Language): ChatMessage[] {
  return [
    { role: 'system', content: RISK_SYSTEM },
    {
      role: 'user',
      content: userPrompt(language, [
        `Contract text:\n${text.slice(0, RISK_TEXT_LIMIT)}`,
        `Return JSON:\n${RISK_EXAMPLE}`,
      ]),
    },
  ];
}

/* ============= Compliance ============= */

const COMPLIANCE_SYSTEM = systemPrompt('Indian contract compliance checking', [
  RAW_JSON_RULE,
  'Every string value must be under 30 words. No exceptions.',
  NO_CASE_LAW_RULE,
  'Maximum 3 applicable_laws, 4 violations, 4 recommendations.',
  '"law" field: just act name and section (e.g. "Indian Contract Act 1872 - Section 27").',
  '"issue" field: one short sentence only.',
  'Total response must be under 800 tokens.',
]);

const COMPLIANCE_EXAMPLE = example({
  is_compliant: false,
  applicable_laws: ['...'],
  violations: [{ law: '...', issue: '...' }],
  recommendations: ['...'],
});

/**
 * @param referenceActs titles of acts from the reference dataset that the
 *   contract names; listed for the model when non-empty
 */
export function buildComplianceMessages(
  text: string,
  language: Language,
  referenceActs: readonly string[] = []
): ChatMessage[] {
  const sections = [`Contract text:\n${text.slice(0, COMPLIANCE_TEXT_LIMIT)}`];
  if (referenceActs.length > 0) {
    sections.push(`Acts referenced in the contract:\n${referenceActs.map(t => `- ${t}`).join('\n')}`);
  }
  sections.push(`Return JSON:\n${COMPLIANCE_EXAMPLE}`);

  return [
    { role: 'system', content: COMPLIANCE_SYSTEM },
    { role: 'user', content: userPrompt(language, sections) },
  ];
}

/* ============= Clause Detail ============= */

const CLAUSE_DETAIL_SYSTEM = systemPrompt('detailed contract clause analysis', [
  RAW_JSON_RULE,
  '"explanation": 3-5 sentences in plain language. Under 100 words.',
  '"issues": 2-4 bullet points as a single string. Under 80 words total.',
  '"recommendations": 2-4 actionable steps as a single string. Under 80 words total.',
  '"applicable_laws": relevant Indian act names and sections only. Under 60 words. No case law names.',
  'Total response must be under 800 tokens.',
]);

const CLAUSE_DETAIL_EXAMPLE = JSON.stringify({
  explanation: '...',
  issues: '...',
  recommendations: '...',
  applicable_laws: '...',
});

export function buildClauseDetailMessages(
  clause: Partial<Clause>,
  fullText: string,
  language: Language
): ChatMessage[] {
  const header =
    `CLAUSE: ${clause.type || 'Unknown'} | Risk: ${clause.risk_level || 'Unknown'}\n` +
    `SUMMARY: ${clause.explanation || 'None'}`;

  return [
    { role: 'system', content: CLAUSE_DETAIL_SYSTEM },
    {
      role: 'user',
      content: userPrompt(language, [
        header,
        `CONTRACT CONTEXT:\n${fullText.slice(0, CLAUSE_DETAIL_TEXT_LIMIT)}`,
        `Return JSON:\n${CLAUSE_DETAIL_EXAMPLE}`,
      ]),
    },
  ];
}
