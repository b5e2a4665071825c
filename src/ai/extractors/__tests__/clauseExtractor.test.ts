import { describe, it, expect } from 'vitest';
import { extractClauses, CLAUSE_SCAN_LIMIT } from '../clauseExtractor.js';
import { CLAUSE_RULES } from '../clauseRules.js';

/* ============= Single clause types ============= */

describe('extractClauses', () => {
  it('detects a non-compete clause as High risk', () => {
    const result = extractClauses('non-compete');
    expect(result).toHaveLength(1);
    expect(result[0].type).toBe('Non-Compete');
    expect(result[0].risk_level).toBe('High');
  });

  it('emits one clause per type even when several phrases match', () => {
    const result = extractClauses('A non-compete applies. This non compete lasts a year.');
    expect(result.filter((c) => c.type === 'Non-Compete')).toHaveLength(1);
    expect(result).toHaveLength(1);
  });

  it('matches case-insensitively', () => {
    const result = extractClauses('FORCE MAJEURE events include floods.');
    expect(result.map((c) => c.type)).toEqual(['Force Majeure']);
  });

  it('matches the IP rights phrase regardless of capitalization', () => {
    const result = extractClauses('All IP Rights vest in the Company.');
    expect(result.map((c) => c.type)).toEqual(['Intellectual Property']);
  });

  it('returns an empty list when nothing matches', () => {
    expect(extractClauses('The parties met for lunch.')).toEqual([]);
    expect(extractClauses('')).toEqual([]);
  });
});

/* ============= Ordering and risk contract ============= */

describe('extractClauses ordering', () => {
  it('follows table order, not text order', () => {
    const text =
      'Wages are paid monthly. Disputes go to arbitration. ' +
      'Either party may terminate this agreement. The employee shall not engage in a competing business.';
    expect(extractClauses(text).map((c) => c.type)).toEqual([
      'Non-Compete',
      'Termination',
      'Arbitration',
      'Payment Terms',
    ]);
  });

  it('assigns the fixed risk level of every clause type', () => {
    const everything = CLAUSE_RULES.map((rule) => rule.phrases[0]).join('. ');
    const levels = Object.fromEntries(extractClauses(everything).map((c) => [c.type, c.risk_level]));

    expect(levels).toEqual({
      'Non-Compete': 'High',
      Confidentiality: 'Low',
      Termination: 'Medium',
      Indemnification: 'High',
      'Intellectual Property': 'Medium',
      Arbitration: 'Medium',
      'Force Majeure': 'Low',
      'Payment Terms': 'Medium',
      'Liability Limitation': 'High',
      'Renewal / Lock-in': 'High',
    });
  });
});

/* ============= Bounds and localization ============= */

describe('extractClauses bounds', () => {
  it('ignores text past the scan limit', () => {
    const padding = 'x'.repeat(CLAUSE_SCAN_LIMIT);
    expect(extractClauses(padding + ' arbitration')).toEqual([]);
    expect(extractClauses('arbitration ' + padding).map((c) => c.type)).toEqual(['Arbitration']);
  });

  it('localizes type and explanation for Hindi output', () => {
    const [clause] = extractClauses('Salary is paid monthly.', 'hindi');
    expect(clause.type).toBe('भुगतान शर्तें');
    expect(clause.risk_level).toBe('Medium');
    expect(clause.explanation).toBe(
      'भुगतान और पारिश्रमिक की शर्तें। भुगतान की आवृत्ति, कटौतियों और मजदूरी भुगतान अधिनियम के अनुपालन की पुष्टि करें।'
    );
  });
});
