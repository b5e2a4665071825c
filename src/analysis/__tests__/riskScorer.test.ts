import { describe, it, expect } from 'vitest';
import { RiskScorer } from '../riskScorer.js';
import { DETECTED_RISK_FLAGS } from '../../types/analysis.js';
import { replyingLlm, failingLlm } from './fakeLlm.js';

const CONTRACT = 'The Vendor shall indemnify the Client against all third-party claims.';

const ALL_FALSE = Object.fromEntries(DETECTED_RISK_FLAGS.map((f) => [f, false]));

describe('RiskScorer.assess', () => {
  it('normalizes a complete model answer', async () => {
    const { llm } = replyingLlm(
      JSON.stringify({
        overall_score: 72,
        legal_risk: 'High',
        financial_risk: 'medium',
        compliance_risk: 'LOW',
        detected_risks: { indemnity_present: true, custom_flag: true, auto_renewal: 'yes' },
        detailed_risks: [
          { category: 'Indemnity', description: 'Uncapped indemnity for the vendor.' },
          { note: 'ignored' },
          'also ignored',
        ],
      })
    );

    const result = await new RiskScorer({ llm }).assess(CONTRACT);

    expect(result).toEqual({
      overall_score: 72,
      legal_risk: 'High',
      financial_risk: 'Medium',
      compliance_risk: 'Low',
      detected_risks: { ...ALL_FALSE, indemnity_present: true, custom_flag: true },
      detailed_risks: [{ category: 'Indemnity', description: 'Uncapped indemnity for the vendor.' }],
    });
  });

  it.each([
    [140, 100],
    [-3, 0],
    [33.6, 34],
    ['80', 50],
    [null, 50],
  ])('normalizes score %j to %j', async (score, expected) => {
    const { llm } = replyingLlm(JSON.stringify({ overall_score: score }));
    const result = await new RiskScorer({ llm }).assess(CONTRACT);
    expect(result.overall_score).toBe(expected);
  });

  it('defaults unknown risk levels to Medium', async () => {
    const { llm } = replyingLlm('{"legal_risk": "Unknown", "financial_risk": 3}');

    const result = await new RiskScorer({ llm }).assess(CONTRACT);

    expect(result.legal_risk).toBe('Medium');
    expect(result.financial_risk).toBe('Medium');
    expect(result.compliance_risk).toBe('Medium');
  });

  it('fills every field for an empty object', async () => {
    const { llm } = replyingLlm('{}');

    const result = await new RiskScorer({ llm }).assess(CONTRACT);

    expect(result).toEqual({
      overall_score: 50,
      legal_risk: 'Medium',
      financial_risk: 'Medium',
      compliance_risk: 'Medium',
      detected_risks: ALL_FALSE,
      detailed_risks: [],
    });
  });

  it('marks an unparseable response as incomplete', async () => {
    const { llm } = replyingLlm('The contract looks risky overall.');

    const result = await new RiskScorer({ llm }).assess(CONTRACT);

    expect(result.overall_score).toBe(50);
    expect(result.detected_risks).toEqual(ALL_FALSE);
    expect(result.detailed_risks).toEqual([
      { category: 'Analysis Incomplete', description: 'Response could not be parsed. Please try again.' },
    ]);
  });

  it('returns the default assessment when the call fails', async () => {
    const { llm } = failingLlm();

    const result = await new RiskScorer({ llm }).assess(CONTRACT);

    expect(result.overall_score).toBe(50);
    expect([result.legal_risk, result.financial_risk, result.compliance_risk]).toEqual([
      'Medium',
      'Medium',
      'Medium',
    ]);
    expect(result.detected_risks).toEqual(ALL_FALSE);
    expect(result.detailed_risks).toEqual([
      { category: 'Fallback', description: 'Risk analysis failed and default values were used.' },
    ]);
  });

  it('sends the risk budget and a 4000 character prefix', async () => {
    const { llm, complete } = replyingLlm('{}');

    await new RiskScorer({ llm }).assess('B'.repeat(4500));

    const req = complete.mock.calls[0][0];
    expect(req.maxTokens).toBe(1500);
    expect(req.temperature).toBe(0.1);
    expect(req.messages[0].content).toContain('Maximum 5 entries in detailed_risks.');
    expect(req.messages[1].content).toContain('B'.repeat(4000));
    expect(req.messages[1].content).not.toContain('B'.repeat(4001));
  });

  it('writes the default texts in Hindi', async () => {
    const failed = await new RiskScorer({ llm: failingLlm().llm }).assess(CONTRACT, 'hindi');
    const unnamed = await new RiskScorer({
      llm: replyingLlm('{"detailed_risks": [{"description": "बिना सीमा की क्षतिपूर्ति"}]}').llm,
    }).assess(CONTRACT, 'hindi');

    expect(failed.detailed_risks).toEqual([
      { category: 'डिफ़ॉल्ट', description: 'जोखिम विश्लेषण विफल रहा और डिफ़ॉल्ट मान उपयोग किए गए।' },
    ]);
    expect(unnamed.detailed_risks).toEqual([{ category: 'सामान्य', description: 'बिना सीमा की क्षतिपूर्ति' }]);
  });
});
