import { describe, it, expect } from 'vitest';
import path from 'path';
import os from 'os';
import { createAnalysisServices, runFullAnalysis } from '../index.js';
import { ActsRepository } from '../../reference/actsRepository.js';
import { createDevProvider } from '../../ai/providers/dev.js';
import { failingLlm } from './fakeLlm.js';

const CONTRACT = 'SERVICE AGREEMENT. Payment is due monthly. Either party may terminate this agreement.';
const noActs = () => new ActsRepository(path.join(os.tmpdir(), 'no-such-acts-dir'));

describe('runFullAnalysis', () => {
  it('runs on field defaults with the offline provider', async () => {
    const services = createAnalysisServices({ llm: createDevProvider(), acts: noActs() });

    const result = await runFullAnalysis(services, CONTRACT, 'english');

    expect(result.analysis).toEqual({
      contract_type: 'Unknown',
      parties: [],
      dates: [],
      amounts: [],
      clauses: [
        {
          type: 'Termination',
          risk_level: 'Medium',
          explanation:
            'Termination provisions define how either party can end the contract. Review notice period requirements and consequences of termination.',
        },
        {
          type: 'Payment Terms',
          risk_level: 'Medium',
          explanation:
            'Payment and compensation terms. Verify payment frequency, deductions, and compliance with Payment of Wages Act.',
        },
      ],
    });
    expect(result.risk.overall_score).toBe(50);
    expect(result.risk.detailed_risks).toEqual([]);
    expect(result.compliance).toEqual({
      is_compliant: true,
      applicable_laws: [],
      violations: [],
      recommendations: [],
    });
  });

  it('falls back independently for every part when the client fails', async () => {
    const { llm, complete } = failingLlm();
    const services = createAnalysisServices({ llm, acts: noActs() });

    const result = await runFullAnalysis(services, CONTRACT, 'english');

    expect(complete).toHaveBeenCalledTimes(3);
    expect(result.analysis.contract_type).toBe('Service Agreement');
    expect(result.risk.detailed_risks[0].category).toBe('Fallback');
    expect(result.compliance.violations[0].law).toBe('General Review Required');
  });

  it('localizes the unknown contract type', async () => {
    const services = createAnalysisServices({ llm: createDevProvider(), acts: noActs() });

    const result = await runFullAnalysis(services, CONTRACT, 'hindi');

    expect(result.analysis.contract_type).toBe('अज्ञात');
    expect(result.analysis.clauses[0].type).toBe('समाप्ति');
  });
});
