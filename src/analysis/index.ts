// src/analysis/index.ts
// Composition root for the analysis layer.

import type { LlmClient } from '../ai/types';
import type { Language } from '../ai/localization';
import type { ActsRepository } from '../reference/actsRepository';
import type { FullAnalysis } from '../types/analysis';
import { ContractAnalyzer } from './contractAnalyzer';
import { RiskScorer } from './riskScorer';
import { ComplianceChecker } from './complianceChecker';

export { ContractAnalyzer } from './contractAnalyzer';
export { RiskScorer } from './riskScorer';
export { ComplianceChecker } from './complianceChecker';

export interface AnalysisServices {
  analyzer: ContractAnalyzer;
  riskScorer: RiskScorer;
  complianceChecker: ComplianceChecker;
}

export interface AnalysisDeps {
  llm: LlmClient;
  acts: ActsRepository;
  model?: string;
}

export function createAnalysisServices(deps: AnalysisDeps): AnalysisServices {
  const { llm, acts, model } = deps;
  return {
    analyzer: new ContractAnalyzer({ llm, model }),
    riskScorer: new RiskScorer({ llm, model }),
    complianceChecker: new ComplianceChecker({ llm, acts, model }),
  };
}

/**
 * Analysis, risk and compliance for one contract, run concurrently.
 * Each part falls back independently, so this never rejects.
 */
export async function runFullAnalysis(
  services: AnalysisServices,
  text: string,
  language: Language
): Promise<FullAnalysis> {
  const [analysis, risk, compliance] = await Promise.all([
    services.analyzer.analyze(text, language),
    services.riskScorer.assess(text, language),
    services.complianceChecker.check(text, language),
  ]);
  return { analysis, risk, compliance };
}
