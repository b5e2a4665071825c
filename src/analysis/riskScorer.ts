// src/analysis/riskScorer.ts
// Risk assessment: overall score, three risk levels, detected flags.

import type { LlmClient } from '../ai/types';
import type { JsonObject } from '../ai/jsonRepair';
import { ANALYSIS_INCOMPLETE, DEFAULT_LANGUAGE, RISK_ON_ERROR, localize, type Language } from '../ai/localization';
import { createLogger } from '../observability/logger';
import type { RiskAssessment } from '../types/analysis';
import { completeJson } from './completion';
import { buildRiskMessages } from './prompts';
import { DEFAULT_RISK_SCORE, defaultDetectedRisks, normalizeRiskAssessment } from './normalize';

const log = createLogger('analysis/risk');

const RISK_MAX_TOKENS = 1500;
const RISK_TEMPERATURE = 0.1;

function unparseableFallback(language: Language): JsonObject {
  return {
    overall_score: DEFAULT_RISK_SCORE,
    legal_risk: 'Medium',
    financial_risk: 'Medium',
    compliance_risk: 'Medium',
    detailed_risks: [
      {
        category: localize(ANALYSIS_INCOMPLETE.label, language),
        description: localize(ANALYSIS_INCOMPLETE.detail, language),
      },
    ],
  };
}

/** Result when the model call itself fails. */
export function riskAssessmentOnError(language: Language = DEFAULT_LANGUAGE): RiskAssessment {
  return {
    overall_score: DEFAULT_RISK_SCORE,
    legal_risk: 'Medium',
    financial_risk: 'Medium',
    compliance_risk: 'Medium',
    detected_risks: defaultDetectedRisks(),
    detailed_risks: [
      {
        category: localize(RISK_ON_ERROR.category, language),
        description: localize(RISK_ON_ERROR.description, language),
      },
    ],
  };
}

export interface RiskScorerOptions {
  llm: LlmClient;
  model?: string;
}

export class RiskScorer {
  private llm: LlmClient;
  private model?: string;

  constructor(opts: RiskScorerOptions) {
    this.llm = opts.llm;
    this.model = opts.model;
  }

  async assess(text: string, language: Language = DEFAULT_LANGUAGE): Promise<RiskAssessment> {
    try {
      const { value, stage } = await completeJson(this.llm, {
        action: 'risk',
        messages: buildRiskMessages(text, language),
        maxTokens: RISK_MAX_TOKENS,
        temperature: RISK_TEMPERATURE,
        fallback: unparseableFallback(language),
        model: this.model,
      });
      const assessment = normalizeRiskAssessment(value, language);
      log.info({ stage, score: assessment.overall_score }, 'Risk assessed');
      return assessment;
    } catch (err) {
      log.error({ err, provider: this.llm.provider }, 'Risk assessment failed, using defaults');
      return riskAssessmentOnError(language);
    }
  }
}
