// src/analysis/complianceChecker.ts
// Compliance check against Indian law. Acts from the reference dataset that
// the contract names are passed to the model alongside the text.

import type { LlmClient } from '../ai/types';
import type { JsonObject } from '../ai/jsonRepair';
import {
  ACT_NAMES,
  ANALYSIS_INCOMPLETE,
  COMPLIANCE_ON_ERROR,
  DEFAULT_LANGUAGE,
  localize,
  type Language,
} from '../ai/localization';
import type { ActsRepository } from '../reference/actsRepository';
import { createLogger } from '../observability/logger';
import type { ComplianceResult } from '../types/analysis';
import { completeJson } from './completion';
import { buildComplianceMessages } from './prompts';
import { normalizeComplianceResult } from './normalize';

const log = createLogger('analysis/compliance');

const COMPLIANCE_MAX_TOKENS = 1500;
const COMPLIANCE_TEMPERATURE = 0.1;

function unparseableFallback(language: Language): JsonObject {
  return {
    is_compliant: false,
    applicable_laws: [localize(ACT_NAMES.contractAct, language)],
    violations: [
      {
        law: localize(ANALYSIS_INCOMPLETE.label, language),
        issue: localize(ANALYSIS_INCOMPLETE.detail, language),
      },
    ],
    recommendations: [localize(ANALYSIS_INCOMPLETE.recommendation, language)],
  };
}

/** Result when the model call itself fails. */
export function complianceResultOnError(language: Language = DEFAULT_LANGUAGE): ComplianceResult {
  return {
    is_compliant: false,
    applicable_laws: [localize(ACT_NAMES.contractAct, language), localize(ACT_NAMES.itAct, language)],
    violations: [
      {
        law: localize(COMPLIANCE_ON_ERROR.law, language),
        issue: localize(COMPLIANCE_ON_ERROR.issue, language),
      },
    ],
    recommendations: [
      localize(COMPLIANCE_ON_ERROR.reviewRecommendation, language),
      localize(COMPLIANCE_ON_ERROR.contractActRecommendation, language),
      localize(COMPLIANCE_ON_ERROR.regulationsRecommendation, language),
    ],
  };
}

export interface ComplianceCheckerOptions {
  llm: LlmClient;
  acts: ActsRepository;
  model?: string;
}

export class ComplianceChecker {
  private llm: LlmClient;
  private acts: ActsRepository;
  private model?: string;

  constructor(opts: ComplianceCheckerOptions) {
    this.llm = opts.llm;
    this.acts = opts.acts;
    this.model = opts.model;
  }

  async check(text: string, language: Language = DEFAULT_LANGUAGE): Promise<ComplianceResult> {
    try {
      const referenced = this.acts.findMentionedActs(text).map(a => a.title);
      const { value, stage } = await completeJson(this.llm, {
        action: 'compliance',
        messages: buildComplianceMessages(text, language, referenced),
        maxTokens: COMPLIANCE_MAX_TOKENS,
        temperature: COMPLIANCE_TEMPERATURE,
        fallback: unparseableFallback(language),
        model: this.model,
      });
      const result = normalizeComplianceResult(value, language);
      log.info(
        { stage, referencedActs: referenced.length, violations: result.violations.length },
        'Compliance checked'
      );
      return result;
    } catch (err) {
      log.error({ err, provider: this.llm.provider }, 'Compliance check failed, using defaults');
      return complianceResultOnError(language);
    }
  }
}
