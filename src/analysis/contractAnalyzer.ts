// src/analysis/contractAnalyzer.ts
// Contract analysis: parties, dates, amounts and clauses via the model,
// with the regex extractor as the fallback at every failure point.

import type { LlmClient } from '../ai/types';
import {
  CLAUSE_DETAIL_ON_ERROR,
  CLAUSE_DETAIL_UNPARSEABLE,
  DEFAULT_LANGUAGE,
  type Language,
} from '../ai/localization';
import { basicExtraction } from '../ai/extractors/entityExtractor';
import { createLogger } from '../observability/logger';
import type { Clause, ClauseDetail, ContractAnalysis } from '../types/analysis';
import { completeJson } from './completion';
import { buildAnalysisMessages, buildClauseDetailMessages } from './prompts';
import { localizeClauseDetail, normalizeClauseDetail, normalizeContractAnalysis } from './normalize';

const log = createLogger('analysis/contract');

const ANALYSIS_MAX_TOKENS = 3000;
const ANALYSIS_TEMPERATURE = 0.1;

const CLAUSE_DETAIL_MAX_TOKENS = 1500;
const CLAUSE_DETAIL_TEMPERATURE = 0.2;

function clauseDetailOnError(err: unknown, language: Language): ClauseDetail {
  const message = err instanceof Error ? err.message : String(err);
  const detail = localizeClauseDetail(CLAUSE_DETAIL_ON_ERROR, language);
  return { ...detail, explanation: `${detail.explanation}${message}` };
}

export interface ContractAnalyzerOptions {
  llm: LlmClient;
  /** Model id override; the client's default otherwise */
  model?: string;
}

export class ContractAnalyzer {
  private llm: LlmClient;
  private model?: string;

  constructor(opts: ContractAnalyzerOptions) {
    this.llm = opts.llm;
    this.model = opts.model;
  }

  /**
   * Analyze a contract. Never rejects: a failed call or an unparseable
   * response yields the regex extraction, and an empty clause list from
   * the model is replaced by the rule-based clauses.
   */
  async analyze(text: string, language: Language = DEFAULT_LANGUAGE): Promise<ContractAnalysis> {
    try {
      const { value, stage } = await completeJson(this.llm, {
        action: 'analysis',
        messages: buildAnalysisMessages(text, language),
        maxTokens: ANALYSIS_MAX_TOKENS,
        temperature: ANALYSIS_TEMPERATURE,
        fallback: basicExtraction(text, language),
        model: this.model,
      });
      log.info({ stage, language, textLength: text.length }, 'Contract analyzed');
      return normalizeContractAnalysis(value, text, language);
    } catch (err) {
      log.error({ err, provider: this.llm.provider }, 'Contract analysis failed, using regex extraction');
      return basicExtraction(text, language);
    }
  }

  /** Longer explanation of one clause, in the context of the contract. */
  async explainClause(
    clause: Partial<Clause>,
    fullText: string,
    language: Language = DEFAULT_LANGUAGE
  ): Promise<ClauseDetail> {
    try {
      const { value } = await completeJson(this.llm, {
        action: 'clause_detail',
        messages: buildClauseDetailMessages(clause, fullText, language),
        maxTokens: CLAUSE_DETAIL_MAX_TOKENS,
        temperature: CLAUSE_DETAIL_TEMPERATURE,
        fallback: localizeClauseDetail(CLAUSE_DETAIL_UNPARSEABLE, language),
        model: this.model,
      });
      return normalizeClauseDetail(value, language);
    } catch (err) {
      log.error({ err, clauseType: clause.type }, 'Clause detail failed');
      return clauseDetailOnError(err, language);
    }
  }
}
