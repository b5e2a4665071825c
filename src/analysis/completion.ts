// src/analysis/completion.ts
// One model call plus JSON repair, with metrics.
//
// Collaborator errors are counted and rethrown; each orchestrator turns
// them into its own default result.

import type { ChatMessage, LlmClient } from '../ai/types';
import { repairModelJson, type JsonObject, type RepairOutcome } from '../ai/jsonRepair';
import { createLogger } from '../observability/logger';
import { recordAiRequest, recordJsonRepair } from '../observability/metrics';

const log = createLogger('analysis/completion');

export type AnalysisAction = 'analysis' | 'risk' | 'compliance' | 'clause_detail';

export interface JsonCompletionRequest {
  action: AnalysisAction;
  messages: ChatMessage[];
  maxTokens: number;
  temperature: number;
  /** Returned (same object) when the response cannot be repaired */
  fallback: JsonObject;
  model?: string;
}

export async function completeJson(
  llm: LlmClient,
  req: JsonCompletionRequest
): Promise<RepairOutcome> {
  const start = Date.now();

  let content: string;
  try {
    const result = await llm.complete({
      model: req.model,
      messages: req.messages,
      maxTokens: req.maxTokens,
      temperature: req.temperature,
    });
    recordAiRequest(req.action, llm.provider, 'success', Date.now() - start);

    if (result.finishReason === 'length') {
      log.warn(
        { action: req.action, provider: result.provider, model: result.model, maxTokens: req.maxTokens },
        'Model response hit the token limit, attempting repair'
      );
    }
    content = result.content;
  } catch (err) {
    recordAiRequest(req.action, llm.provider, 'error', Date.now() - start);
    throw err;
  }

  const outcome = repairModelJson(content, req.fallback);
  recordJsonRepair(outcome.stage);
  log.debug({ action: req.action, stage: outcome.stage, ms: Date.now() - start }, 'Model response parsed');
  return outcome;
}
