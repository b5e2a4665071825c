// In-process LlmClient stand-ins for the orchestrator tests.
import { vi } from 'vitest';
import type { CompletionRequest, CompletionResult, FinishReason, LlmClient } from '../../ai/types.js';

export function replyingLlm(content: string, finishReason: FinishReason = 'stop') {
  const complete = vi.fn(
    async (req: CompletionRequest): Promise<CompletionResult> => ({
      content,
      finishReason,
      provider: 'dev',
      model: req.model ?? 'fake-model',
    })
  );
  const llm: LlmClient = { provider: 'dev', defaultModel: 'fake-model', complete };
  return { llm, complete };
}

export function failingLlm(message = 'upstream unavailable') {
  const complete = vi.fn(async (_req: CompletionRequest): Promise<CompletionResult> => {
    throw new Error(message);
  });
  const llm: LlmClient = { provider: 'dev', defaultModel: 'fake-model', complete };
  return { llm, complete };
}
