// src/ai/providers/dev.ts
// Offline stub: no network, deterministic. Always answers with an empty
// JSON object, so every analysis runs on field defaults and the rule-based
// clause extractor.
import type { CompletionRequest, CompletionResult, LlmClient } from '../types';

export function createDevProvider(defaultModel = 'dev-stub-1'): LlmClient {
  return {
    provider: 'dev',
    defaultModel,
    async complete(request: CompletionRequest): Promise<CompletionResult> {
      return {
        content: '{}',
        finishReason: 'stop',
        provider: 'dev',
        model: request.model || defaultModel,
      };
    },
  };
}
