/* src/ai/modelRouter.ts
   Picks the LlmClient for the configured provider.
*/
import { config, type AIConfig } from '../config';
import type { LlmClient, ProviderId } from './types';
import { createOpenAIProvider } from './providers/openai';
import { createAnthropicProvider } from './providers/anthropic';
import { createDevProvider } from './providers/dev';

export interface ModelRouterOptions {
  /** Override the configured provider (e.g. per deployment or in scripts). */
  provider?: ProviderId;
  /** Override the provider's default model id. */
  model?: string;
}

/**
 * Build the completion client for a provider.
 * API keys are checked lazily on the first call, so a misconfigured key
 * surfaces as a failed completion rather than a failed boot.
 */
export function createLlmClient(
  ai: AIConfig = config.ai,
  opts: ModelRouterOptions = {}
): LlmClient {
  const provider: ProviderId = opts.provider ?? ai.provider;

  switch (provider) {
    case 'openai':
      return createOpenAIProvider({
        apiKey: ai.openaiKey,
        baseURL: ai.openaiBaseUrl,
        timeoutMs: ai.timeoutMs,
        defaultModel: opts.model || ai.model.openai,
      });
    case 'anthropic':
      return createAnthropicProvider({
        apiKey: ai.anthropicKey,
        timeoutMs: ai.timeoutMs,
        defaultModel: opts.model || ai.model.anthropic,
      });
    case 'dev':
      return createDevProvider(opts.model);
  }
}
