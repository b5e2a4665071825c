// src/ai/providers/anthropic.ts
import Anthropic from '@anthropic-ai/sdk';
import type { CompletionRequest, CompletionResult, LlmClient } from '../types';
import { normalizeFinishReason, splitSystemMessages } from './index';

export interface AnthropicProviderOptions {
  apiKey: string;
  timeoutMs: number;
  defaultModel: string;
}

export function createAnthropicProvider(opts: AnthropicProviderOptions): LlmClient {
  let _client: Anthropic | null = null;
  function getClient(): Anthropic {
    if (_client) return _client;
    if (!opts.apiKey) {
      throw new Error(
        'ANTHROPIC_API_KEY is not set. Set it in your environment to use the Anthropic provider.'
      );
    }
    _client = new Anthropic({
      apiKey: opts.apiKey,
      timeout: opts.timeoutMs,
      maxRetries: 0,
    });
    return _client;
  }

  return {
    provider: 'anthropic',
    defaultModel: opts.defaultModel,

    async complete(request: CompletionRequest): Promise<CompletionResult> {
      const client = getClient();
      const model = request.model || opts.defaultModel;
      const { system, conversation } = splitSystemMessages(request.messages);

      const resp = await client.messages.create({
        model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system,
        messages: conversation.map((m) => ({
          role: m.role === 'assistant' ? ('assistant' as const) : ('user' as const),
          content: m.content,
        })),
      });

      // Visible text blocks only
      const text = resp.content
        .map((block) => (block.type === 'text' ? block.text.trim() : ''))
        .filter(Boolean)
        .join('\n\n');

      return {
        content: text,
        finishReason: normalizeFinishReason(resp.stop_reason),
        provider: 'anthropic',
        model: resp.model || model,
        usage: {
          inputTokens: resp.usage?.input_tokens,
          outputTokens: resp.usage?.output_tokens,
        },
      };
    },
  };
}
