// src/ai/providers/openai.ts
// Chat Completions adapter. Also serves OpenAI-compatible gateways
// (OpenRouter et al.) through baseURL.
import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { ChatMessage, CompletionRequest, CompletionResult, LlmClient } from '../types';
import { normalizeFinishReason } from './index';

export interface OpenAIProviderOptions {
  apiKey: string;
  baseURL?: string;
  timeoutMs: number;
  defaultModel: string;
}

function toMessageParam(m: ChatMessage): ChatCompletionMessageParam {
  switch (m.role) {
    case 'system':
      return { role: 'system', content: m.content };
    case 'assistant':
      return { role: 'assistant', content: m.content };
    default:
      return { role: 'user', content: m.content };
  }
}

export function createOpenAIProvider(opts: OpenAIProviderOptions): LlmClient {
  let _client: OpenAI | null = null;
  function getClient(): OpenAI {
    if (_client) return _client;
    if (!opts.apiKey) {
      throw new Error('OPENAI_API_KEY is not set. Set it in your environment to use the OpenAI provider.');
    }
    // Single attempt: a failed call goes straight to the caller's fallback
    _client = new OpenAI({
      apiKey: opts.apiKey,
      baseURL: opts.baseURL,
      timeout: opts.timeoutMs,
      maxRetries: 0,
    });
    return _client;
  }

  return {
    provider: 'openai',
    defaultModel: opts.defaultModel,

    async complete(request: CompletionRequest): Promise<CompletionResult> {
      const client = getClient();
      const model = request.model || opts.defaultModel;

      const resp = await client.chat.completions.create({
        model,
        messages: request.messages.map(toMessageParam),
        max_tokens: request.maxTokens,
        temperature: request.temperature,
      });

      const choice = resp.choices[0];
      return {
        content: (choice?.message?.content ?? '').trim(),
        finishReason: normalizeFinishReason(choice?.finish_reason),
        provider: 'openai',
        model: resp.model || model,
        usage: {
          inputTokens: resp.usage?.prompt_tokens,
          outputTokens: resp.usage?.completion_tokens,
        },
      };
    },
  };
}
