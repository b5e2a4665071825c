// src/ai/types.ts
// Provider-agnostic chat completion contract consumed by the analysis layer.

export type ProviderId = 'openai' | 'anthropic' | 'dev';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/** 'length' means the model stopped at the token ceiling and the output is likely truncated. */
export type FinishReason = 'stop' | 'length' | 'content_filter' | 'tool_calls' | 'unknown';

export interface CompletionRequest {
  /** Concrete model id; omitted means the provider's configured default. */
  model?: string;
  messages: ChatMessage[];
  maxTokens: number;
  temperature: number;
}

export interface CompletionResult {
  content: string;
  finishReason: FinishReason;
  provider: ProviderId;
  model: string;
  usage?: { inputTokens?: number; outputTokens?: number };
}

/**
 * One outbound call per invocation. Transport, auth and SDK errors reject
 * the promise; callers decide how to recover.
 */
export interface LlmClient {
  readonly provider: ProviderId;
  readonly defaultModel: string;
  complete(request: CompletionRequest): Promise<CompletionResult>;
}
