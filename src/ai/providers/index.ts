// src/ai/providers/index.ts
// Shared helpers for the provider adapters.
// Adapters live beside this file; src/ai/modelRouter.ts picks one.

import type { ChatMessage, FinishReason } from '../types';

/**
 * Split system messages out of the conversation.
 * Multiple system messages are joined with a blank line.
 */
export function splitSystemMessages(messages: ChatMessage[]): {
  system: string | undefined;
  conversation: ChatMessage[];
} {
  const system = messages
    .filter((m) => m.role === 'system')
    .map((m) => m.content.trim())
    .filter(Boolean)
    .join('\n\n');

  return {
    system: system || undefined,
    conversation: messages.filter((m) => m.role !== 'system'),
  };
}

/** Map provider-specific stop reasons onto the shared FinishReason. */
export function normalizeFinishReason(raw: string | null | undefined): FinishReason {
  switch (raw) {
    case 'stop':
    case 'end_turn':
    case 'stop_sequence':
      return 'stop';
    case 'length':
    case 'max_tokens':
      return 'length';
    case 'content_filter':
      return 'content_filter';
    case 'tool_calls':
    case 'function_call':
    case 'tool_use':
      return 'tool_calls';
    default:
      return 'unknown';
  }
}
