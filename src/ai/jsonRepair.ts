// src/ai/jsonRepair.ts
// Turns raw model output into a JSON object.
//
// Model responses arrive wrapped in markdown fences, cut off at the token
// ceiling, or with trailing commas. The pipeline below tries, in order:
//   1. direct parse of the unfenced text
//   2. truncation repair (drop incomplete trailing lines, close brackets by count)
//   3. forced close (stack-based closing from the first '{')
// and otherwise hands back the caller's fallback object untouched.

import { createLogger } from '../observability/logger';

const log = createLogger('ai/jsonRepair');

/* ============= Types ============= */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type RepairStage = 'empty' | 'direct' | 'truncation' | 'forced_close' | 'fallback';

export interface RepairOutcome {
  value: JsonObject;
  stage: RepairStage;
}

export interface ForcedClose {
  text: string;
  /** Characters after the last structurally complete position (before closing). */
  danglingChars: number;
}

/* ============= Helpers ============= */

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string): JsonObject | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function stripTrailingComma(text: string): string {
  return text.replace(/,\s*$/, '');
}

const COMPLETE_LINE_END = /(?:[,}\]"\d]|true|false|null)$/;

/* ============= Stages ============= */

/**
 * Trim and remove a surrounding ``` fence (with optional language tag).
 * A missing closing fence is tolerated, since truncated output often loses it.
 */
export function stripCodeFence(content: string): string {
  let text = content.trim();
  if (!text.startsWith('```')) return text;

  text = text.replace(/^```[\w-]*[ \t]*/, '');
  text = text.replace(/\s*```$/, '');
  return text.trim();
}

/**
 * Line-oriented truncation repair. Returns null when no line looks complete.
 *
 * Drops trailing lines until one ends like a finished value, closes an
 * unterminated string, then appends `]` and `}` by naive open/close counts
 * (brackets first). Nesting order is not tracked here; forceCloseJson does that.
 */
export function repairTruncatedJson(content: string): string | null {
  const lines = content.split('\n');

  while (lines.length > 0) {
    const last = lines[lines.length - 1].trim();
    if (COMPLETE_LINE_END.test(last)) break;
    lines.pop();
  }

  if (lines.length === 0) return null;

  let text = stripTrailingComma(lines.join('\n'));

  const openBraces = count(text, '{') - count(text, '}');
  const openBrackets = count(text, '[') - count(text, ']');

  let inString = false;
  let escaped = false;
  for (const ch of text) {
    if (escaped) {
      escaped = false;
      continue;
    }
    if (ch === '\\') {
      escaped = true;
      continue;
    }
    if (ch === '"') inString = !inString;
  }

  if (inString) text += '"';

  text = stripTrailingComma(text.trimEnd());
  text += ']'.repeat(Math.max(0, openBrackets));
  text += '}'.repeat(Math.max(0, openBraces));

  return text;
}

/**
 * Stack-based closing starting at the first '{'. Returns null when there is none.
 *
 * Every character is kept; a closer that does not match the top of the
 * stack is kept without popping. Open strings are closed, a trailing comma
 * is dropped, and the remaining stack is appended innermost first.
 */
export function forceCloseJson(content: string): ForcedClose | null {
  const start = content.indexOf('{');
  if (start < 0) return null;

  const body = content.slice(start);
  const stack: string[] = [];
  let inString = false;
  let escaped = false;
  let lastValid = 0;

  for (let i = 0; i < body.length; i++) {
    const ch = body[i];

    if (escaped) {
      escaped = false;
      continue;
    }
    if (inString) {
      if (ch === '\\') escaped = true;
      else if (ch === '"') {
        inString = false;
        lastValid = i + 1;
      }
      continue;
    }

    switch (ch) {
      case '"':
        inString = true;
        break;
      case '{':
        stack.push('}');
        break;
      case '[':
        stack.push(']');
        break;
      case '}':
      case ']':
        if (stack[stack.length - 1] === ch) stack.pop();
        lastValid = i + 1;
        break;
      case ',':
      case ':':
        break;
      default:
        if (ch.trim()) lastValid = i + 1;
    }
  }

  let text = inString ? body + '"' : body;
  text = stripTrailingComma(text.trimEnd());
  for (let i = stack.length - 1; i >= 0; i--) text += stack[i];

  return { text, danglingChars: body.length - lastValid };
}

function count(text: string, ch: string): number {
  let n = 0;
  for (const c of text) if (c === ch) n++;
  return n;
}

/* ============= Entry Points ============= */

/**
 * Run the repair pipeline and report which stage produced the value.
 * Never throws. A null/undefined fallback becomes `{}`; on failure the
 * fallback is returned as the same object.
 */
export function repairModelJson(
  content: string | null | undefined,
  fallback?: JsonObject | null
): RepairOutcome {
  const fb: JsonObject = fallback ?? {};

  if (!content || !content.trim()) {
    return { value: fb, stage: 'empty' };
  }

  const text = stripCodeFence(content);

  const direct = tryParseObject(text);
  if (direct) return { value: direct, stage: 'direct' };

  const truncated = repairTruncatedJson(text);
  if (truncated !== null) {
    const repaired = tryParseObject(truncated);
    if (repaired) {
      log.debug({ inputLength: text.length }, 'Recovered JSON via truncation repair');
      return { value: repaired, stage: 'truncation' };
    }
  }

  const forced = forceCloseJson(text);
  if (forced) {
    const repaired = tryParseObject(forced.text);
    if (repaired) {
      log.debug(
        { inputLength: text.length, danglingChars: forced.danglingChars },
        'Recovered JSON via forced close'
      );
      return { value: repaired, stage: 'forced_close' };
    }
  }

  log.warn({ preview: text.slice(0, 200) }, 'JSON repair failed, using fallback');
  return { value: fb, stage: 'fallback' };
}

/**
 * Parse model output into an object, repairing it when possible.
 *
 * @example
 * parseModelJson('```json\n{"score": 40}\n```', {}) // → { score: 40 }
 * parseModelJson('{"items": ["a", "b"', {})          // → { items: ["a", "b"] }
 */
export function parseModelJson(
  content: string | null | undefined,
  fallback?: JsonObject | null
): JsonObject {
  return repairModelJson(content, fallback).value;
}
