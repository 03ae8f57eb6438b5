// Text-format tool call recovery
// Some Groq-hosted models write tool calls inline as
// <function=name>{...}</function>; Groq then rejects the turn with
// `tool_use_failed` and returns the raw text as `failed_generation`.

import type { ProviderResponse } from './types.js';

const TEXT_TOOL_CALL = /<function\s*=\s*([a-zA-Z_][\w-]*)\s*>?\s*(\{[\s\S]*?\})\s*<\/function>/g;
const FAILED_GENERATION_IN_MESSAGE = /["']failed_generation["']:\s*(["'])([\s\S]*?)\1\s*[},]/;

export interface TextToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

type ParsedJson = { ok: true; value: unknown } | { ok: false };

function tryParseJson(text: string): ParsedJson {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function decodeArguments(raw: string): unknown {
  const direct = tryParseJson(raw);
  if (direct.ok) return direct.value;
  // escaped single quotes show up in failed_generation payloads
  const unescaped = tryParseJson(raw.replace(/\\'/g, "'"));
  return unescaped.ok ? unescaped.value : {};
}

export function parseTextToolCalls(text: string): TextToolCall[] {
  return Array.from(text.matchAll(TEXT_TOOL_CALL), (match, index) => ({
    id: `call_text_${index}`,
    type: 'function' as const,
    function: {
      name: match[1],
      arguments: JSON.stringify(decodeArguments(match[2].trim())),
    },
  }));
}

export function stripTextToolCalls(text: string): string {
  return text.replace(TEXT_TOOL_CALL, '').trim();
}

/**
 * The `failed_generation` text of a `tool_use_failed` error, read from the
 * parsed error body or, failing that, from the message.
 */
export function failedGenerationOf(error: unknown): string | null {
  if (!isRecord(error)) return null;

  const body = error.error;
  if (isRecord(body) && typeof body.failed_generation === 'string') {
    return body.failed_generation;
  }

  const message = typeof error.message === 'string' ? error.message : '';
  const match = FAILED_GENERATION_IN_MESSAGE.exec(message);
  if (!match) return null;
  const decoded = tryParseJson(`"${match[2]}"`);
  return decoded.ok && typeof decoded.value === 'string' ? decoded.value : match[2];
}

/** A completion rebuilt from a rejected generation, or null when it holds no tool calls. */
export function recoverFailedGeneration(error: unknown): ProviderResponse | null {
  const text = failedGenerationOf(error);
  if (!text) return null;

  const toolCalls = parseTextToolCalls(text);
  if (toolCalls.length === 0) return null;

  return {
    content: stripTextToolCalls(text),
    toolCalls,
    usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
  };
}
