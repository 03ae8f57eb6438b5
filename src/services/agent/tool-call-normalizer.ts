// Tool call normalization
// Providers return tool calls as plain objects, SDK class instances or Maps,
// with fields either flat or nested under `function`.

import type { ToolCall } from '../../providers/types.js';
import { ArgumentParseError, ArgumentShapeError, errorMessage } from '../../utils/errors.js';

type FieldSource = Map<unknown, unknown> | Record<string, unknown>;

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Map);
}

function asFieldSource(value: unknown): FieldSource | null {
  if (value instanceof Map || isPlainRecord(value)) return value;
  return null;
}

function readField(source: FieldSource, key: string): unknown {
  return source instanceof Map ? source.get(key) : source[key];
}

function stringifyArguments(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return '{}';
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value) ?? '{}';
    } catch {
      // cyclic or BigInt-bearing values
      return String(value);
    }
  }
  return String(value);
}

/**
 * Stateful per run: synthesized ids come from a counter so they are
 * deterministic and never collide within one conversation.
 */
export class ToolCallNormalizer {
  private generated = 0;

  normalize(raw: unknown, takenIds: ReadonlySet<string> = new Set()): ToolCall | null {
    const source = asFieldSource(raw);
    if (!source) return null;

    const fn = asFieldSource(readField(source, 'function'));
    const name = (fn && readField(fn, 'name')) ?? readField(source, 'name');
    if (typeof name !== 'string' || name.trim() === '') return null;

    const args = stringifyArguments(fn ? readField(fn, 'arguments') : readField(source, 'arguments'));

    const rawId = readField(source, 'id');
    const id = typeof rawId === 'string' || typeof rawId === 'number' ? String(rawId).trim() : '';

    return {
      id: id && !takenIds.has(id) ? id : this.nextId(takenIds),
      name: name.trim(),
      arguments: args,
    };
  }

  /** Keeps order; drops only the entries that cannot be normalized. */
  normalizeAll(raws: readonly unknown[] | null | undefined): ToolCall[] {
    const calls: ToolCall[] = [];
    const ids = new Set<string>();
    for (const raw of raws ?? []) {
      const call = this.normalize(raw, ids);
      if (call) {
        ids.add(call.id);
        calls.push(call);
      }
    }
    return calls;
  }

  private nextId(takenIds: ReadonlySet<string>): string {
    let id: string;
    do {
      this.generated += 1;
      id = `call_generated_${this.generated}`;
    } while (takenIds.has(id));
    return id;
  }
}

export function parseToolArguments(raw: string): Record<string, unknown> {
  if (raw.trim() === '') return {};

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    throw new ArgumentParseError(`Invalid JSON arguments: ${errorMessage(error)}`);
  }

  if (!isPlainRecord(decoded)) {
    throw new ArgumentShapeError();
  }
  return decoded;
}
