// Task decomposition
// Turns the model's reply into exactly N subtasks, whatever the reply looks like.

import { DecompositionParseError } from '../../utils/errors.js';
import { FALLBACK_QUESTION_TEMPLATES } from './prompts.js';

export function fillTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.hasOwn(values, key) ? String(values[key]) : match
  );
}

function parseArray(text: string): unknown[] | null {
  try {
    const value: unknown = JSON.parse(text);
    return Array.isArray(value) ? value : null;
  } catch {
    return null;
  }
}

/**
 * Reads a JSON array from the reply, or from the text between its first `[`
 * and last `]`.
 */
export function parseSubtasks(text: string): unknown[] {
  const trimmed = text.trim();
  const direct = parseArray(trimmed);
  if (direct) return direct;

  const start = trimmed.indexOf('[');
  const end = trimmed.lastIndexOf(']');
  if (start !== -1 && end > start) {
    const embedded = parseArray(trimmed.slice(start, end + 1));
    if (embedded) return embedded;
  }

  throw new DecompositionParseError('Decomposition reply does not contain a JSON array');
}

function subtaskText(item: unknown): string {
  if (item === null || item === undefined) return '';
  if (typeof item === 'string') return item.trim();
  if (typeof item === 'object') return JSON.stringify(item);
  return String(item).trim();
}

export function fallbackTopic(userInput: string): string {
  const topic = userInput.trim().replace(/\s+/g, ' ').replace(/[?.!]+$/, '').trim();
  return topic || 'the request';
}

/**
 * Rotates through the templates; once the rotation wraps, a follow-up
 * number keeps every question distinct.
 */
export function buildFallbackSubtasks(userInput: string, count: number): string[] {
  const topic = fallbackTopic(userInput);
  const questions: string[] = [];

  for (let i = 0; i < count; i++) {
    const question = fillTemplate(FALLBACK_QUESTION_TEMPLATES[i % FALLBACK_QUESTION_TEMPLATES.length], { topic });
    const round = Math.floor(i / FALLBACK_QUESTION_TEMPLATES.length);
    questions.push(round === 0 ? question : `${question.slice(0, -1)} (follow-up ${round})?`);
  }

  return questions;
}

export function normalizeSubtasks(items: readonly unknown[], count: number, userInput: string): string[] {
  const subtasks = items.map(subtaskText).filter(Boolean).slice(0, count);
  if (subtasks.length < count) {
    const fallback = buildFallbackSubtasks(userInput, count);
    subtasks.push(...fallback.slice(subtasks.length));
  }
  return subtasks;
}
