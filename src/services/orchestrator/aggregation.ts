// Result aggregation helpers

import { PROVIDER_PRESETS, authRemediationHint } from '../../providers/presets.js';
import { isAuthFailureMessage } from '../../utils/errors.js';
import type { AgentRunResult } from './types.js';

export const ALL_AGENTS_FAILED = 'All agents failed to provide meaningful results.';

const ERROR_PREFIX = 'Error:';
const MIN_SUBSTANTIVE_LENGTH = 10;
const MAX_REASONS = 3;
const MAX_REASON_LENGTH = 200;

function isUsable(result: AgentRunResult): boolean {
  const text = result.response.trim();
  return result.status === 'success' && text.length > 0 && !text.startsWith(ERROR_PREFIX);
}

/**
 * Successful, non-error responses longer than a few words; if none qualify,
 * any successful non-error response.
 */
export function selectSubstantiveResults(results: readonly AgentRunResult[]): AgentRunResult[] {
  const usable = results.filter(isUsable);
  const substantive = usable.filter(r => r.response.trim().length > MIN_SUBSTANTIVE_LENGTH);
  return substantive.length > 0 ? substantive : usable;
}

function failureReason(result: AgentRunResult): string {
  let text = result.response.trim();
  if (text.startsWith(ERROR_PREFIX)) {
    text = text.slice(ERROR_PREFIX.length).trim();
  }
  if (!text) return 'Returned an empty response';
  return text.length > MAX_REASON_LENGTH ? `${text.slice(0, MAX_REASON_LENGTH)}...` : text;
}

export interface FailureReason {
  reason: string;
  count: number;
}

/** Distinct reasons, most frequent first; ties keep first-seen order. */
export function groupFailureReasons(results: readonly AgentRunResult[]): FailureReason[] {
  const counts = new Map<string, number>();
  for (const result of results) {
    const reason = failureReason(result);
    counts.set(reason, (counts.get(reason) ?? 0) + 1);
  }
  return Array.from(counts, ([reason, count]) => ({ reason, count })).sort((a, b) => b.count - a.count);
}

function providerNamedIn(reason: string): string | undefined {
  const lower = reason.toLowerCase();
  return PROVIDER_PRESETS.find(p => lower.includes(p.name) || lower.includes(p.displayName.toLowerCase()))?.name;
}

export function describeTotalFailure(results: readonly AgentRunResult[], providerName: string): string {
  const reasons = groupFailureReasons(results);
  const lines = [ALL_AGENTS_FAILED];

  if (reasons.length > 0) {
    lines.push('', 'Top failure reasons:');
    for (const { reason, count } of reasons.slice(0, MAX_REASONS)) {
      lines.push(`- (${count} ${count === 1 ? 'agent' : 'agents'}) ${reason}`);
    }
  }

  const authReason = reasons.find(r => isAuthFailureMessage(r.reason));
  if (authReason) {
    const provider = providerNamedIn(authReason.reason) ?? providerName;
    const hint = authRemediationHint(provider) ?? `Check the API key configured for ${provider}.`;
    lines.push('', `Hint: ${hint}`);
  }

  return lines.join('\n');
}

/** Responses are numbered 1..k in order, skipping agents that produced nothing usable. */
export function buildAgentResponsesSection(results: readonly AgentRunResult[]): string {
  return results
    .map((r, index) => `=== AGENT ${index + 1} RESPONSE ===\n${r.response.trim()}\n\n`)
    .join('');
}

export function concatenateResponses(results: readonly AgentRunResult[]): string {
  const lines: string[] = [];
  results.forEach((result, index) => {
    lines.push(`=== Agent ${index + 1} Response ===`, result.response.trim(), '');
  });
  return lines.join('\n').trim();
}
