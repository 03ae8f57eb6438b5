import { describe, it, expect } from 'vitest';
import {
  ALL_AGENTS_FAILED,
  buildAgentResponsesSection,
  concatenateResponses,
  describeTotalFailure,
  groupFailureReasons,
  selectSubstantiveResults,
} from '../aggregation.js';
import type { AgentRunResult } from '../types.js';

function result(agentId: number, status: AgentRunResult['status'], response: string): AgentRunResult {
  return { agentId, status, response, executionTimeMs: 5 };
}

describe('selectSubstantiveResults', () => {
  it('keeps successful responses longer than ten characters', () => {
    const long = result(1, 'success', 'A long enough answer');
    const selected = selectSubstantiveResults([
      result(0, 'success', 'Short'),
      long,
      result(2, 'error', 'Error: provider down'),
      result(3, 'success', 'Error: looked fine but was not'),
    ]);

    expect(selected).toEqual([long]);
  });

  it('relaxes the length rule when nothing else qualifies', () => {
    const short = result(0, 'success', 'Short');

    expect(selectSubstantiveResults([short, result(1, 'success', '   '), result(2, 'timeout', 'late')])).toEqual([short]);
  });

  it('returns nothing when every agent failed', () => {
    expect(selectSubstantiveResults([result(0, 'error', 'Error: boom')])).toEqual([]);
  });
});

describe('describeTotalFailure', () => {
  it('lists grouped reasons and a provider hint for auth failures', () => {
    const message = describeTotalFailure(
      [
        result(0, 'error', 'Error: groq API error (401): Invalid API Key'),
        result(1, 'error', 'Error: groq API error (401): Invalid API Key'),
        result(2, 'timeout', 'Agent 3 timed out after 5s'),
      ],
      'openrouter'
    );

    expect(message).toBe(
      [
        ALL_AGENTS_FAILED,
        '',
        'Top failure reasons:',
        '- (2 agents) groq API error (401): Invalid API Key',
        '- (1 agent) Agent 3 timed out after 5s',
        '',
        'Hint: Groq rejected the API key. Check that GROQ_API_KEY is set and that the key starts with "gsk_".',
      ].join('\n')
    );
  });

  it("falls back to the orchestrator's provider when the reason names none", () => {
    const message = describeTotalFailure([result(0, 'error', 'Error: Unauthorized')], 'cerebras');

    expect(message.endsWith('Hint: Cerebras rejected the API key. Check that CEREBRAS_API_KEY is set and that the key starts with "csk-".')).toBe(true);
  });

  it('omits the hint for other failures and keeps only the top three reasons', () => {
    const message = describeTotalFailure(
      [
        result(0, 'error', 'Error: a'),
        result(1, 'error', 'Error: b'),
        result(2, 'error', 'Error: b'),
        result(3, 'error', 'Error: c'),
        result(4, 'error', 'Error: d'),
      ],
      'groq'
    );

    expect(message).toBe(
      `${ALL_AGENTS_FAILED}\n\nTop failure reasons:\n- (2 agents) b\n- (1 agent) a\n- (1 agent) c`
    );
  });
});

describe('groupFailureReasons', () => {
  it('labels empty responses', () => {
    expect(groupFailureReasons([result(0, 'success', '  ')])).toEqual([
      { reason: 'Returned an empty response', count: 1 },
    ]);
  });
});

describe('response formatting', () => {
  const results = [result(0, 'success', ' First answer '), result(2, 'success', 'Third answer')];

  it('numbers synthesis input by position among usable responses', () => {
    expect(buildAgentResponsesSection(results)).toBe(
      '=== AGENT 1 RESPONSE ===\nFirst answer\n\n=== AGENT 2 RESPONSE ===\nThird answer\n\n'
    );
  });

  it('concatenates responses in order under headers', () => {
    expect(concatenateResponses(results)).toBe(
      '=== Agent 1 Response ===\nFirst answer\n\n=== Agent 2 Response ===\nThird answer'
    );
  });
});
