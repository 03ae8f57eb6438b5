import { describe, it, expect, vi } from 'vitest';
import { AgentLoop, COMPLETED_FALLBACK_RESPONSE, NO_RESPONSE_FALLBACK } from '../agent-loop.js';
import { calculatorTool } from '../../tools/calculator-tool.js';
import { markTaskCompleteTool } from '../../tools/mark-task-complete-tool.js';
import type { ToolDefinition } from '../../tools/types.js';
import type { Provider } from '../../../providers/types.js';
import { AgentCancelledError, ProviderCallError } from '../../../utils/errors.js';
import { completionCall, scriptedProvider, toolCall } from '../../../__tests__/helpers/fake-provider.js';

const TOOLS = [markTaskCompleteTool, calculatorTool];

describe('AgentLoop', () => {
  it('ignores a completion call made before any work', async () => {
    const { provider, createChatCompletion } = scriptedProvider([
      { toolCalls: [completionCall('Too early')] },
      { content: 'Useful analysis chunk.' },
      { toolCalls: [completionCall('Finished')] },
    ]);

    const result = await new AgentLoop({ provider, tools: TOOLS }).run('Analyse the data');

    expect(result).toBe('Useful analysis chunk.');
    expect(createChatCompletion).toHaveBeenCalledTimes(3);
    // the skipped call produced no tool result
    const thirdRequest = createChatCompletion.mock.calls[2][0];
    expect(thirdRequest.map(m => m.role)).toEqual(['system', 'user', 'assistant', 'assistant']);
  });

  it('joins content from every turn when completion is signalled', async () => {
    const { provider } = scriptedProvider([
      { content: 'First research finding.' },
      { content: 'Second research finding.', toolCalls: [completionCall()] },
    ]);

    const result = await new AgentLoop({ provider, tools: TOOLS }).execute('Research the topic');

    expect(result.response).toBe('First research finding.\n\nSecond research finding.');
    expect(result.termination).toBe('completion_tool');
    expect(result.source).toBe('content');
    expect(result.iterations).toBe(2);
    expect(result.toolCallsExecuted).toBe(1);
  });

  it('finalizes after the no-tool streak without reaching later turns', async () => {
    const { provider, createChatCompletion } = scriptedProvider([
      { content: 'Draft analysis part one.' },
      { content: 'Draft analysis part two.' },
      { toolCalls: [completionCall()] },
    ]);

    const result = await new AgentLoop({ provider, tools: TOOLS, noToolStreakThreshold: 2 }).execute('Draft it');

    expect(result.response).toBe('Draft analysis part one.\n\nDraft analysis part two.');
    expect(result.termination).toBe('no_tool_streak');
    expect(createChatCompletion).toHaveBeenCalledTimes(2);
  });

  it('falls back to the completion message when no content was written', async () => {
    const { provider, createChatCompletion } = scriptedProvider([
      { toolCalls: [toolCall('calculator', { expression: '6*7' })] },
      { toolCalls: [completionCall('The answer is 42.')] },
    ]);

    const result = await new AgentLoop({ provider, tools: TOOLS }).execute('What is six times seven?');

    expect(result.response).toBe('The answer is 42.');
    expect(result.source).toBe('completion_message');
    expect(result.toolCallsExecuted).toBe(2);
    expect(createChatCompletion.mock.calls[1][0][3]).toEqual({
      role: 'tool',
      tool_call_id: 'call_generated_1',
      name: 'calculator',
      content: '{"expression":"6*7","result":"42"}',
    });
  });

  it('uses the generic success text when nothing else is available', async () => {
    const { provider } = scriptedProvider([
      { toolCalls: [toolCall('calculator', { expression: '1+1' })] },
      { toolCalls: [completionCall('   ')] },
    ]);

    const result = await new AgentLoop({ provider, tools: TOOLS }).execute('Add');

    expect(result.response).toBe(COMPLETED_FALLBACK_RESPONSE);
    expect(result.source).toBe('default');
  });

  it('turns tool failures into error results and keeps going', async () => {
    const failing: ToolDefinition = {
      name: 'boom',
      description: 'Always fails',
      parameters: [],
      execute: vi.fn(async () => {
        throw new Error('kaput');
      }),
    };
    const { provider, createChatCompletion } = scriptedProvider([
      {
        toolCalls: [
          toolCall('nope', {}, 't1'),
          toolCall('boom', '{}', 't2'),
          toolCall('boom', '{bad', 't3'),
        ],
      },
      { content: 'Recovered after tool errors.' },
    ]);

    const result = await new AgentLoop({ provider, tools: [failing], noToolStreakThreshold: 1 }).execute('Try tools');

    expect(result.response).toBe('Recovered after tool errors.');
    expect(result.toolCallsExecuted).toBe(3);
    expect(failing.execute).toHaveBeenCalledTimes(1);

    const [, , , unknownTool, thrown, badArgs] = createChatCompletion.mock.calls[1][0];
    expect(unknownTool).toEqual({ role: 'tool', tool_call_id: 't1', name: 'nope', content: '{"error":"Unknown tool: nope"}' });
    expect(thrown.content).toBe('{"error":"Tool execution failed: kaput"}');
    expect(thrown.tool_call_id).toBe('t2');
    expect(badArgs.content).toMatch(/^\{"error":"Tool execution failed: Invalid JSON arguments: /);
  });

  it('apologizes when iterations run out with nothing to show', async () => {
    const { provider } = scriptedProvider([
      { toolCalls: [toolCall('calculator', { expression: '1+1' })] },
      { toolCalls: [toolCall('calculator', { expression: '2+2' })] },
    ]);

    const result = await new AgentLoop({ provider, tools: TOOLS, maxIterations: 2 }).execute('Keep calculating');

    expect(result.response).toBe(NO_RESPONSE_FALLBACK);
    expect(result.termination).toBe('max_iterations');
    expect(result.source).toBe('default');
  });

  it('returns accumulated content when iterations run out', async () => {
    const { provider } = scriptedProvider([{ content: 'Partial notes.' }]);

    const result = await new AgentLoop({ provider, tools: TOOLS, maxIterations: 1 }).execute('Take notes');

    expect(result.response).toBe('Partial notes.');
    expect(result.termination).toBe('max_iterations');
  });

  it('deduplicates restated content', async () => {
    const { provider } = scriptedProvider([{ content: 'Same answer.' }, { content: '  same   ANSWER. ' }]);

    await expect(new AgentLoop({ provider }).run('Answer twice')).resolves.toBe('Same answer.');
  });

  it('coerces structured content to a string', async () => {
    const { provider } = scriptedProvider([{ content: [{ type: 'text', text: 'hi' }] }]);

    const result = await new AgentLoop({ provider, noToolStreakThreshold: 1 }).run('Say hi');

    expect(result).toBe('[{"type":"text","text":"hi"}]');
  });

  it('sends tool schemas only when tools are registered', async () => {
    const withTools = scriptedProvider([{ content: 'One.' }]);
    await new AgentLoop({ provider: withTools.provider, tools: TOOLS, noToolStreakThreshold: 1 }).run('q');
    expect(withTools.createChatCompletion.mock.calls[0][1]?.tools?.map(t => t.function.name)).toEqual([
      'mark_task_complete',
      'calculator',
    ]);

    const withoutTools = scriptedProvider([{ content: 'Two.' }]);
    await new AgentLoop({ provider: withoutTools.provider, noToolStreakThreshold: 1 }).run('q');
    expect(withoutTools.createChatCompletion.mock.calls[0][1]?.tools).toBeUndefined();
  });

  it('sums token usage across turns', async () => {
    const { provider } = scriptedProvider([{ content: 'A.' }, { content: 'B.' }]);

    const result = await new AgentLoop({ provider }).execute('q');

    expect(result.usage).toEqual({ promptTokens: 20, completionTokens: 10, totalTokens: 30 });
  });

  it('wraps provider failures and does not retry them', async () => {
    const createChatCompletion = vi.fn(async () => {
      throw new Error('socket hang up');
    });
    const provider: Provider = { name: 'groq', model: 'test-model', createChatCompletion };

    const error = await new AgentLoop({ provider }).run('q').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderCallError);
    expect(error).toMatchObject({ provider: 'groq', kind: 'connection', retryable: true });
    expect(createChatCompletion).toHaveBeenCalledTimes(1);
  });

  it('stops before calling the provider once the signal is aborted', async () => {
    const { provider, createChatCompletion } = scriptedProvider([{ content: 'never' }]);
    const controller = new AbortController();
    controller.abort();

    await expect(new AgentLoop({ provider, signal: controller.signal }).run('q')).rejects.toBeInstanceOf(
      AgentCancelledError
    );
    expect(createChatCompletion).not.toHaveBeenCalled();
  });
});
