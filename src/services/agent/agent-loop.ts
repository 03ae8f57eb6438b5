// Agent Loop
// Drives one conversation: call the model, run the tools it asks for, repeat
// until it signals completion, goes quiet on tools, or runs out of turns.

import type { Logger } from 'pino';
import { silentLogger } from '../../logger.js';
import type {
  Provider,
  ProviderMessage,
  ProviderResponse,
  ProviderTool,
  ProviderUsage,
  ToolCall,
} from '../../providers/types.js';
import {
  AgentCancelledError,
  ProviderCallError,
  ToolExecutionError,
  UnknownToolError,
  classifyProviderFailure,
  errorMessage,
} from '../../utils/errors.js';
import { COMPLETION_TOOL_NAME } from '../tools/mark-task-complete-tool.js';
import { ToolRegistry } from '../tools/registry.js';
import { deduplicateContent, DEFAULT_DEDUPLICATION_OPTIONS } from './content-deduplicator.js';
import { DEFAULT_SYSTEM_PROMPT } from './prompts.js';
import { ToolCallNormalizer, parseToolArguments } from './tool-call-normalizer.js';
import type {
  AgentLoopOptions,
  AgentLoopResult,
  AgentTermination,
  DeduplicationOptions,
  ResponseSource,
} from './types.js';

export const COMPLETED_FALLBACK_RESPONSE = 'Task completed successfully.';
export const NO_RESPONSE_FALLBACK =
  "I apologize, but I couldn't generate a meaningful response. Please try rephrasing your question.";

function coerceContent(content: unknown): string {
  if (content === null || content === undefined) return '';
  if (typeof content === 'string') return content;
  if (typeof content === 'object') {
    try {
      return JSON.stringify(content);
    } catch {
      return String(content);
    }
  }
  return String(content);
}

function serializeToolPayload(payload: unknown): string {
  try {
    return JSON.stringify(payload ?? null);
  } catch (error) {
    return JSON.stringify({ error: `Tool result could not be serialized: ${errorMessage(error)}` });
  }
}

function completionMessageOf(call: ToolCall): string | null {
  let args: Record<string, unknown>;
  try {
    args = parseToolArguments(call.arguments);
  } catch {
    // the tool result already reports the bad arguments
    return null;
  }
  const value = args.completion_message;
  if (value === undefined || value === null) return null;
  const text = (typeof value === 'string' ? value : coerceContent(value)).trim();
  return text || null;
}

interface RunState {
  messages: ProviderMessage[];
  contents: string[];
  usage: ProviderUsage;
  iterations: number;
  toolCallsExecuted: number;
  nonCompletionCalls: number;
  completionMessage: string | null;
}

export class AgentLoop {
  private readonly provider: Provider;
  private readonly tools: ToolRegistry;
  private readonly systemPrompt: string;
  private readonly maxIterations: number;
  private readonly noToolStreakThreshold: number;
  private readonly completionToolName: string;
  private readonly deduplication: DeduplicationOptions;
  private readonly logger: Logger;
  private readonly signal?: AbortSignal;

  constructor(options: AgentLoopOptions) {
    this.provider = options.provider;
    this.logger = options.logger ?? silentLogger;
    this.tools = options.tools instanceof ToolRegistry
      ? options.tools
      : new ToolRegistry(options.tools ?? [], this.logger);
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.maxIterations = options.maxIterations ?? 10;
    this.noToolStreakThreshold = Math.max(1, options.noToolStreakThreshold ?? 2);
    this.completionToolName = options.completionToolName ?? COMPLETION_TOOL_NAME;
    this.deduplication = { ...DEFAULT_DEDUPLICATION_OPTIONS, ...options.deduplication };
    this.signal = options.signal;
  }

  async run(userInput: string): Promise<string> {
    const result = await this.execute(userInput);
    return result.response;
  }

  async execute(userInput: string): Promise<AgentLoopResult> {
    const state: RunState = {
      messages: [
        { role: 'system', content: this.systemPrompt },
        { role: 'user', content: userInput },
      ],
      contents: [],
      usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
      iterations: 0,
      toolCallsExecuted: 0,
      nonCompletionCalls: 0,
      completionMessage: null,
    };
    const normalizer = new ToolCallNormalizer();
    const providerTools = this.tools.size > 0 ? this.tools.toProviderTools() : undefined;
    let noToolStreak = 0;

    while (state.iterations < this.maxIterations) {
      state.iterations += 1;
      this.throwIfAborted();
      this.logger.debug({ iteration: state.iterations, maxIterations: this.maxIterations }, 'Agent iteration');

      const response = await this.callProvider(state.messages, providerTools);
      state.usage.promptTokens += response.usage.promptTokens;
      state.usage.completionTokens += response.usage.completionTokens;
      state.usage.totalTokens += response.usage.totalTokens;

      const content = coerceContent(response.content);
      const toolCalls = normalizer.normalizeAll(response.toolCalls);

      const assistantMessage: ProviderMessage = { role: 'assistant', content };
      if (toolCalls.length > 0) {
        assistantMessage.tool_calls = toolCalls;
      }
      state.messages.push(assistantMessage);

      if (content.trim()) {
        state.contents.push(content.trim());
      }

      if (toolCalls.length === 0) {
        noToolStreak += 1;
        if (noToolStreak >= this.noToolStreakThreshold) {
          const text = deduplicateContent(state.contents, this.deduplication);
          if (text) {
            return this.finish(state, 'no_tool_streak', text, 'content');
          }
        }
        continue;
      }

      noToolStreak = 0;
      this.logger.debug({ tools: toolCalls.map(c => c.name) }, `Agent making ${toolCalls.length} tool call(s)`);

      let completed = false;
      for (const call of toolCalls) {
        if (call.name === this.completionToolName) {
          if (state.contents.length === 0 && state.nonCompletionCalls === 0) {
            this.logger.warn('Task completion called before any work was done, continuing');
            continue;
          }
          state.messages.push(await this.executeTool(call));
          state.toolCallsExecuted += 1;
          state.completionMessage = completionMessageOf(call) ?? state.completionMessage;
          completed = true;
          continue;
        }

        state.messages.push(await this.executeTool(call));
        state.toolCallsExecuted += 1;
        state.nonCompletionCalls += 1;
      }

      if (completed) {
        return this.resolve(state, 'completion_tool', COMPLETED_FALLBACK_RESPONSE);
      }
    }

    this.logger.warn({ maxIterations: this.maxIterations }, 'Agent reached max iterations');
    return this.resolve(state, 'max_iterations', NO_RESPONSE_FALLBACK);
  }

  private resolve(state: RunState, termination: AgentTermination, fallback: string): AgentLoopResult {
    const text = deduplicateContent(state.contents, this.deduplication);
    if (text) return this.finish(state, termination, text, 'content');
    if (state.completionMessage) return this.finish(state, termination, state.completionMessage, 'completion_message');
    return this.finish(state, termination, fallback, 'default');
  }

  private finish(
    state: RunState,
    termination: AgentTermination,
    response: string,
    source: ResponseSource
  ): AgentLoopResult {
    this.logger.debug({ termination, source, iterations: state.iterations }, 'Agent run finished');
    return {
      response,
      iterations: state.iterations,
      termination,
      source,
      toolCallsExecuted: state.toolCallsExecuted,
      usage: { ...state.usage },
    };
  }

  private throwIfAborted(): void {
    if (!this.signal?.aborted) return;
    const reason: unknown = this.signal.reason;
    throw new AgentCancelledError(reason instanceof Error ? reason.message : undefined);
  }

  private async callProvider(messages: ProviderMessage[], tools?: ProviderTool[]): Promise<ProviderResponse> {
    try {
      // Copy so later appends never leak into a request the provider still holds
      return await this.provider.createChatCompletion([...messages], { tools, signal: this.signal });
    } catch (error) {
      if (error instanceof ProviderCallError || error instanceof AgentCancelledError) {
        throw error;
      }
      this.throwIfAborted();
      throw new ProviderCallError(
        this.provider.name,
        classifyProviderFailure(error),
        `LLM call failed: ${errorMessage(error)}`,
        undefined,
        error
      );
    }
  }

  private async executeTool(call: ToolCall): Promise<ProviderMessage> {
    let payload: unknown;
    try {
      const args = parseToolArguments(call.arguments);
      const tool = this.tools.get(call.name);
      if (!tool) {
        throw new UnknownToolError(call.name);
      }
      payload = await tool.execute(args);
    } catch (error) {
      const failure = error instanceof UnknownToolError
        ? error
        : new ToolExecutionError(call.name, `Tool execution failed: ${errorMessage(error)}`, error);
      this.logger.warn({ tool: call.name, err: failure }, 'Tool call failed');
      payload = { error: failure.message };
    }

    return {
      role: 'tool',
      tool_call_id: call.id,
      name: call.name,
      content: serializeToolPayload(payload),
    };
  }
}
