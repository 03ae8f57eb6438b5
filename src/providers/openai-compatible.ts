// OpenAI-compatible Provider
// One adapter for every vendor that exposes the /chat/completions wire format

import OpenAI from 'openai';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse } from './types.js';
import type { ProviderPreset } from './presets.js';
import { recoverFailedGeneration } from './text-tool-calls.js';
import {
  AgentCancelledError,
  ProviderCallError,
  classifyProviderFailure,
  errorMessage,
  type ProviderErrorKind,
} from '../utils/errors.js';

export interface OpenAICompatibleConfig {
  preset: ProviderPreset;
  apiKey: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

function toWireMessage(message: ProviderMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'tool':
      return { role: 'tool', content: message.content, tool_call_id: message.tool_call_id ?? '' };
    case 'assistant': {
      const wire: OpenAI.Chat.ChatCompletionAssistantMessageParam = {
        role: 'assistant',
        content: message.content,
      };
      // Include tool_calls only when present; some vendors reject an empty array
      if (message.tool_calls && message.tool_calls.length > 0) {
        wire.tool_calls = message.tool_calls.map(tc => ({
          id: tc.id,
          type: 'function',
          function: { name: tc.name, arguments: tc.arguments },
        }));
      }
      return wire;
    }
  }
}

function kindForStatus(status: number | undefined): ProviderErrorKind {
  if (status === undefined) return 'unknown';
  if (status === 401 || status === 403) return 'auth';
  if (status === 408) return 'timeout';
  if (status === 429) return 'rate_limit';
  if (status >= 500) return 'server';
  if (status >= 400) return 'bad_request';
  return 'unknown';
}

export class OpenAICompatibleProvider implements Provider {
  name: string;
  model: string;
  private client: OpenAI;
  private recoversTextToolCalls: boolean;

  constructor(config: OpenAICompatibleConfig) {
    const { preset } = config;
    if (preset.apiKeyEnv && !config.apiKey) {
      throw new Error(`${preset.apiKeyEnv} not configured`);
    }

    this.name = preset.name;
    this.model = config.model || preset.defaultModel;
    this.recoversTextToolCalls = preset.recoversTextToolCalls ?? false;
    this.client = new OpenAI({
      apiKey: config.apiKey || 'ollama',
      baseURL: (config.baseUrl || preset.baseUrl).replace(/\/+$/, ''),
      timeout: config.timeoutMs,
      // Retries belong to the orchestrator, which knows about the global deadline
      maxRetries: 0,
    });
  }

  async createChatCompletion(messages: ProviderMessage[], options: ProviderOptions = {}): Promise<ProviderResponse> {
    const tools = options.tools && options.tools.length > 0 ? options.tools : undefined;

    let completion: OpenAI.Chat.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: messages.map(toWireMessage),
          tools,
          tool_choice: tools ? options.tool_choice : undefined,
        },
        { signal: options.signal },
      );
    } catch (error) {
      const recovered = this.recoversTextToolCalls && !options.signal?.aborted
        ? recoverFailedGeneration(error)
        : null;
      if (recovered) {
        return recovered;
      }
      throw this.wrapError(error, options.signal);
    }

    const message = completion.choices[0]?.message;

    return {
      content: message?.content ?? null,
      toolCalls: message?.tool_calls ?? [],
      usage: {
        promptTokens: completion.usage?.prompt_tokens || 0,
        completionTokens: completion.usage?.completion_tokens || 0,
        totalTokens: completion.usage?.total_tokens || 0,
      },
    };
  }

  private wrapError(error: unknown, signal?: AbortSignal): Error {
    if (error instanceof OpenAI.APIUserAbortError || signal?.aborted) {
      return new AgentCancelledError(`${this.name} request aborted`);
    }

    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new ProviderCallError(this.name, 'timeout', `${this.name} API request timed out`, undefined, error);
    }

    if (error instanceof OpenAI.APIConnectionError) {
      return new ProviderCallError(
        this.name,
        'connection',
        `${this.name} API connection error: ${error.message}`,
        undefined,
        error,
      );
    }

    if (error instanceof OpenAI.APIError) {
      const kind = kindForStatus(error.status);
      return new ProviderCallError(
        this.name,
        kind === 'unknown' ? classifyProviderFailure(error) : kind,
        `${this.name} API error (${error.status ?? 'no status'}): ${error.message}`,
        error.status,
        error,
      );
    }

    return new ProviderCallError(
      this.name,
      classifyProviderFailure(error),
      `${this.name} API call failed: ${errorMessage(error)}`,
      undefined,
      error,
    );
  }
}
