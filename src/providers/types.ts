// Provider Interface
// Common interface that all chat-completion providers implement

export interface ToolCall {
  id: string;
  name: string;
  arguments: string; // JSON string
}

export interface ProviderTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: {
      type: 'object';
      properties: Record<string, JsonSchemaProperty>;
      required: string[];
    };
  };
}

export interface JsonSchemaProperty {
  type: string;
  description: string;
  enum?: string[];
  default?: unknown;
}

export type MessageRole = 'user' | 'assistant' | 'system' | 'tool';

export interface ProviderMessage {
  role: MessageRole;
  content: string;
  tool_calls?: ToolCall[]; // Assistant messages with tool calls
  tool_call_id?: string; // Tool result messages
  name?: string; // Tool name for tool messages
}

export interface ProviderOptions {
  tools?: ProviderTool[];
  tool_choice?: 'auto' | 'none';
  signal?: AbortSignal;
}

export interface ProviderUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Raw model output. `content` may be a string, null, or vendor-structured
 * content; `toolCalls` are vendor-native values that the agent loop normalizes.
 */
export interface ProviderResponse {
  content: unknown;
  toolCalls: unknown[];
  usage: ProviderUsage;
}

export interface Provider {
  name: string;
  model: string;
  createChatCompletion(messages: ProviderMessage[], options?: ProviderOptions): Promise<ProviderResponse>;
}
