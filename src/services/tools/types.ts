// Tool system types and interfaces

export interface ToolParameter {
  name: string;
  type: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
  description: string;
  required: boolean;
  enum?: string[]; // For enum types
  default?: unknown;
}

/**
 * A tool the agent loop can dispatch to. `execute` returns any
 * JSON-serializable value and may throw; the loop turns a throw into an
 * `{ error }` tool result.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameter[];
  execute: (args: Record<string, unknown>) => Promise<unknown>;
}
