// Tool Registry - name-keyed set of tools for one agent loop

import type { Logger } from 'pino';
import type { JsonSchemaProperty, ProviderTool } from '../../providers/types.js';
import type { ToolDefinition, ToolParameter } from './types.js';

export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();

  constructor(tools: ToolDefinition[] = [], private logger?: Logger) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      this.logger?.warn({ tool: tool.name }, 'Tool already registered, overwriting');
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  /** A new registry without the named tools. */
  without(...names: string[]): ToolRegistry {
    const excluded = new Set(names);
    return new ToolRegistry(this.getAll().filter(t => !excluded.has(t.name)), this.logger);
  }

  toProviderTools(): ProviderTool[] {
    return Array.from(this.tools.values()).map(tool => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: {
          type: 'object',
          properties: this.parametersToSchema(tool.parameters),
          required: tool.parameters.filter(p => p.required).map(p => p.name),
        },
      },
    }));
  }

  private parametersToSchema(params: ToolParameter[]): Record<string, JsonSchemaProperty> {
    const schema: Record<string, JsonSchemaProperty> = {};

    for (const param of params) {
      const paramSchema: JsonSchemaProperty = {
        type: param.type,
        description: param.description,
      };

      if (param.enum) {
        paramSchema.enum = param.enum;
      }

      if (param.default !== undefined) {
        paramSchema.default = param.default;
      }

      schema[param.name] = paramSchema;
    }

    return schema;
  }
}
