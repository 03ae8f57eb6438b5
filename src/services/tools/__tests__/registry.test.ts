import { describe, it, expect } from 'vitest';
import { ToolRegistry } from '../registry.js';
import { calculatorTool } from '../calculator-tool.js';
import { COMPLETION_TOOL_NAME, markTaskCompleteTool } from '../mark-task-complete-tool.js';
import type { ToolDefinition } from '../types.js';

const noop = async () => ({ ok: true });

describe('Tool Registry', () => {
  it('should register and retrieve tools', () => {
    const registry = new ToolRegistry();

    const testTool: ToolDefinition = {
      name: 'lookup',
      description: 'Looks something up',
      parameters: [
        {
          name: 'term',
          type: 'string',
          description: 'Term to look up',
          required: true,
        },
      ],
      execute: noop,
    };

    registry.register(testTool);
    expect(registry.has('lookup')).toBe(true);
    expect(registry.get('lookup')).toBe(testTool);
    expect(registry.get('missing')).toBeUndefined();
    expect(registry.size).toBe(1);
  });

  it('should keep the last registration when a name is reused', () => {
    const first: ToolDefinition = { name: 'dup', description: 'first', parameters: [], execute: noop };
    const second: ToolDefinition = { name: 'dup', description: 'second', parameters: [], execute: noop };

    const registry = new ToolRegistry([first, second]);

    expect(registry.size).toBe(1);
    expect(registry.get('dup')?.description).toBe('second');
  });

  it('should build a registry without the excluded tools', () => {
    const registry = new ToolRegistry([markTaskCompleteTool, calculatorTool]);

    const reduced = registry.without(COMPLETION_TOOL_NAME);

    expect(reduced.getAll().map(t => t.name)).toEqual(['calculator']);
    expect(registry.size).toBe(2);
  });

  it('should convert tools to function-calling format', () => {
    const registry = new ToolRegistry([
      {
        name: 'lookup',
        description: 'Looks something up',
        parameters: [
          {
            name: 'term',
            type: 'string',
            description: 'Term to look up',
            required: true,
          },
          {
            name: 'limit',
            type: 'integer',
            description: 'Result limit',
            required: false,
            default: 10,
          },
          {
            name: 'mode',
            type: 'string',
            description: 'Lookup mode',
            required: false,
            enum: ['fast', 'deep'],
          },
        ],
        execute: noop,
      },
    ]);

    expect(registry.toProviderTools()).toEqual([
      {
        type: 'function',
        function: {
          name: 'lookup',
          description: 'Looks something up',
          parameters: {
            type: 'object',
            properties: {
              term: { type: 'string', description: 'Term to look up' },
              limit: { type: 'integer', description: 'Result limit', default: 10 },
              mode: { type: 'string', description: 'Lookup mode', enum: ['fast', 'deep'] },
            },
            required: ['term'],
          },
        },
      },
    ]);
  });
});

describe('Built-in tools', () => {
  it('mark_task_complete echoes its arguments', async () => {
    const result = await markTaskCompleteTool.execute({
      task_summary: 'Answered the question',
      completion_message: 'All done',
    });

    expect(result).toEqual({
      status: 'completed',
      task_summary: 'Answered the question',
      completion_message: 'All done',
    });
  });

  it('calculator evaluates expressions', async () => {
    await expect(calculatorTool.execute({ expression: ' 2 + 2 ' })).resolves.toEqual({
      expression: '2 + 2',
      result: '4',
    });
    await expect(calculatorTool.execute({ expression: 'sqrt(16)' })).resolves.toEqual({
      expression: 'sqrt(16)',
      result: '4',
    });
  });

  it('calculator rejects empty and malformed input', async () => {
    await expect(calculatorTool.execute({ expression: '   ' })).rejects.toThrow('Expression is required');
    await expect(calculatorTool.execute({ expression: '2 +' })).rejects.toThrow('Failed to evaluate expression');
  });
});
