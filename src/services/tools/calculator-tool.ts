// Calculator Tool
// Performs mathematical calculations safely using mathjs

import { evaluate, format } from 'mathjs';
import { z } from 'zod';
import type { ToolDefinition } from './types.js';

const CalculatorArgsSchema = z.object({
  expression: z.string().trim().min(1, 'Expression is required'),
});

export const calculatorTool: ToolDefinition = {
  name: 'calculator',
  description: 'Perform mathematical calculations. Supports basic arithmetic, algebra, trigonometry, unit conversion and more. Use this for any mathematical computation.',
  parameters: [
    {
      name: 'expression',
      type: 'string',
      description: 'Mathematical expression to evaluate (e.g., "2 + 2", "sin(pi/2)", "sqrt(16)")',
      required: true,
    },
  ],
  execute: async (args) => {
    const parsed = CalculatorArgsSchema.safeParse(args);
    if (!parsed.success) {
      throw new Error(parsed.error.issues.map(i => i.message).join('; '));
    }

    const { expression } = parsed.data;
    let result: unknown;
    try {
      result = evaluate(expression);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to evaluate expression: ${message}`);
    }

    return {
      expression,
      result: format(result, { precision: 14 }),
    };
  },
};
