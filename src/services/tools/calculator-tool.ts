// Calculator Tool
// Evaluates arithmetic for invoice totals, discounts and tax using mathjs

import { evaluate } from 'mathjs';
import { textResult, type ToolDefinition, type ToolResult } from './types.js';

export const calculatorTool: ToolDefinition = {
  name: 'calculator',
  description: 'Perform mathematical calculations such as invoice totals, discounts, tax amounts or currency conversions. Use this for any arithmetic instead of computing in your head.',
  parameters: [
    {
      name: 'expression',
      type: 'string',
      description: 'Mathematical expression to evaluate (e.g., "120 * 0.2", "(49.99 + 15) * 3", "round(1234.5678, 2)")',
      required: true,
    },
  ],
  execute: async (args: Record<string, unknown>): Promise<ToolResult> => {
    const expression = typeof args.expression === 'string' ? args.expression.trim() : '';
    if (!expression) {
      return textResult(JSON.stringify({ error: 'Expression is required' }), true);
    }

    try {
      const result: unknown = evaluate(expression);
      const resultStr = typeof result === 'object' ? JSON.stringify(result) : String(result);

      return textResult(JSON.stringify({ expression, result: resultStr }));
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      return textResult(
        JSON.stringify({ error: `Failed to evaluate expression: ${errorMessage}` }),
        true,
      );
    }
  },
};
