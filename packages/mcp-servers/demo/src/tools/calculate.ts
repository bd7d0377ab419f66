/**
 * calculate tool
 *
 * Basic arithmetic on two numbers. The result is always rendered with two
 * decimal places.
 */

import { z } from 'zod';
import { BusinessRuleError, createMcpErrorResponse, createMcpTextResponse, isToolError } from '@mcp-demo/shared';
import type { McpToolResponse, ToolArguments } from '@mcp-demo/shared';
import type { ToolDefinition } from '../tool-registry.js';

export const OPERATIONS = ['add', 'subtract', 'multiply', 'divide'] as const;

export const Operation = z.enum(OPERATIONS);
export type Operation = z.infer<typeof Operation>;

// Advertised in tools/list; the handler itself decides what is supported
export const CalculateInput = z.object({
  operation: Operation.describe('The operation to perform (add, subtract, multiply, divide)'),
  x: z.number().describe('First number'),
  y: z.number().describe('Second number'),
});

/**
 * Apply `operation` to x and y.
 *
 * @throws BusinessRuleError on division by zero or an unknown operation
 */
export function calculate(operation: string, x: number, y: number): number {
  const parsed = Operation.safeParse(operation);
  if (!parsed.success) {
    throw new BusinessRuleError(`unsupported operation: ${operation}`);
  }

  switch (parsed.data) {
    case 'add':
      return x + y;
    case 'subtract':
      return x - y;
    case 'multiply':
      return x * y;
    case 'divide':
      if (y === 0) {
        throw new BusinessRuleError('cannot divide by zero');
      }
      return x / y;
  }
}

// toFixed switches to exponent notation from here on
const FIXED_NOTATION_LIMIT = 1e21;

export function formatResult(value: number): string {
  if (Number.isFinite(value) && Math.abs(value) >= FIXED_NOTATION_LIMIT) {
    // every double this large is already an integer
    return `${BigInt(value).toString()}.00`;
  }
  return value.toFixed(2);
}

export async function calculateTool(args: ToolArguments): Promise<McpToolResponse> {
  try {
    const operation = args.requireString('operation');
    const x = args.requireNumber('x');
    const y = args.requireNumber('y');

    return createMcpTextResponse(formatResult(calculate(operation, x, y)));
  } catch (error) {
    if (isToolError(error)) {
      return createMcpErrorResponse(error, { sanitize: false });
    }
    throw error;
  }
}

export const calculateDefinition: ToolDefinition = {
  name: 'calculate',
  description: 'Perform basic arithmetic operations',
  inputSchema: CalculateInput,
  handler: calculateTool,
};
