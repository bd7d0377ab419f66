/**
 * hello_world tool
 *
 * Greets a person by name.
 */

import { z } from 'zod';
import { createMcpErrorResponse, createMcpTextResponse, isToolError } from '@mcp-demo/shared';
import type { McpToolResponse, ToolArguments } from '@mcp-demo/shared';
import type { ToolDefinition } from '../tool-registry.js';

export const HelloWorldInput = z.object({
  name: z.string().describe('Name of the person to greet'),
});

export function greet(name: string): string {
  return `Hello, ${name}!`;
}

export async function helloWorldTool(args: ToolArguments): Promise<McpToolResponse> {
  try {
    const name = args.requireString('name');
    return createMcpTextResponse(greet(name));
  } catch (error) {
    if (isToolError(error)) {
      return createMcpErrorResponse(error, { sanitize: false });
    }
    throw error;
  }
}

export const helloWorldDefinition: ToolDefinition = {
  name: 'hello_world',
  description: 'Say hello to someone',
  inputSchema: HelloWorldInput,
  handler: helloWorldTool,
};
