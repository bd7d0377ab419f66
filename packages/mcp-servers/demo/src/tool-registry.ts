/**
 * Tool and Resource Registry
 *
 * Binds tool names and resource URIs to their handlers and routes inbound
 * requests to them. The registry does not validate arguments; each tool
 * handler pulls what it needs out of ToolArguments.
 */

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { DispatchError, ToolArguments, createLogger, createMcpErrorResponse } from '@mcp-demo/shared';
import type { Logger, McpToolResponse } from '@mcp-demo/shared';

/**
 * Per-request data handed down from the transport.
 */
export interface HandlerContext {
  /** Aborted when the client cancels the request */
  signal?: AbortSignal;
}

export type ToolHandler = (args: ToolArguments, context: HandlerContext) => Promise<McpToolResponse>;

/**
 * Tool definition interface.
 */
export interface ToolDefinition {
  /** Tool name (used in MCP calls) */
  name: string;
  /** Human-readable description */
  description: string;
  /** Advertised parameters; converted to JSON Schema for tools/list */
  inputSchema: z.AnyZodObject;
  handler: ToolHandler;
}

export interface TextResourceContents {
  uri: string;
  mimeType: string;
  text: string;
}

export type ResourceHandler = (uri: string, context: HandlerContext) => Promise<TextResourceContents[]>;

export interface ResourceDefinition {
  uri: string;
  /** Display name */
  name: string;
  description: string;
  mimeType: string;
  handler: ResourceHandler;
}

/**
 * MCP tool schema format for ListTools response
 */
export interface McpToolSchema {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, Record<string, unknown>>;
    required?: string[];
  };
}

export interface McpResourceSchema {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
}

// Shape zod-to-json-schema produces for a z.object()
const ObjectJsonSchema = z.object({
  properties: z.record(z.record(z.unknown())).default({}),
  required: z.array(z.string()).optional(),
});

export class McpRegistry {
  private readonly tools = new Map<string, ToolDefinition>();
  private readonly resources = new Map<string, ResourceDefinition>();
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger('mcp-registry')) {
    this.logger = logger;
  }

  /**
   * Register a tool. Names are unique; re-registering throws.
   */
  registerTool(definition: ToolDefinition): void {
    if (this.tools.has(definition.name)) {
      throw new DispatchError('DuplicateName', definition.name, `Tool "${definition.name}" is already registered`);
    }
    this.tools.set(definition.name, definition);
    this.logger.debug(`Registered tool ${definition.name}`);
  }

  /**
   * Register a resource. URIs are unique; re-registering throws.
   */
  registerResource(definition: ResourceDefinition): void {
    if (this.resources.has(definition.uri)) {
      throw new DispatchError('DuplicateName', definition.uri, `Resource "${definition.uri}" is already registered`);
    }
    this.resources.set(definition.uri, definition);
    this.logger.debug(`Registered resource ${definition.uri}`);
  }

  /**
   * Get all registered tools in MCP format.
   * Used by ListToolsRequestSchema handler.
   */
  listTools(): McpToolSchema[] {
    return Array.from(this.tools.values(), (definition) => ({
      name: definition.name,
      description: definition.description,
      inputSchema: toInputSchema(definition.inputSchema),
    }));
  }

  listResources(): McpResourceSchema[] {
    return Array.from(this.resources.values(), ({ uri, name, description, mimeType }) => ({
      uri,
      name,
      description,
      mimeType,
    }));
  }

  /**
   * Call a registered tool by name.
   * Errors escaping the handler come back as an error response.
   *
   * @throws DispatchError when no tool has that name
   */
  async callTool(name: string, args: unknown, context: HandlerContext = {}): Promise<McpToolResponse> {
    const definition = this.tools.get(name);

    if (!definition) {
      throw new DispatchError('UnknownName', name, `Unknown tool: ${name}`);
    }

    try {
      return await definition.handler(ToolArguments.from(args), context);
    } catch (error) {
      this.logger.error(`Tool ${name} failed:`, error);
      return createMcpErrorResponse(error);
    }
  }

  /**
   * Read a registered resource by URI.
   *
   * @throws DispatchError when no resource has that URI
   */
  async readResource(uri: string, context: HandlerContext = {}): Promise<{ contents: TextResourceContents[] }> {
    const definition = this.resources.get(uri);

    if (!definition) {
      throw new DispatchError('UnknownName', uri, `Unknown resource: ${uri}`);
    }

    return { contents: await definition.handler(uri, context) };
  }

  hasTool(name: string): boolean {
    return this.tools.has(name);
  }

  hasResource(uri: string): boolean {
    return this.resources.has(uri);
  }
}

/**
 * Convert a Zod object schema to the JSON Schema MCP clients expect.
 */
export function toInputSchema(schema: z.AnyZodObject): McpToolSchema['inputSchema'] {
  const jsonSchema = zodToJsonSchema(schema, {
    $refStrategy: 'none',
  });
  const { properties, required } = ObjectJsonSchema.parse(jsonSchema);

  return required?.length ? { type: 'object', properties, required } : { type: 'object', properties };
}
