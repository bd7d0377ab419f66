/**
 * Demo Server Setup
 *
 * Builds the MCP server: registers the tools and the products resource on a
 * fresh registry and routes protocol requests to it. The transport is not
 * connected here - that's done by the caller.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { DispatchError, createLogger, sanitizeError } from '@mcp-demo/shared';
import type { Logger } from '@mcp-demo/shared';
import { McpRegistry } from './tool-registry.js';
import { registerDemoTools } from './tools/index.js';
import { createProductsResource } from './resources/products.js';
import type { ProductReader } from './storage.js';

export const SERVER_NAME = 'Demo';
export const SERVER_VERSION = '1.0.0';

export interface DemoServerOptions {
  store: ProductReader;
  logger?: Logger;
}

/**
 * Map a failed tool call or resource read onto a JSON-RPC error.
 */
export function toMcpError(error: unknown): McpError {
  if (error instanceof McpError) {
    return error;
  }
  if (error instanceof DispatchError && error.kind === 'UnknownName') {
    return new McpError(ErrorCode.InvalidParams, error.message);
  }
  return new McpError(ErrorCode.InternalError, sanitizeError(error));
}

export function createDemoRegistry(store: ProductReader, logger: Logger): McpRegistry {
  const registry = new McpRegistry(logger.child('mcp-registry'));
  registerDemoTools(registry);
  registry.registerResource(createProductsResource(store));
  return registry;
}

/**
 * Create and configure the demo MCP server.
 */
export function createDemoServer(options: DemoServerOptions): Server {
  const logger = options.logger ?? createLogger('mcp-demo');
  const registry = createDemoRegistry(options.store, logger);

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: { listChanged: false },
        resources: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: registry.listTools() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;

    try {
      return await registry.callTool(name, args, { signal: extra.signal });
    } catch (error) {
      logger.warn(`Failed to call ${name}:`, error);
      throw toMcpError(error);
    }
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return { resources: registry.listResources() };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request, extra) => {
    try {
      return await registry.readResource(request.params.uri, { signal: extra.signal });
    } catch (error) {
      logger.error(`Failed to read ${request.params.uri}:`, error);
      throw toMcpError(error);
    }
  });

  return server;
}
