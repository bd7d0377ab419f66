/**
 * Demo Server Tests
 *
 * Drives the server through a real MCP client over an in-process transport.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { DispatchError, StoreError } from '@mcp-demo/shared';
import { createDemoServer, toMcpError } from '../src/server-setup.js';
import { ProductStore } from '../src/storage.js';
import { SEEDED_PRODUCTS_JSON, createSilentLogger, fixedClock } from './helpers.js';

describe('Demo MCP server', () => {
  let store: ProductStore;
  let server: Server;
  let client: Client;

  beforeEach(async () => {
    store = new ProductStore({ dbPath: ':memory:', now: fixedClock, logger: createSilentLogger() });
    store.seedIfEmpty();
    server = createDemoServer({ store, logger: createSilentLogger() });
    client = new Client({ name: 'demo-test-client', version: '0.0.0' });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    store.close();
  });

  it('should identify itself', () => {
    expect(client.getServerVersion()).toMatchObject({ name: 'Demo', version: '1.0.0' });
  });

  describe('tools/list', () => {
    it('should list hello_world and calculate', async () => {
      const { tools } = await client.listTools();

      expect(tools.map((tool) => tool.name)).toEqual(['hello_world', 'calculate']);
    });

    it('should advertise the calculate parameters', async () => {
      const { tools } = await client.listTools();
      const calculate = tools.find((tool) => tool.name === 'calculate');

      expect(calculate?.description).toBe('Perform basic arithmetic operations');
      expect(calculate?.inputSchema).toEqual({
        type: 'object',
        properties: {
          operation: {
            type: 'string',
            enum: ['add', 'subtract', 'multiply', 'divide'],
            description: 'The operation to perform (add, subtract, multiply, divide)',
          },
          x: { type: 'number', description: 'First number' },
          y: { type: 'number', description: 'Second number' },
        },
        required: ['operation', 'x', 'y'],
      });
    });

    it('should advertise the hello_world parameter', async () => {
      const { tools } = await client.listTools();
      const hello = tools.find((tool) => tool.name === 'hello_world');

      expect(hello?.inputSchema).toEqual({
        type: 'object',
        properties: { name: { type: 'string', description: 'Name of the person to greet' } },
        required: ['name'],
      });
    });
  });

  describe('tools/call', () => {
    it('should greet Ada', async () => {
      const result = await client.callTool({ name: 'hello_world', arguments: { name: 'Ada' } });

      expect(result).toMatchObject({ content: [{ type: 'text', text: 'Hello, Ada!' }] });
    });

    it('should multiply 3 by 4', async () => {
      const result = await client.callTool({ name: 'calculate', arguments: { operation: 'multiply', x: 3, y: 4 } });

      expect(result).toMatchObject({ content: [{ type: 'text', text: '12.00' }] });
    });

    it('should report division by zero as a tool error', async () => {
      const result = await client.callTool({ name: 'calculate', arguments: { operation: 'divide', x: 5, y: 0 } });

      expect(result).toMatchObject({
        content: [{ type: 'text', text: 'cannot divide by zero' }],
        isError: true,
      });
    });

    it('should let the handler reject an operation outside the enum', async () => {
      const result = await client.callTool({ name: 'calculate', arguments: { operation: 'modulo', x: 5, y: 2 } });

      expect(result).toMatchObject({
        content: [{ type: 'text', text: 'unsupported operation: modulo' }],
        isError: true,
      });
    });

    it('should report a missing name', async () => {
      const result = await client.callTool({ name: 'hello_world', arguments: {} });

      expect(result).toMatchObject({
        content: [{ type: 'text', text: 'required argument "name" not found' }],
        isError: true,
      });
    });

    it('should reject an unknown tool with InvalidParams', async () => {
      await expect(client.callTool({ name: 'nope', arguments: {} })).rejects.toMatchObject({
        code: ErrorCode.InvalidParams,
        message: expect.stringContaining('Unknown tool: nope'),
      });
    });

    it('should keep serving after an unknown tool', async () => {
      await expect(client.callTool({ name: 'nope', arguments: {} })).rejects.toBeInstanceOf(McpError);

      const result = await client.callTool({ name: 'hello_world', arguments: { name: 'Ada' } });
      expect(result).toMatchObject({ content: [{ type: 'text', text: 'Hello, Ada!' }] });
    });

    it('should echo an email-like operation unredacted', async () => {
      const result = await client.callTool({
        name: 'calculate',
        arguments: { operation: 'admin@example.com', x: 1, y: 2 },
      });

      expect(result).toMatchObject({
        content: [{ type: 'text', text: 'unsupported operation: admin@example.com' }],
        isError: true,
      });
    });
  });

  describe('resources', () => {
    it('should list the products resource', async () => {
      const { resources } = await client.listResources();

      expect(resources).toEqual([
        {
          uri: 'products://list',
          name: 'Product List',
          description: 'Lists all available products',
          mimeType: 'application/json',
        },
      ]);
    });

    it('should read the seeded products', async () => {
      const { contents } = await client.readResource({ uri: 'products://list' });

      expect(contents).toEqual([
        { uri: 'products://list', mimeType: 'application/json', text: SEEDED_PRODUCTS_JSON },
      ]);
    });

    it('should reject an unknown resource with InvalidParams', async () => {
      await expect(client.readResource({ uri: 'products://missing' })).rejects.toMatchObject({
        code: ErrorCode.InvalidParams,
      });
    });

    it('should surface a store failure as an internal error without stopping the server', async () => {
      store.close();

      await expect(client.readResource({ uri: 'products://list' })).rejects.toMatchObject({
        code: ErrorCode.InternalError,
      });

      const result = await client.callTool({ name: 'hello_world', arguments: { name: 'Ada' } });
      expect(result).toMatchObject({ content: [{ type: 'text', text: 'Hello, Ada!' }] });

      store = new ProductStore({ dbPath: ':memory:', logger: createSilentLogger() });
    });
  });
});

describe('toMcpError', () => {
  it('should map unknown names to InvalidParams', () => {
    const error = toMcpError(new DispatchError('UnknownName', 'x://y', 'Unknown resource: x://y'));

    expect(error).toBeInstanceOf(McpError);
    expect(error.code).toBe(ErrorCode.InvalidParams);
  });

  it('should map store failures to InternalError', () => {
    const error = toMcpError(new StoreError('RetrievalError', 'failed to retrieve products: locked'));

    expect(error.code).toBe(ErrorCode.InternalError);
    expect(error.message).toContain('failed to retrieve products: locked');
  });

  it('should pass protocol errors through', () => {
    const original = new McpError(ErrorCode.InvalidRequest, 'bad');

    expect(toMcpError(original)).toBe(original);
  });
});
