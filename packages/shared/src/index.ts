/**
 * MCP Demo Shared Types and Utilities
 *
 * Common types, schemas, and helpers used across the demo packages.
 */

export * from './arguments.js';
export * from './errors.js';
export * from './logger.js';
export * from './mcp-utils.js';
export * from './types.js';
export * from './validation.js';
