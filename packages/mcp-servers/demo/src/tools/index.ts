import type { McpRegistry } from '../tool-registry.js';
import { calculateDefinition } from './calculate.js';
import { helloWorldDefinition } from './hello-world.js';

export const DEMO_TOOLS = [helloWorldDefinition, calculateDefinition];

export function registerDemoTools(registry: McpRegistry): void {
  for (const tool of DEMO_TOOLS) {
    registry.registerTool(tool);
  }
}
