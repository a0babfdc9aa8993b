// Tool System Initialization
// Picks the external MCP provider when a command is configured, else the built-in registry

import { ToolRegistry } from './registry.js';
import { McpToolProvider } from './mcp-provider.js';
import { calculatorTool } from './calculator-tool.js';
import type { ToolProvider } from './types.js';
import { childLogger } from '../../utils/logger.js';

const log = childLogger('tools');

export { ToolRegistry } from './registry.js';
export { McpToolProvider } from './mcp-provider.js';
export type { ContentBlock, ToolCallOptions, ToolDefinition, ToolDescriptor, ToolParameter, ToolProvider, ToolResult } from './types.js';

export function createBuiltinRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(calculatorTool);

  const registered = registry.getAll();
  log.info(`Tool registry initialized with ${registered.length} tool(s): ${registered.map(t => t.name).join(', ')}`);

  return registry;
}

export async function createToolProvider(command?: string): Promise<ToolProvider> {
  const trimmed = command?.trim();
  if (trimmed) {
    return McpToolProvider.connect(trimmed);
  }
  return createBuiltinRegistry();
}
