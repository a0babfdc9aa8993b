// Tool Registry - in-process tool provider
// Tools are registered on startup and described to the backend as JSON schema

import type {
  ToolCallOptions,
  ToolDefinition,
  ToolDescriptor,
  ToolParameter,
  ToolProvider,
  ToolResult,
} from './types.js';
import { AppError } from '../../utils/errors.js';
import { childLogger } from '../../utils/logger.js';

const log = childLogger('tool-registry');

export interface JsonObjectSchema {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required: string[];
}

export class ToolRegistry implements ToolProvider {
  private tools: Map<string, ToolDefinition> = new Map();

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      log.warn(`Tool "${tool.name}" already registered, overwriting`);
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  async listTools(): Promise<ToolDescriptor[]> {
    return this.getAll().map(tool => ({
      name: tool.name,
      description: tool.description,
      inputSchema: { ...this.toJsonSchema(tool.parameters) },
    }));
  }

  async callTool(name: string, args: Record<string, unknown>, options: ToolCallOptions = {}): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw AppError.tool(`Unknown tool: ${name}`, { tool: name });
    }
    options.signal?.throwIfAborted();
    return tool.execute(args);
  }

  toJsonSchema(params: ToolParameter[]): JsonObjectSchema {
    const properties: Record<string, Record<string, unknown>> = {};

    for (const param of params) {
      const paramSchema: Record<string, unknown> = {
        type: param.type,
        description: param.description,
      };

      if (param.enum) {
        paramSchema.enum = param.enum;
      }

      if (param.default !== undefined) {
        paramSchema.default = param.default;
      }

      properties[param.name] = paramSchema;
    }

    return {
      type: 'object',
      properties,
      required: params.filter(p => p.required).map(p => p.name),
    };
  }
}
