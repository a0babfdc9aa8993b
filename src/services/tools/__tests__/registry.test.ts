import { describe, it, expect, vi } from 'vitest';
import { ToolRegistry } from '../registry.js';
import { textResult, type ToolDefinition } from '../types.js';
import { AppError, ErrorCode } from '../../../utils/errors.js';

describe('Tool Registry', () => {
  it('should register and retrieve tools', () => {
    const registry = new ToolRegistry();

    const testTool: ToolDefinition = {
      name: 'get_invoice',
      description: 'Fetch one invoice',
      parameters: [
        {
          name: 'invoice_id',
          type: 'string',
          description: 'Invoice identifier',
          required: true,
        },
      ],
      execute: async () => textResult('invoice'),
    };

    registry.register(testTool);
    expect(registry.has('get_invoice')).toBe(true);
    expect(registry.get('get_invoice')).toEqual(testTool);
  });

  it('should list all registered tools', () => {
    const registry = new ToolRegistry();

    const tool1: ToolDefinition = {
      name: 'tool1',
      description: 'Tool 1',
      parameters: [],
      execute: async () => textResult(''),
    };

    const tool2: ToolDefinition = {
      name: 'tool2',
      description: 'Tool 2',
      parameters: [],
      execute: async () => textResult(''),
    };

    registry.register(tool1);
    registry.register(tool2);

    const allTools = registry.getAll();
    expect(allTools.length).toBe(2);
    expect(allTools.map(t => t.name)).toContain('tool1');
    expect(allTools.map(t => t.name)).toContain('tool2');
  });

  it('should describe tools with a JSON schema', async () => {
    const registry = new ToolRegistry();

    registry.register({
      name: 'list_invoices',
      description: 'List invoices',
      parameters: [
        {
          name: 'customer_external_id',
          type: 'string',
          description: 'Customer external id',
          required: true,
        },
        {
          name: 'status',
          type: 'string',
          description: 'Invoice status',
          required: false,
          enum: ['draft', 'finalized', 'voided'],
        },
        {
          name: 'per_page',
          type: 'integer',
          description: 'Page size',
          required: false,
          default: 20,
        },
      ],
      execute: async () => textResult(''),
    });

    expect(await registry.listTools()).toEqual([
      {
        name: 'list_invoices',
        description: 'List invoices',
        inputSchema: {
          type: 'object',
          properties: {
            customer_external_id: { type: 'string', description: 'Customer external id' },
            status: { type: 'string', description: 'Invoice status', enum: ['draft', 'finalized', 'voided'] },
            per_page: { type: 'integer', description: 'Page size', default: 20 },
          },
          required: ['customer_external_id'],
        },
      },
    ]);
  });

  it('should call a registered tool with its arguments', async () => {
    const registry = new ToolRegistry();
    registry.register({
      name: 'echo',
      description: 'Echo the input',
      parameters: [],
      execute: async args => textResult(JSON.stringify(args)),
    });

    expect(await registry.callTool('echo', { value: 1 })).toEqual(textResult('{"value":1}'));
  });

  it('should fail explicitly for unknown tools', async () => {
    const registry = new ToolRegistry();

    const error = await registry.callTool('missing', {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AppError);
    if (!(error instanceof AppError)) return;
    expect(error.code).toBe(ErrorCode.TOOL_ERROR);
    expect(error.message).toBe('Unknown tool: missing');
  });

  it('should not run a tool once the call was aborted', async () => {
    const registry = new ToolRegistry();
    const execute = vi.fn(async () => textResult('late'));
    registry.register({ name: 'slow', description: 'Slow tool', parameters: [], execute });
    const controller = new AbortController();
    controller.abort(new Error('caller stopped waiting'));

    await expect(registry.callTool('slow', {}, { signal: controller.signal })).rejects.toThrow('caller stopped waiting');
    expect(execute).not.toHaveBeenCalled();
  });

  it('should handle tool overwriting', () => {
    const registry = new ToolRegistry();

    const tool1: ToolDefinition = {
      name: 'tool',
      description: 'Version 1',
      parameters: [],
      execute: async () => textResult('v1'),
    };

    const tool2: ToolDefinition = {
      name: 'tool',
      description: 'Version 2',
      parameters: [],
      execute: async () => textResult('v2'),
    };

    registry.register(tool1);
    registry.register(tool2);

    expect(registry.getAll().length).toBe(1);
    const tool = registry.get('tool');
    expect(tool?.description).toBe('Version 2');
  });
});
