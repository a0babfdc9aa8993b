// MCP tool provider
// Launches the external tool-provider command and talks MCP over its stdio

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { Stream } from 'node:stream';
import { z } from 'zod';
import type { ContentBlock, ToolCallOptions, ToolDescriptor, ToolProvider, ToolResult } from './types.js';
import { AppError, errorMessage } from '../../utils/errors.js';
import { childLogger } from '../../utils/logger.js';

const log = childLogger('mcp-provider');

const MAX_STDERR_LINE = 8192;

const McpContentSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('image'), data: z.string(), mimeType: z.string() }),
  z.object({
    type: z.literal('resource'),
    resource: z.object({ uri: z.string(), mimeType: z.string().optional() }),
  }),
  z.object({ type: z.literal('resource_link'), uri: z.string(), mimeType: z.string().optional() }),
  z.object({ type: z.literal('audio'), mimeType: z.string() }),
]);

const McpCallResultSchema = z.object({
  content: z.array(z.unknown()).default([]),
  isError: z.boolean().optional(),
});

type McpContent = z.infer<typeof McpContentSchema>;

/**
 * Narrow the server's content blocks to the agent's closed union. Kinds the
 * agent has no shape for become a text note instead of disappearing.
 */
export function toContentBlocks(items: unknown[]): ContentBlock[] {
  return items.map((item): ContentBlock => {
    const parsed = McpContentSchema.safeParse(item);
    if (!parsed.success) {
      return { type: 'text', text: `Unsupported content block: ${JSON.stringify(item)}` };
    }
    return fromMcpContent(parsed.data);
  });
}

function fromMcpContent(content: McpContent): ContentBlock {
  switch (content.type) {
    case 'text':
      return { type: 'text', text: content.text };
    case 'image':
      return { type: 'image', data: content.data, mimeType: content.mimeType };
    case 'resource':
      return { type: 'resource', uri: content.resource.uri, mimeType: content.resource.mimeType };
    case 'resource_link':
      return { type: 'resource', uri: content.uri, mimeType: content.mimeType };
    case 'audio':
      return { type: 'text', text: `Unsupported audio content (${content.mimeType})` };
  }
}

/**
 * Read the provider's stderr line by line. An unread pipe fills up and blocks
 * a provider that logs synchronously.
 */
export function forwardStderr(stream: Stream | null, onLine: (line: string) => void): void {
  if (!stream) return;

  const decoder = new TextDecoder();
  let pending = '';

  const emit = (line: string) => {
    const trimmed = line.endsWith('\r') ? line.slice(0, -1) : line;
    if (trimmed.trim()) onLine(trimmed);
  };

  stream.on('data', (chunk: Uint8Array | string) => {
    pending += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
    const lines = pending.split('\n');
    pending = lines.pop() ?? '';
    lines.forEach(emit);

    if (pending.length > MAX_STDERR_LINE) {
      emit(pending);
      pending = '';
    }
  });

  stream.on('end', () => {
    pending += decoder.decode();
    emit(pending);
    pending = '';
  });
}

export interface McpToolProviderOptions {
  clientName?: string;
  clientVersion?: string;
}

export class McpToolProvider implements ToolProvider {
  private knownTools: Set<string> | null = null;

  private constructor(
    private readonly command: string,
    private readonly client: Client,
  ) {}

  /** Spawn `sh -c <command>` and complete the MCP handshake. */
  static async connect(command: string, options: McpToolProviderOptions = {}): Promise<McpToolProvider> {
    const transport = new StdioClientTransport({
      command: 'sh',
      args: ['-c', command],
      stderr: 'pipe',
    });
    forwardStderr(transport.stderr, line => log.debug({ command }, line));

    return McpToolProvider.fromTransport(transport, command, options);
  }

  /** Complete the handshake over an already built transport; `command` labels logs and errors. */
  static async fromTransport(
    transport: Transport,
    command: string,
    options: McpToolProviderOptions = {},
  ): Promise<McpToolProvider> {
    const client = new Client(
      { name: options.clientName ?? 'billing-agent', version: options.clientVersion ?? '0.1.0' },
      { capabilities: {} },
    );

    try {
      await client.connect(transport);
    } catch (error) {
      throw AppError.tool(
        `Failed to initialize tool provider with command '${command}': ${errorMessage(error)}`,
        { command },
        error,
      );
    }

    log.info({ command }, 'Connected to tool provider');
    return new McpToolProvider(command, client);
  }

  async listTools(): Promise<ToolDescriptor[]> {
    const { tools } = await this.client.listTools();
    this.knownTools = new Set(tools.map(t => t.name));

    return tools.map(tool => ({
      name: tool.name,
      description: tool.description,
      inputSchema: { ...tool.inputSchema },
    }));
  }

  async callTool(name: string, args: Record<string, unknown>, options: ToolCallOptions = {}): Promise<ToolResult> {
    const knownTools = this.knownTools ?? (await this.loadToolNames());
    if (!knownTools.has(name)) {
      throw AppError.tool(`Unknown tool: ${name}`, { tool: name });
    }

    let raw: unknown;
    try {
      raw = await this.client.callTool({ name, arguments: args }, undefined, { signal: options.signal });
    } catch (error) {
      throw AppError.tool(`Tool '${name}' failed: ${errorMessage(error)}`, { tool: name }, error);
    }

    const parsed = McpCallResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw AppError.protocol(
        `Tool provider returned an unexpected result for '${name}'`,
        JSON.stringify(raw),
        parsed.error,
      );
    }

    return {
      content: toContentBlocks(parsed.data.content),
      isError: parsed.data.isError ?? false,
    };
  }

  private async loadToolNames(): Promise<Set<string>> {
    const tools = await this.listTools();
    return new Set(tools.map(t => t.name));
  }

  async close(): Promise<void> {
    log.debug({ command: this.command }, 'Closing tool provider');
    await this.client.close();
  }
}
