// Tool Executor
// Runs one requested tool call against the provider and turns the result into
// the text the backend sees as the tool message.

import type { ToolCallRequest } from '../../providers/types.js';
import type { ToolProvider, ToolResult } from '../tools/types.js';
import { AppError, errorMessage } from '../../utils/errors.js';
import { childLogger } from '../../utils/logger.js';

const log = childLogger('tool-executor');

export const DEFAULT_TOOL_TIMEOUT_MS = 30000;

export class ToolExecutor {
  constructor(
    private readonly provider: ToolProvider,
    private readonly timeoutMs: number = DEFAULT_TOOL_TIMEOUT_MS,
  ) {}

  /**
   * Parse arguments, call the tool under the timeout and describe its first
   * content block. Every failure rejects with a tool error for the turn.
   */
  async execute(toolCall: ToolCallRequest): Promise<string> {
    const startTime = Date.now();
    const args = parseToolArguments(toolCall);
    const result = await this.callWithTimeout(toolCall.toolName, args);

    if (result.isError) {
      throw AppError.tool(
        `Tool '${toolCall.toolName}' reported an error: ${describeToolResult(toolCall.toolName, result)}`,
        { tool: toolCall.toolName, content: result.content },
      );
    }

    log.info({ tool: toolCall.toolName, durationMs: Date.now() - startTime }, 'Tool call completed');
    return describeToolResult(toolCall.toolName, result);
  }

  private async callWithTimeout(name: string, args: Record<string, unknown>): Promise<ToolResult> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = AppError.toolTimeout(name, this.timeoutMs);
        controller.abort(error);
        reject(error);
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([this.provider.callTool(name, args, { signal: controller.signal }), timeout]);
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw AppError.tool(`Tool '${name}' failed: ${errorMessage(error)}`, { tool: name }, error);
    } finally {
      clearTimeout(timer);
    }
  }
}

export function parseToolArguments(toolCall: ToolCallRequest): Record<string, unknown> {
  // A call without arguments is sent as an empty string by some backends
  if (!toolCall.arguments.trim()) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(toolCall.arguments);
  } catch (error) {
    throw AppError.tool(
      `Failed to parse tool arguments for '${toolCall.toolName}': ${errorMessage(error)}. Arguments were: ${toolCall.arguments}`,
      { tool: toolCall.toolName, arguments: toolCall.arguments },
      error,
    );
  }

  if (!isRecord(parsed)) {
    throw AppError.tool(
      `Tool arguments for '${toolCall.toolName}' must be a JSON object. Arguments were: ${toolCall.arguments}`,
      { tool: toolCall.toolName, arguments: toolCall.arguments },
    );
  }

  return parsed;
}

/** Only text reaches the model; other kinds become a placeholder. Never empty. */
export function describeToolResult(toolName: string, result: ToolResult): string {
  const first = result.content[0];
  if (!first) {
    return `Tool '${toolName}' returned no content`;
  }

  switch (first.type) {
    case 'text':
      return first.text.trim() ? first.text : `Tool '${toolName}' returned empty result`;
    case 'image':
      return `Tool '${toolName}' returned image content (not supported in text mode)`;
    case 'resource':
      return `Tool '${toolName}' returned resource content (not supported in text mode)`;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
