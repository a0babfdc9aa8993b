// Tool system types and interfaces
// The agent only sees tools through ToolProvider; where they run is up to the provider

export type ContentBlock =
  | { type: 'text'; text: string }
  | { type: 'image'; data: string; mimeType: string }
  | { type: 'resource'; uri: string; mimeType?: string };

export interface ToolResult {
  content: ContentBlock[];
  isError: boolean;
}

export interface ToolDescriptor {
  name: string;
  description?: string;
  inputSchema: Record<string, unknown>;
}

export interface ToolCallOptions {
  /** Aborted when the caller stops waiting, e.g. on timeout. */
  signal?: AbortSignal;
}

export interface ToolProvider {
  listTools(): Promise<ToolDescriptor[]>;
  /** Must reject for unknown tool names. */
  callTool(name: string, args: Record<string, unknown>, options?: ToolCallOptions): Promise<ToolResult>;
  close?(): Promise<void>;
}

export interface ToolParameter {
  name: string;
  type: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
  description: string;
  required: boolean;
  enum?: string[]; // For enum types
  default?: unknown;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameter[];
  execute: (args: Record<string, unknown>) => Promise<ToolResult>;
}

export function textResult(text: string, isError = false): ToolResult {
  return { content: [{ type: 'text', text }], isError };
}
