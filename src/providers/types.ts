// Backend interface for the billing agent
// Chat messages, tool-call requests and stream deltas shared by every layer

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ToolCallRequest {
  id: string;
  toolName: string;
  arguments: string; // raw JSON text
  streamIndex?: number; // position correlation for streamed fragments
}

/**
 * One conversation entry. `toolCalls` only appears on assistant messages that
 * requested tools, `toolCallId` only on tool results.
 */
export type ChatMessage = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export interface SystemMessage {
  role: 'system';
  content: string;
}

export interface UserMessage {
  role: 'user';
  content: string;
}

export interface AssistantMessage {
  role: 'assistant';
  content: string;
  toolCalls?: ToolCallRequest[];
}

export interface ToolMessage {
  role: 'tool';
  content: string;
  toolCallId: string;
}

export interface BackendToolDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface ChatOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
  tools?: BackendToolDefinition[];
  toolChoice?: 'auto' | 'none';
}

/**
 * One parsed stream frame. Absent fields mean "nothing of that kind in this
 * frame"; `done` is set only on the terminal delta.
 */
export interface StreamDelta {
  text?: string;
  toolCallFragments?: ToolCallRequest[];
  finishReason?: string;
  done?: true;
}

export interface ChatBackend {
  name: string;
  sendChat(messages: ChatMessage[], options?: ChatOptions): Promise<AssistantMessage>;
  streamChat(messages: ChatMessage[], options?: ChatOptions): AsyncIterable<StreamDelta>;
}
