// Billing Agent - library entry point

export { ConversationOrchestrator, Conversation, ToolExecutor } from './services/orchestrator/index.js';
export type { OrchestratorOptions, StreamingOutcome, StreamingTurn } from './services/orchestrator/index.js';
export { StreamChannel, type StreamEvent } from './services/stream/channel.js';
export { StreamDecoder } from './services/stream/decoder.js';
export { pumpDeltas } from './services/stream/pipeline.js';
export { ToolCallAssembler } from './services/stream/tool-call-assembler.js';
export { ToolRegistry, McpToolProvider, createBuiltinRegistry, createToolProvider } from './services/tools/index.js';
export type { ContentBlock, ToolDefinition, ToolDescriptor, ToolProvider, ToolResult } from './services/tools/index.js';
export { MistralBackend } from './providers/mistral.js';
export { createMistralBackend, getBackend } from './providers/index.js';
export type { ChatBackend, ChatMessage, ChatOptions, StreamDelta, ToolCallRequest } from './providers/index.js';
export { buildServer, startServer } from './server.js';
export { AppError, ErrorCode } from './utils/errors.js';
