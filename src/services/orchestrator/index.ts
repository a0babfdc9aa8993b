// Orchestrator Module - Main exports

export { ConversationOrchestrator } from './orchestrator.js';
export { Conversation } from './conversation.js';
export { ToolExecutor, DEFAULT_TOOL_TIMEOUT_MS, describeToolResult, parseToolArguments } from './executor.js';
export type { OrchestratorOptions, StreamingOutcome, StreamingTurn } from './types.js';
