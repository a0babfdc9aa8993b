// Orchestrator Types

import type { ToolCallRequest } from '../../providers/types.js';
import type { StreamChannel, StreamEvent } from '../stream/channel.js';
import type { PumpStatus } from '../stream/pipeline.js';

export interface OrchestratorOptions {
  model?: string;
  maxTokens?: number;
  toolTimeoutMs?: number;
  systemPrompt?: string;
  finalAnswerPrompt?: string;
  streamingPrompt?: string;
}

export interface StreamingOutcome {
  status: PumpStatus;
  text: string;
  /** Tool calls the backend requested mid-stream; the streaming path does not run them. */
  ignoredToolCalls: ToolCallRequest[];
  error?: unknown;
}

export interface StreamingTurn {
  events: StreamChannel<StreamEvent>;
  /** Settles once the producer has stopped; never rejects. */
  result: Promise<StreamingOutcome>;
}
