// Mistral chat-completion backend
// Direct REST calls against the OpenAI-compatible /chat/completions endpoint

import { z } from 'zod';
import type {
  AssistantMessage,
  BackendToolDefinition,
  ChatBackend,
  ChatMessage,
  ChatOptions,
  StreamDelta,
  ToolCallRequest,
} from './types.js';
import type { FramePolicy } from '../env.js';
import { StreamDecoder } from '../services/stream/decoder.js';
import { AppError, errorMessage } from '../utils/errors.js';
import { childLogger } from '../utils/logger.js';

const log = childLogger('mistral');

export interface MistralBackendConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
  framePolicy: FramePolicy;
}

interface WireToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

interface WireMessage {
  role: ChatMessage['role'];
  content: string;
  tool_calls?: WireToolCall[];
  tool_call_id?: string;
}

interface ChatCompletionRequestBody {
  model: string;
  messages: WireMessage[];
  temperature: number;
  max_tokens: number;
  tools?: BackendToolDefinition[];
  tool_choice?: 'auto' | 'none';
  stream: boolean;
}

const WireToolCallSchema = z.object({
  id: z.string().nullish(),
  function: z.object({
    name: z.string(),
    arguments: z.union([z.string(), z.record(z.unknown())]),
  }),
});

const ChatCompletionResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullish(),
        tool_calls: z.array(WireToolCallSchema).nullish(),
      }),
      finish_reason: z.string().nullish(),
    }),
  ),
});

// Streamed answers are sampled cooler than one-shot answers
const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_STREAM_TEMPERATURE = 0.3;

export class MistralBackend implements ChatBackend {
  name = 'mistral';

  constructor(private readonly config: MistralBackendConfig) {}

  async sendChat(messages: ChatMessage[], options: ChatOptions = {}): Promise<AssistantMessage> {
    const body = this.buildRequest(messages, options, false);
    const deadline = this.deadline(options.signal);

    let raw: string;
    try {
      const response = await this.post(body, deadline.signal);
      raw = await response.text().catch((error: unknown) => {
        throw this.transportError(error, deadline.signal);
      });
    } finally {
      deadline.dispose();
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw AppError.protocol(
        `Failed to parse backend response: ${errorMessage(error)}. Response was: ${raw}`,
        raw,
        error,
      );
    }

    const parsed = ChatCompletionResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw AppError.protocol(
        `Unexpected backend response shape: ${parsed.error.message}. Response was: ${raw}`,
        raw,
        parsed.error,
      );
    }

    const choice = parsed.data.choices[0];
    if (!choice) {
      throw AppError.protocol('No response from backend', raw);
    }

    const message: AssistantMessage = {
      role: 'assistant',
      content: choice.message.content ?? '',
    };

    const toolCalls = choice.message.tool_calls ?? [];
    if (toolCalls.length > 0) {
      message.toolCalls = toolCalls.map((tc, i): ToolCallRequest => ({
        id: tc.id || `call_${i}`,
        toolName: tc.function.name,
        arguments:
          typeof tc.function.arguments === 'string'
            ? tc.function.arguments
            : JSON.stringify(tc.function.arguments),
      }));
    }

    return message;
  }

  async *streamChat(messages: ChatMessage[], options: ChatOptions = {}): AsyncIterable<StreamDelta> {
    const body = this.buildRequest(messages, options, true);
    const deadline = this.deadline(options.signal);

    try {
      const response = await this.post(body, deadline.signal);
      if (!response.body) {
        throw AppError.transport('Backend returned no response body');
      }

      const decoder = new StreamDecoder({ policy: this.config.framePolicy });
      const reader = response.body.getReader();

      try {
        while (true) {
          const read = await reader.read().catch((error: unknown) => {
            throw this.transportError(error, deadline.signal);
          });
          if (read.done) break;

          for (const delta of decoder.feed(read.value)) {
            yield delta;
            if (delta.done) return;
          }
        }

        yield* decoder.end();
      } finally {
        await reader.cancel().catch((error: unknown) => {
          log.debug({ err: error }, 'Stream reader cancel failed');
        });
      }
    } finally {
      deadline.dispose();
    }
  }

  private buildRequest(
    messages: ChatMessage[],
    options: ChatOptions,
    stream: boolean,
  ): ChatCompletionRequestBody {
    const body: ChatCompletionRequestBody = {
      model: options.model || this.config.model,
      messages: this.formatMessages(messages),
      temperature: options.temperature ?? (stream ? DEFAULT_STREAM_TEMPERATURE : DEFAULT_TEMPERATURE),
      max_tokens: options.maxTokens ?? this.config.maxTokens,
      stream,
    };

    if (options.tools && options.tools.length > 0) {
      body.tools = options.tools;
      body.tool_choice = options.toolChoice || 'auto';
    }

    return body;
  }

  private formatMessages(messages: ChatMessage[]): WireMessage[] {
    return messages.map((m): WireMessage => {
      switch (m.role) {
        case 'assistant': {
          const formatted: WireMessage = { role: m.role, content: m.content };
          if (m.toolCalls && m.toolCalls.length > 0) {
            formatted.tool_calls = m.toolCalls.map((tc): WireToolCall => ({
              id: tc.id,
              type: 'function',
              function: {
                name: tc.toolName,
                arguments: tc.arguments,
              },
            }));
          }
          return formatted;
        }
        case 'tool':
          return { role: m.role, content: m.content, tool_call_id: m.toolCallId };
        default:
          return { role: m.role, content: m.content };
      }
    });
  }

  private async post(body: ChatCompletionRequestBody, signal: AbortSignal): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(`${this.config.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          'Content-Type': 'application/json',
          Accept: body.stream ? 'text/event-stream' : 'application/json',
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      throw this.transportError(error, signal);
    }

    if (!response.ok) {
      const error = await response.text().catch((readError: unknown) => {
        log.debug({ err: readError }, 'Could not read backend error body');
        return '';
      });
      throw AppError.transport(`Backend API error (${response.status}): ${error}`, {
        status: response.status,
        body: error,
      });
    }

    return response;
  }

  /**
   * Explicit deadline for the whole call, streamed body included. A caller
   * signal aborts the request as well.
   */
  private deadline(external?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(AppError.transport(`Backend request timed out after ${this.config.timeoutMs} ms`));
    }, this.config.timeoutMs);

    const onAbort = () => controller.abort(external?.reason);
    if (external?.aborted) {
      onAbort();
    } else {
      external?.addEventListener('abort', onAbort, { once: true });
    }

    return {
      signal: controller.signal,
      dispose: () => {
        clearTimeout(timer);
        external?.removeEventListener('abort', onAbort);
      },
    };
  }

  private transportError(error: unknown, signal: AbortSignal): AppError {
    if (error instanceof AppError) return error;
    if (signal.aborted && signal.reason instanceof AppError) return signal.reason;
    return AppError.transport(`Backend request failed: ${errorMessage(error)}`, undefined, error);
  }
}
