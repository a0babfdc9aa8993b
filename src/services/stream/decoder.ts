// Streaming decoder
// Turns raw chunks of a `data: <json>` line stream into StreamDeltas.
// Network reads do not line up with records, so the tail of every chunk is
// carried over until its newline arrives.

import { z } from 'zod';
import type { StreamDelta, ToolCallRequest } from '../../providers/types.js';
import type { FramePolicy } from '../../env.js';
import { AppError } from '../../utils/errors.js';
import { childLogger } from '../../utils/logger.js';

const log = childLogger('stream-decoder');

const DATA_PREFIX = 'data:';
const DONE_SENTINEL = '[DONE]';

const ToolCallFragmentSchema = z.object({
  index: z.number().int().nonnegative().nullish(),
  id: z.string().nullish(),
  function: z
    .object({
      name: z.string().nullish(),
      // Some backends send already-parsed arguments
      arguments: z.union([z.string(), z.record(z.unknown())]).nullish(),
    })
    .nullish(),
});

const StreamFrameSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z
          .object({
            content: z.string().nullish(),
            tool_calls: z.array(ToolCallFragmentSchema).nullish(),
          })
          .nullish(),
        finish_reason: z.string().nullish(),
      }),
    )
    .nullish(),
});

type StreamFrame = z.infer<typeof StreamFrameSchema>;

export interface StreamDecoderOptions {
  /** `lenient` drops frames that fail to parse, `strict` throws a protocol error. */
  policy?: FramePolicy;
}

export class StreamDecoder {
  private buffer = '';
  private closed = false;
  private readonly textDecoder = new TextDecoder();
  private readonly policy: FramePolicy;

  constructor(options: StreamDecoderOptions = {}) {
    this.policy = options.policy ?? 'lenient';
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Decode one network read. Returns one delta per complete record; an
   * unterminated trailing record waits for the next call.
   */
  feed(chunk: Uint8Array | string): StreamDelta[] {
    if (this.closed) return [];

    this.buffer += typeof chunk === 'string' ? chunk : this.textDecoder.decode(chunk, { stream: true });
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';

    return this.decodeLines(lines);
  }

  /**
   * Flush whatever is left when the transport closes. A final record without
   * its newline is still decoded.
   */
  end(): StreamDelta[] {
    if (this.closed) return [];

    const rest = this.buffer + this.textDecoder.decode();
    this.buffer = '';
    return rest ? this.decodeLines([rest]) : [];
  }

  private decodeLines(lines: string[]): StreamDelta[] {
    const deltas: StreamDelta[] = [];

    for (const line of lines) {
      const delta = this.decodeRecord(line);
      if (delta) deltas.push(delta);
      if (this.closed) {
        this.buffer = '';
        break;
      }
    }

    return deltas;
  }

  private decodeRecord(rawLine: string): StreamDelta | null {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;

    // Blank separators, `:` heartbeats and other SSE fields carry no data
    if (!line.startsWith(DATA_PREFIX)) return null;

    let data = line.slice(DATA_PREFIX.length);
    if (data.startsWith(' ')) data = data.slice(1);
    if (!data.trim()) return null;

    if (data.trim() === DONE_SENTINEL) {
      this.closed = true;
      return { done: true };
    }

    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch (error) {
      return this.reject('Malformed stream frame', data, error);
    }

    const parsed = StreamFrameSchema.safeParse(json);
    if (!parsed.success) {
      return this.reject('Unrecognised stream frame', data, parsed.error);
    }

    return toDelta(parsed.data);
  }

  private reject(reason: string, payload: string, cause: unknown): null {
    if (this.policy === 'strict') {
      throw AppError.protocol(`${reason}: ${payload}`, payload, cause);
    }
    log.debug({ payload }, `${reason}, skipping`);
    return null;
  }
}

function toDelta(frame: StreamFrame): StreamDelta {
  const delta: StreamDelta = {};
  const choice = frame.choices?.[0];
  if (!choice) return delta;

  const content = choice.delta?.content;
  if (content) {
    delta.text = content;
  }

  const toolCalls = choice.delta?.tool_calls;
  if (toolCalls && toolCalls.length > 0) {
    delta.toolCallFragments = toolCalls.map((fragment): ToolCallRequest => {
      const args = fragment.function?.arguments;
      const request: ToolCallRequest = {
        id: fragment.id ?? '',
        toolName: fragment.function?.name ?? '',
        arguments: typeof args === 'string' ? args : args ? JSON.stringify(args) : '',
      };
      if (fragment.index !== null && fragment.index !== undefined) {
        request.streamIndex = fragment.index;
      }
      return request;
    });
  }

  if (choice.finish_reason) {
    delta.finishReason = choice.finish_reason;
  }

  return delta;
}
