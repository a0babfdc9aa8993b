// Streaming delivery pipeline
// Producer loop that owns the backend stream and forwards decoded text to a
// StreamChannel. Ends with exactly one `complete` or `error` event unless the
// consumer disconnects first.

import type { StreamDelta, ToolCallRequest } from '../../providers/types.js';
import { errorMessage } from '../../utils/errors.js';
import { childLogger } from '../../utils/logger.js';
import type { StreamChannel, StreamEvent } from './channel.js';
import { ToolCallAssembler } from './tool-call-assembler.js';

const log = childLogger('stream-pipeline');

export type PumpStatus = 'completed' | 'failed' | 'cancelled';

export interface PumpOutcome {
  status: PumpStatus;
  text: string;
  toolCalls: ToolCallRequest[];
  error?: unknown;
}

export type DeltaSource = (signal: AbortSignal) => AsyncIterable<StreamDelta>;

export interface PumpOptions {
  /** Runs after the stream ended naturally, before `complete` is delivered. */
  onComplete?: (outcome: PumpOutcome) => Promise<void> | void;
}

export async function pumpDeltas(
  openStream: DeltaSource,
  channel: StreamChannel<StreamEvent>,
  options: PumpOptions = {},
): Promise<PumpOutcome> {
  const controller = new AbortController();
  const assembler = new ToolCallAssembler();
  let text = '';

  const cancelled = (): PumpOutcome => {
    log.debug({ receivedChars: text.length }, 'Consumer disconnected, stream stopped');
    return { status: 'cancelled', text, toolCalls: assembler.complete() };
  };

  channel.onClose(() => controller.abort());

  try {
    for await (const delta of openStream(controller.signal)) {
      if (delta.text) {
        if (!channel.push({ type: 'chunk', text: delta.text })) {
          controller.abort();
          return cancelled();
        }
        text += delta.text;
      }

      assembler.accept(delta.toolCallFragments);

      if (delta.done) break;
    }
  } catch (error) {
    if (channel.isClosed) {
      return cancelled();
    }
    return fail(channel, error, text, assembler.complete());
  }

  if (channel.isClosed) {
    return cancelled();
  }

  const outcome: PumpOutcome = { status: 'completed', text, toolCalls: assembler.complete() };

  try {
    await options.onComplete?.(outcome);
  } catch (error) {
    return fail(channel, error, text, outcome.toolCalls);
  }

  channel.push({ type: 'complete' });
  channel.finish();
  return outcome;
}

function fail(
  channel: StreamChannel<StreamEvent>,
  error: unknown,
  text: string,
  toolCalls: ToolCallRequest[],
): PumpOutcome {
  const message = errorMessage(error);
  log.error({ err: error }, 'Stream failed');
  channel.push({ type: 'error', message });
  channel.finish();
  return { status: 'failed', text, toolCalls, error };
}
