/**
 * Chat Completions Route - OpenAI-compatible facade over the agent
 * Each request runs one turn of the shared conversation.
 */

import { randomUUID } from 'node:crypto';
import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { ConversationOrchestrator } from '../services/orchestrator/index.js';
import type { StreamEvent } from '../services/stream/channel.js';
import { requireBearerSchemeIfPresent } from '../security/route-guards.js';
import { AppError, formatErrorResponse } from '../utils/errors.js';
import { estimateUsage } from '../utils/token-counter.js';

const ContentPartSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
});

const ChatCompletionRequestSchema = z.object({
  model: z.string().optional(),
  messages: z
    .array(
      z.object({
        role: z.enum(['system', 'user', 'assistant', 'tool']),
        content: z.union([z.string(), z.array(ContentPartSchema)]).nullish(),
      }),
    )
    .min(1),
  stream: z.boolean().optional(),
  max_tokens: z.number().int().positive().optional(),
  temperature: z.number().optional(),
});

type ChatCompletionRequest = z.infer<typeof ChatCompletionRequestSchema>;
type RequestContent = ChatCompletionRequest['messages'][number]['content'];

export interface ChatCompletionRouteOptions {
  orchestrator: ConversationOrchestrator;
  model: string;
}

/** Flatten string or text-part content into plain text; non-text parts are skipped. */
export function contentText(content: RequestContent): string {
  if (content == null) return '';
  if (typeof content === 'string') return content;
  return content
    .filter(part => part.type === 'text' && typeof part.text === 'string')
    .map(part => part.text ?? '')
    .join('');
}

export function lastUserMessage(messages: ChatCompletionRequest['messages']): string | undefined {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message?.role === 'user') {
      return contentText(message.content);
    }
  }
  return undefined;
}

export const chatCompletionRoutes: FastifyPluginAsync<ChatCompletionRouteOptions> = async (server, opts) => {
  const { orchestrator } = opts;

  // POST /v1/chat/completions
  server.post('/chat/completions', async (request, reply) => {
    if (!requireBearerSchemeIfPresent(request, reply)) {
      return reply;
    }

    const parsed = ChatCompletionRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply
        .code(400)
        .send(formatErrorResponse(AppError.badRequest('Invalid request body', parsed.error.flatten()), true));
    }
    const body = parsed.data;

    const input = lastUserMessage(body.messages);
    if (input === undefined || !input.trim()) {
      return reply.code(400).send(formatErrorResponse(AppError.badRequest('No user message found')));
    }

    const id = `chatcmpl-${randomUUID()}`;
    const created = Math.floor(Date.now() / 1000);
    const model = body.model ?? opts.model;

    if (!body.stream) {
      const answer = await orchestrator.ask(input);
      return {
        id,
        object: 'chat.completion',
        created,
        model,
        choices: [
          {
            index: 0,
            message: { role: 'assistant', content: answer },
            finish_reason: 'stop',
          },
        ],
        usage: estimateUsage(input, answer),
      };
    }

    const turn = await orchestrator.askStreaming(input);

    reply.hijack();
    reply.raw.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });

    // Client went away: closing the channel stops the backend read
    reply.raw.on('close', () => turn.events.close());

    const sendFrame = (payload: unknown) => {
      try {
        reply.raw.write(`data: ${JSON.stringify(payload)}\n\n`);
      } catch (e) {
        server.log.error({ err: e }, 'Failed to send SSE frame');
      }
    };

    const chunkFrame = (delta: Record<string, string>, finishReason: string | null) => ({
      id,
      object: 'chat.completion.chunk',
      created,
      model,
      choices: [{ index: 0, delta, finish_reason: finishReason }],
    });

    sendFrame(chunkFrame({ role: 'assistant' }, null));

    for await (const event of turn.events) {
      writeEvent(event, sendFrame, chunkFrame);
    }

    const outcome = await turn.result;
    if (outcome.status !== 'cancelled') {
      reply.raw.write('data: [DONE]\n\n');
      reply.raw.end();
    }
    server.log.info({ status: outcome.status, chars: outcome.text.length }, 'Streamed turn finished');
    return reply;
  });
};

function writeEvent(
  event: StreamEvent,
  sendFrame: (payload: unknown) => void,
  chunkFrame: (delta: Record<string, string>, finishReason: string | null) => unknown,
): void {
  switch (event.type) {
    case 'chunk':
      sendFrame(chunkFrame({ content: event.text }, null));
      return;
    case 'error':
      sendFrame({ error: { message: event.message, type: 'stream_error' } });
      return;
    case 'complete':
      sendFrame(chunkFrame({}, 'stop'));
      return;
  }
}

