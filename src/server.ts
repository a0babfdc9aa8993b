// HTTP facade: health, model list and OpenAI-compatible chat completions

import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env, logConfiguration } from './env.js';
import { getBackend } from './providers/index.js';
import { chatCompletionRoutes } from './routes/chat-completions.js';
import { modelRoutes } from './routes/models.js';
import { ConversationOrchestrator } from './services/orchestrator/index.js';
import { createToolProvider } from './services/tools/index.js';
import { AppError, formatErrorResponse, isAppError } from './utils/errors.js';
import { logger, loggerOptions } from './utils/logger.js';

export interface ServerOptions {
  orchestrator: ConversationOrchestrator;
  model: string;
  /** Include error details in 4xx/5xx bodies. */
  exposeErrorDetails?: boolean;
}

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const server = Fastify({ logger: loggerOptions() });

  await server.register(cors, {
    origin: true,
    credentials: true,
  });

  server.setErrorHandler<FastifyError>((error, request, reply) => {
    if (isAppError(error)) {
      request.log.error({ err: error, code: error.code }, 'Request failed');
      return reply.code(error.statusCode).send(formatErrorResponse(error, options.exposeErrorDetails));
    }

    const status = error.statusCode ?? 500;
    if (status < 500) {
      return reply.code(status).send(formatErrorResponse(AppError.badRequest(error.message)));
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send(formatErrorResponse(AppError.internal()));
  });

  server.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: '0.1.0',
    };
  });

  await server.register(modelRoutes, { prefix: '/v1', models: [options.model] });
  await server.register(chatCompletionRoutes, {
    prefix: '/v1',
    orchestrator: options.orchestrator,
    model: options.model,
  });

  return server;
}

export interface ServeOptions {
  mcpServerCommand?: string;
  port?: number;
  host?: string;
}

export async function startServer(options: ServeOptions = {}): Promise<void> {
  logConfiguration();

  const backend = getBackend();
  const tools = await createToolProvider(options.mcpServerCommand ?? env.MCP_SERVER_COMMAND);
  const orchestrator = new ConversationOrchestrator(backend, tools, {
    model: env.BACKEND_MODEL,
    maxTokens: env.BACKEND_MAX_TOKENS,
    toolTimeoutMs: env.TOOL_TIMEOUT_MS,
  });

  const server = await buildServer({
    orchestrator,
    model: env.BACKEND_MODEL,
    exposeErrorDetails: env.NODE_ENV !== 'production',
  });

  server.addHook('onClose', async () => {
    await orchestrator.close();
  });

  const port = options.port ?? env.PORT;
  const host = options.host ?? env.HOST;
  await server.listen({ port, host });
  logger.info(`Billing agent listening on http://${host}:${port}`);
  logger.info(`Health: http://${host}:${port}/health`);

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}
