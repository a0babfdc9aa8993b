// Environment configuration for the billing agent
// Backend credentials, tool-provider command and runtime limits

import { AppError } from './utils/errors.js';
import { logger } from './utils/logger.js';

export type FramePolicy = 'lenient' | 'strict';

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    logger.warn(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) {
    logger.warn(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseFramePolicy(value: string | undefined): FramePolicy {
  const normalized = strEnv(value, 'lenient').toLowerCase();
  if (normalized === 'strict' || normalized === 'lenient') {
    return normalized;
  }
  logger.warn(`Invalid STREAM_FRAME_POLICY "${value}", using default lenient`);
  return 'lenient';
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 3000),
  HOST: process.env.HOST || '0.0.0.0',
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Chat-completion backend (OpenAI-compatible, Mistral by default)
  MISTRAL_API_KEY: strEnv(process.env.MISTRAL_API_KEY),
  MISTRAL_API_URL: strEnv(process.env.MISTRAL_API_URL, 'https://api.mistral.ai/v1'),
  BACKEND_MODEL: strEnv(process.env.BACKEND_MODEL, 'mistral-large-latest'),
  BACKEND_MAX_TOKENS: parsePositiveInt(process.env.BACKEND_MAX_TOKENS, 4096, 'BACKEND_MAX_TOKENS'),
  BACKEND_TIMEOUT_MS: parsePositiveInt(process.env.BACKEND_TIMEOUT_MS, 120000, 'BACKEND_TIMEOUT_MS'),

  // Tool provider
  MCP_SERVER_COMMAND: strEnv(process.env.MCP_SERVER_COMMAND),
  TOOL_TIMEOUT_MS: parsePositiveInt(process.env.TOOL_TIMEOUT_MS, 30000, 'TOOL_TIMEOUT_MS'),

  // Streaming
  STREAM_FRAME_POLICY: parseFramePolicy(process.env.STREAM_FRAME_POLICY),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export function requireBackendApiKey(): string {
  if (!env.MISTRAL_API_KEY) {
    throw AppError.configuration(
      'MISTRAL_API_KEY environment variable not set. Add it to your environment or .env file.',
    );
  }
  return env.MISTRAL_API_KEY;
}

// Log configuration on startup (redact secrets)
export function logConfiguration() {
  logger.info(
    {
      environment: env.NODE_ENV,
      server: `${env.HOST}:${env.PORT}`,
      backend: env.MISTRAL_API_URL,
      model: env.BACKEND_MODEL,
      apiKey: env.MISTRAL_API_KEY ? 'set' : 'missing',
      toolProvider: env.MCP_SERVER_COMMAND || 'built-in registry',
      toolTimeoutMs: env.TOOL_TIMEOUT_MS,
      backendTimeoutMs: env.BACKEND_TIMEOUT_MS,
      framePolicy: env.STREAM_FRAME_POLICY,
    },
    'Billing agent configuration',
  );
}
