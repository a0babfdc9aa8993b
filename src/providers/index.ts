// Backend registry
// Builds the configured chat-completion backend from the environment

import type { ChatBackend } from './types.js';
import { MistralBackend, type MistralBackendConfig } from './mistral.js';
import { env, requireBackendApiKey } from '../env.js';
import { AppError } from '../utils/errors.js';

const KNOWN_BACKENDS = ['mistral'] as const;

export type BackendName = (typeof KNOWN_BACKENDS)[number];

// Backend instances (lazy initialization)
const backends: Map<BackendName, ChatBackend> = new Map();

export function createMistralBackend(overrides: Partial<MistralBackendConfig> = {}): MistralBackend {
  return new MistralBackend({
    apiKey: overrides.apiKey ?? requireBackendApiKey(),
    baseUrl: (overrides.baseUrl ?? env.MISTRAL_API_URL).replace(/\/+$/, ''),
    model: overrides.model ?? env.BACKEND_MODEL,
    maxTokens: overrides.maxTokens ?? env.BACKEND_MAX_TOKENS,
    timeoutMs: overrides.timeoutMs ?? env.BACKEND_TIMEOUT_MS,
    framePolicy: overrides.framePolicy ?? env.STREAM_FRAME_POLICY,
  });
}

export function getBackend(name: string = 'mistral'): ChatBackend {
  const known = KNOWN_BACKENDS.find(b => b === name);
  if (!known) {
    throw AppError.configuration(`Backend "${name}" is not available`);
  }

  const cached = backends.get(known);
  if (cached) return cached;

  const backend = createMistralBackend();
  backends.set(known, backend);
  return backend;
}

export type {
  ChatBackend,
  ChatMessage,
  ChatOptions,
  StreamDelta,
  ToolCallRequest,
} from './types.js';
