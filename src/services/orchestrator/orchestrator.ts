// Conversation Orchestrator
// One logical "ask" is one or two backend round-trips plus the tool calls the
// backend requested in between.

import type {
  AssistantMessage,
  BackendToolDefinition,
  ChatBackend,
  ChatMessage,
  ToolCallRequest,
  ToolMessage,
} from '../../providers/types.js';
import type { ToolProvider } from '../tools/types.js';
import { StreamChannel, type StreamEvent } from '../stream/channel.js';
import { pumpDeltas } from '../stream/pipeline.js';
import { Conversation } from './conversation.js';
import { DEFAULT_TOOL_TIMEOUT_MS, ToolExecutor } from './executor.js';
import { FINAL_ANSWER_SYSTEM_PROMPT, STREAMING_SYSTEM_PROMPT, TOOL_SYSTEM_PROMPT } from './prompts.js';
import type { OrchestratorOptions, StreamingOutcome, StreamingTurn } from './types.js';
import { childLogger } from '../../utils/logger.js';

const log = childLogger('orchestrator');

export class ConversationOrchestrator {
  readonly conversation = new Conversation();
  private readonly executor: ToolExecutor;

  constructor(
    private readonly backend: ChatBackend,
    private readonly tools: ToolProvider,
    private readonly options: OrchestratorOptions = {},
  ) {
    this.executor = new ToolExecutor(tools, options.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS);
  }

  /** Run a turn to completion and return the final answer text. */
  async ask(text: string): Promise<string> {
    const history = await this.conversation.appendAndSnapshot({ role: 'user', content: text });
    const toolDefinitions = await this.toolDefinitions();

    const response = await this.backend.sendChat(
      [system(this.options.systemPrompt ?? TOOL_SYSTEM_PROMPT), ...history],
      {
        model: this.options.model,
        maxTokens: this.options.maxTokens,
        tools: toolDefinitions,
        toolChoice: 'auto',
      },
    );

    const toolCalls = response.toolCalls ?? [];
    if (toolCalls.length === 0) {
      await this.conversation.append(response);
      return response.content;
    }

    log.info({ tools: toolCalls.map(tc => tc.toolName) }, 'Backend requested tool calls');
    const toolMessages = await this.runToolCalls(toolCalls);

    const followUp = await this.conversation.appendAndSnapshot(response, ...toolMessages);
    const finalResponse = await this.backend.sendChat(
      [system(this.options.finalAnswerPrompt ?? FINAL_ANSWER_SYSTEM_PROMPT), ...followUp],
      {
        model: this.options.model,
        maxTokens: this.options.maxTokens,
      },
    );

    // Tool calls in the follow-up are dropped: no tools were offered
    const answer: AssistantMessage = { role: 'assistant', content: finalResponse.content };
    await this.conversation.append(answer);
    return answer.content;
  }

  /**
   * Start a streamed turn. Text arrives on `events`; the assembled answer is
   * committed to history when the stream completes. Tool calls requested
   * mid-stream are reported on `result` but not executed.
   */
  async askStreaming(text: string): Promise<StreamingTurn> {
    const history = await this.conversation.appendAndSnapshot({ role: 'user', content: text });
    const toolDefinitions = await this.toolDefinitions();
    const messages = [system(this.options.streamingPrompt ?? STREAMING_SYSTEM_PROMPT), ...history];

    const events = new StreamChannel<StreamEvent>();

    const result = pumpDeltas(
      signal =>
        this.backend.streamChat(messages, {
          model: this.options.model,
          maxTokens: this.options.maxTokens,
          tools: toolDefinitions,
          toolChoice: 'auto',
          signal,
        }),
      events,
      {
        onComplete: async outcome => {
          if (outcome.toolCalls.length > 0) {
            log.warn(
              { tools: outcome.toolCalls.map(tc => tc.toolName) },
              'Streamed turn requested tool calls; the streaming path does not execute them',
            );
          }
          await this.commitStreamedAnswer(outcome.text);
        },
      },
    ).then(
      (outcome): StreamingOutcome => ({
        status: outcome.status,
        text: outcome.text,
        ignoredToolCalls: outcome.toolCalls,
        error: outcome.error,
      }),
    );

    return { events, result };
  }

  async history(): Promise<ChatMessage[]> {
    return this.conversation.snapshot();
  }

  async close(): Promise<void> {
    await this.tools.close?.();
  }

  private async runToolCalls(toolCalls: ToolCallRequest[]): Promise<ToolMessage[]> {
    const messages: ToolMessage[] = [];

    // Tool messages stay in request order
    for (const toolCall of toolCalls) {
      const content = await this.executor.execute(toolCall);
      messages.push({ role: 'tool', content, toolCallId: toolCall.id });
    }

    return messages;
  }

  private async commitStreamedAnswer(text: string): Promise<void> {
    if (!text) {
      log.warn('Streamed turn produced no text, nothing committed');
      return;
    }
    await this.conversation.append({ role: 'assistant', content: text });
  }

  private async toolDefinitions(): Promise<BackendToolDefinition[]> {
    const tools = await this.tools.listTools();
    return tools.map((tool): BackendToolDefinition => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description ?? 'No description available',
        parameters: tool.inputSchema,
      },
    }));
  }
}

function system(content: string): ChatMessage {
  return { role: 'system', content };
}
