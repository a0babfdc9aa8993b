import { describe, expect, it } from 'vitest';
import { ConversationOrchestrator } from '../orchestrator.js';
import { FINAL_ANSWER_SYSTEM_PROMPT, STREAMING_SYSTEM_PROMPT, TOOL_SYSTEM_PROMPT } from '../prompts.js';
import type { StreamEvent } from '../../stream/channel.js';
import type { ToolResult } from '../../tools/types.js';
import { FakeBackend, createFakeToolProvider, text } from './fakes.js';

describe('ConversationOrchestrator.ask', () => {
  it('answers directly when no tools are requested', async () => {
    const backend = new FakeBackend({ responses: [{ role: 'assistant', content: 'Hello! How can I help with billing?' }] });
    const tools = createFakeToolProvider({ list_invoices: async () => text('unused') });
    const orchestrator = new ConversationOrchestrator(backend, tools);

    const answer = await orchestrator.ask('hi');

    expect(answer).toBe('Hello! How can I help with billing?');
    expect(await orchestrator.history()).toEqual([
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'Hello! How can I help with billing?' },
    ]);
    expect(backend.requests).toHaveLength(1);
    expect(backend.requests[0]?.messages[0]).toEqual({ role: 'system', content: TOOL_SYSTEM_PROMPT });
    expect(backend.requests[0]?.options.toolChoice).toBe('auto');
    expect(backend.requests[0]?.options.tools).toEqual([
      {
        type: 'function',
        function: {
          name: 'list_invoices',
          description: 'Fake list_invoices',
          parameters: { type: 'object', properties: {} },
        },
      },
    ]);
    expect(tools.callTool).not.toHaveBeenCalled();
  });

  it('runs the invoice scenario end to end', async () => {
    const backend = new FakeBackend({
      responses: [
        {
          role: 'assistant',
          content: '',
          toolCalls: [{ id: 'call_1', toolName: 'list_invoices', arguments: '{"customer_external_id":"acme"}' }],
        },
        { role: 'assistant', content: 'You have 3 invoices.' },
      ],
    });
    const tools = createFakeToolProvider({ list_invoices: async () => text('3 invoices found') });
    const orchestrator = new ConversationOrchestrator(backend, tools);

    const answer = await orchestrator.ask('list invoices for customer acme');

    expect(answer).toBe('You have 3 invoices.');
    expect(tools.callTool).toHaveBeenCalledWith(
      'list_invoices',
      { customer_external_id: 'acme' },
      { signal: expect.any(AbortSignal) },
    );

    const history = await orchestrator.history();
    expect(history).toEqual([
      { role: 'user', content: 'list invoices for customer acme' },
      {
        role: 'assistant',
        content: '',
        toolCalls: [{ id: 'call_1', toolName: 'list_invoices', arguments: '{"customer_external_id":"acme"}' }],
      },
      { role: 'tool', content: '3 invoices found', toolCallId: 'call_1' },
      { role: 'assistant', content: 'You have 3 invoices.' },
    ]);

    const followUp = backend.requests[1];
    expect(followUp?.messages).toEqual([{ role: 'system', content: FINAL_ANSWER_SYSTEM_PROMPT }, ...history.slice(0, 3)]);
    expect(followUp?.options.tools).toBeUndefined();
  });

  it('keeps tool messages in request order', async () => {
    const backend = new FakeBackend({
      responses: [
        {
          role: 'assistant',
          content: '',
          toolCalls: [
            { id: 'call_a', toolName: 'get_customer', arguments: '{"id":"cus_1"}' },
            { id: 'call_b', toolName: 'list_subscriptions', arguments: '{"customer":"cus_1"}' },
          ],
        },
        { role: 'assistant', content: 'Acme has one active subscription.' },
      ],
    });
    const tools = createFakeToolProvider({
      get_customer: async () => {
        await new Promise(resolve => setTimeout(resolve, 5));
        return text('Acme Corp');
      },
      list_subscriptions: async () => text('1 active'),
    });
    const orchestrator = new ConversationOrchestrator(backend, tools);

    await orchestrator.ask('what does acme pay for?');

    const history = await orchestrator.history();
    expect(history.slice(1, 4).map(m => m.role)).toEqual(['assistant', 'tool', 'tool']);
    expect(history.slice(2, 4)).toEqual([
      { role: 'tool', content: 'Acme Corp', toolCallId: 'call_a' },
      { role: 'tool', content: '1 active', toolCallId: 'call_b' },
    ]);
    expect(tools.callTool.mock.calls.map(call => call[0])).toEqual(['get_customer', 'list_subscriptions']);
  });

  it('fails the turn without a final answer when a tool times out', async () => {
    const backend = new FakeBackend({
      responses: [
        {
          role: 'assistant',
          content: '',
          toolCalls: [{ id: 'call_1', toolName: 'slow_report', arguments: '{}' }],
        },
        { role: 'assistant', content: 'never sent' },
      ],
    });
    const tools = createFakeToolProvider({ slow_report: () => new Promise<ToolResult>(() => undefined) });
    const orchestrator = new ConversationOrchestrator(backend, tools, { toolTimeoutMs: 20 });

    await expect(orchestrator.ask('build the yearly report')).rejects.toThrow(
      "Tool 'slow_report' timed out after 20 ms",
    );
    expect(backend.requests).toHaveLength(1);
    expect(await orchestrator.history()).toEqual([{ role: 'user', content: 'build the yearly report' }]);
  });

  it('fails the turn on malformed tool arguments', async () => {
    const backend = new FakeBackend({
      responses: [
        {
          role: 'assistant',
          content: '',
          toolCalls: [{ id: 'call_1', toolName: 'list_invoices', arguments: '{"customer_external_id":' }],
        },
      ],
    });
    const tools = createFakeToolProvider({ list_invoices: async () => text('unused') });
    const orchestrator = new ConversationOrchestrator(backend, tools);

    await expect(orchestrator.ask('list invoices')).rejects.toThrow(
      "Failed to parse tool arguments for 'list_invoices'",
    );
    expect(tools.callTool).not.toHaveBeenCalled();
  });

  it('propagates backend failures', async () => {
    const backend = new FakeBackend();
    const orchestrator = new ConversationOrchestrator(backend, createFakeToolProvider({}));

    await expect(orchestrator.ask('hello')).rejects.toThrow('FakeBackend has no scripted response left');
  });
});

describe('ConversationOrchestrator.askStreaming', () => {
  async function consume(events: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> {
    const received: StreamEvent[] = [];
    for await (const event of events) {
      received.push(event);
    }
    return received;
  }

  it('streams text and commits the assembled answer', async () => {
    const backend = new FakeBackend({
      streams: [[{ text: 'Your balance ' }, { text: 'is 0.' }, { finishReason: 'stop' }, { done: true }]],
    });
    const orchestrator = new ConversationOrchestrator(backend, createFakeToolProvider({}));

    const turn = await orchestrator.askStreaming('what is my balance?');
    const events = await consume(turn.events);
    const outcome = await turn.result;

    expect(events).toEqual([
      { type: 'chunk', text: 'Your balance ' },
      { type: 'chunk', text: 'is 0.' },
      { type: 'complete' },
    ]);
    expect(outcome).toEqual({ status: 'completed', text: 'Your balance is 0.', ignoredToolCalls: [], error: undefined });
    expect(await orchestrator.history()).toEqual([
      { role: 'user', content: 'what is my balance?' },
      { role: 'assistant', content: 'Your balance is 0.' },
    ]);
    expect(backend.requests[0]?.messages[0]).toEqual({ role: 'system', content: STREAMING_SYSTEM_PROMPT });
  });

  it('reports streamed tool calls without running them', async () => {
    const backend = new FakeBackend({
      streams: [
        [
          { toolCallFragments: [{ id: 'call_1', toolName: 'list_invoices', arguments: '{"customer_', streamIndex: 0 }] },
          { toolCallFragments: [{ id: '', toolName: '', arguments: 'external_id":"acme"}', streamIndex: 0 }] },
          { finishReason: 'tool_calls' },
          { done: true },
        ],
      ],
    });
    const tools = createFakeToolProvider({ list_invoices: async () => text('unused') });
    const orchestrator = new ConversationOrchestrator(backend, tools);

    const turn = await orchestrator.askStreaming('list invoices for acme');
    await consume(turn.events);
    const outcome = await turn.result;

    expect(outcome.ignoredToolCalls).toEqual([
      { id: 'call_1', toolName: 'list_invoices', arguments: '{"customer_external_id":"acme"}', streamIndex: 0 },
    ]);
    expect(tools.callTool).not.toHaveBeenCalled();
    // Nothing to commit: the backend produced no text
    expect(await orchestrator.history()).toEqual([{ role: 'user', content: 'list invoices for acme' }]);
  });

  it('delivers one error event when the stream fails', async () => {
    const backend = new FakeBackend();
    const orchestrator = new ConversationOrchestrator(backend, createFakeToolProvider({}));

    const turn = await orchestrator.askStreaming('hello');
    const events = await consume(turn.events);

    expect(events).toEqual([{ type: 'error', message: 'FakeBackend has no scripted stream left' }]);
    expect((await turn.result).status).toBe('failed');
    expect(await orchestrator.history()).toHaveLength(1);
  });

  it('does not commit a turn the consumer abandoned', async () => {
    const backend = new FakeBackend({
      streams: [[{ text: 'partial' }, { text: ' answer' }, { done: true }]],
      streamDelayMs: 5,
    });
    const orchestrator = new ConversationOrchestrator(backend, createFakeToolProvider({}));

    const turn = await orchestrator.askStreaming('hello');
    turn.events.close();
    const outcome = await turn.result;

    expect(outcome.status).toBe('cancelled');
    expect(await orchestrator.history()).toEqual([{ role: 'user', content: 'hello' }]);
  });
});
