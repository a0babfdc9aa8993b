#!/usr/bin/env node
// Billing Agent CLI
// chat: interactive, one-shot answers
// tui:  interactive, streamed answers
// ask:  single question
// serve: HTTP facade

import 'dotenv/config';

import readline from 'readline';
import { parseArgs } from 'util';
import { env, logConfiguration } from './env.js';
import { getBackend } from './providers/index.js';
import { startServer } from './server.js';
import { ConversationOrchestrator } from './services/orchestrator/index.js';
import type { StreamChannel, StreamEvent } from './services/stream/channel.js';
import { createToolProvider } from './services/tools/index.js';
import { errorMessage } from './utils/errors.js';

// Render cadence for streamed answers
const POLL_INTERVAL_MS = 50;

const USAGE = `Usage: billing-agent [command] [options]

Commands:
  chat               Interactive session, answers printed when complete (default)
  tui                Interactive session, answers streamed as they arrive
  ask <question>     Ask one question and exit
  serve              Start the HTTP API

Options:
  --mcp-server <cmd> Tool-provider command. Without it only the built-in
                     calculator is offered, enough to try the agent without
                     a billing tool server
  --port <port>      Port for serve
  --host <host>      Host for serve
  -h, --help         Show this help
`;

async function createOrchestrator(mcpServerCommand: string | undefined): Promise<ConversationOrchestrator> {
  const backend = getBackend();
  const tools = await createToolProvider(mcpServerCommand);
  return new ConversationOrchestrator(backend, tools, {
    model: env.BACKEND_MODEL,
    maxTokens: env.BACKEND_MAX_TOKENS,
    toolTimeoutMs: env.TOOL_TIMEOUT_MS,
  });
}

function createPrompt() {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  let closed = false;
  rl.on('close', () => {
    closed = true;
  });

  // Resolves null once stdin is closed (Ctrl-D)
  const question = (prompt: string): Promise<string | null> => {
    if (closed) return Promise.resolve(null);
    return new Promise(resolve => {
      const onClose = () => resolve(null);
      rl.once('close', onClose);
      rl.question(prompt, answer => {
        rl.off('close', onClose);
        resolve(answer);
      });
    });
  };

  return { rl, question };
}

function isExit(line: string): boolean {
  const normalized = line.trim().toLowerCase();
  return normalized === 'exit' || normalized === 'quit' || normalized === '/exit';
}

function drawHeader(mode: string) {
  console.log('╔════════════════════════════════════════╗');
  console.log('║            Billing Agent               ║');
  console.log('╚════════════════════════════════════════╝');
  console.log(`  Mode: ${mode}. Type "exit" to quit.`);
  console.log('');
}

async function runChat(orchestrator: ConversationOrchestrator): Promise<void> {
  const { rl, question } = createPrompt();
  drawHeader('chat');

  while (true) {
    const line = await question('you> ');
    if (line === null || isExit(line)) break;
    if (!line.trim()) continue;

    try {
      const answer = await orchestrator.ask(line);
      console.log(`agent> ${answer}\n`);
    } catch (err) {
      console.log(`agent> Error: ${errorMessage(err)}\n`);
    }
  }

  rl.close();
}

function renderEvent(event: StreamEvent): void {
  switch (event.type) {
    case 'chunk':
      process.stdout.write(event.text);
      return;
    case 'error':
      process.stdout.write(`\nError: ${event.message}`);
      return;
    case 'complete':
      return;
  }
}

/** Poll the channel on a fixed cadence until the producer is done. */
function renderStream(events: StreamChannel<StreamEvent>): Promise<void> {
  return new Promise(resolve => {
    const timer = setInterval(() => {
      for (const event of events.drain()) {
        renderEvent(event);
      }
      if (events.isDone) {
        clearInterval(timer);
        resolve();
      }
    }, POLL_INTERVAL_MS);
  });
}

async function runTui(orchestrator: ConversationOrchestrator): Promise<void> {
  const { rl, question } = createPrompt();
  drawHeader('streaming');

  while (true) {
    const line = await question('you> ');
    if (line === null || isExit(line)) break;
    if (!line.trim()) continue;

    process.stdout.write('agent> ');
    try {
      const turn = await orchestrator.askStreaming(line);

      // Ctrl-C stops the current answer, not the session
      const stop = () => turn.events.close();
      rl.once('SIGINT', stop);
      await renderStream(turn.events);
      rl.off('SIGINT', stop);

      const outcome = await turn.result;
      if (outcome.status === 'cancelled') {
        process.stdout.write(' [stopped]');
      }
    } catch (err) {
      process.stdout.write(`Error: ${errorMessage(err)}`);
    }
    process.stdout.write('\n\n');
  }

  rl.close();
}

async function runAsk(orchestrator: ConversationOrchestrator, question: string): Promise<void> {
  try {
    console.log(await orchestrator.ask(question));
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      'mcp-server': { type: 'string' },
      port: { type: 'string' },
      host: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const command = positionals[0] ?? 'chat';
  const mcpServerCommand = values['mcp-server'] ?? env.MCP_SERVER_COMMAND;

  if (command === 'serve') {
    const port = values.port ? parseInt(values.port, 10) : undefined;
    await startServer({
      mcpServerCommand,
      port: port !== undefined && !isNaN(port) ? port : undefined,
      host: values.host,
    });
    return;
  }

  if (command !== 'chat' && command !== 'tui' && command !== 'ask') {
    console.error(`Unknown command: ${command}\n`);
    console.log(USAGE);
    process.exitCode = 1;
    return;
  }

  const question = positionals.slice(1).join(' ').trim();
  if (command === 'ask' && !question) {
    console.error('ask needs a question\n');
    console.log(USAGE);
    process.exitCode = 1;
    return;
  }

  logConfiguration();
  const orchestrator = await createOrchestrator(mcpServerCommand);
  try {
    switch (command) {
      case 'chat':
        await runChat(orchestrator);
        break;
      case 'tui':
        await runTui(orchestrator);
        break;
      case 'ask':
        await runAsk(orchestrator, question);
        break;
    }
  } finally {
    await orchestrator.close();
  }
}

main().catch(err => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
