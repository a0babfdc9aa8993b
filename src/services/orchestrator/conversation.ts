// Conversation history
// Append-only, lock guarded. The lock only covers in-memory appends and
// snapshots; callers never hold it across backend or tool I/O.

import type { ChatMessage } from '../../providers/types.js';
import { Mutex } from '../../utils/mutex.js';

export class Conversation {
  private messages: ChatMessage[] = [];
  private readonly lock = new Mutex();

  get length(): number {
    return this.messages.length;
  }

  async append(...messages: ChatMessage[]): Promise<void> {
    await this.lock.runExclusive(() => {
      this.messages.push(...messages.map(cloneMessage));
    });
  }

  /** Append, then copy the whole history for an outbound request. */
  async appendAndSnapshot(...messages: ChatMessage[]): Promise<ChatMessage[]> {
    return this.lock.runExclusive(() => {
      this.messages.push(...messages.map(cloneMessage));
      return this.messages.map(cloneMessage);
    });
  }

  async snapshot(): Promise<ChatMessage[]> {
    return this.lock.runExclusive(() => this.messages.map(cloneMessage));
  }
}

function cloneMessage(message: ChatMessage): ChatMessage {
  if (message.role === 'assistant' && message.toolCalls) {
    return { ...message, toolCalls: message.toolCalls.map(call => ({ ...call })) };
  }
  return { ...message };
}
