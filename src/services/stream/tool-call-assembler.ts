// Tool-call assembler
// Streamed tool calls arrive as fragments correlated by position; a call is
// only usable once every fragment for its index has been merged.

import type { ToolCallRequest } from '../../providers/types.js';

export class ToolCallAssembler {
  private calls: Map<string, ToolCallRequest> = new Map();

  accept(fragments: ToolCallRequest[] | undefined): void {
    if (!fragments) return;

    for (const fragment of fragments) {
      const key = this.keyFor(fragment);
      const existing = this.calls.get(key);

      if (!existing) {
        this.calls.set(key, { ...fragment });
        continue;
      }

      if (!existing.id && fragment.id) existing.id = fragment.id;
      if (!existing.toolName && fragment.toolName) existing.toolName = fragment.toolName;
      existing.arguments += fragment.arguments;
    }
  }

  get size(): number {
    return this.calls.size;
  }

  /** Merged calls ordered by stream index (arrival order when unindexed). */
  complete(): ToolCallRequest[] {
    return Array.from(this.calls.values())
      .map((call, arrival) => ({ call, arrival }))
      .sort((a, b) => {
        const aIndex = a.call.streamIndex ?? Number.POSITIVE_INFINITY;
        const bIndex = b.call.streamIndex ?? Number.POSITIVE_INFINITY;
        if (aIndex !== bIndex) return aIndex - bIndex;
        return a.arrival - b.arrival;
      })
      .map(({ call }) => ({ ...call }));
  }

  private keyFor(fragment: ToolCallRequest): string {
    if (fragment.streamIndex !== undefined) return `index:${fragment.streamIndex}`;
    if (fragment.id) return `id:${fragment.id}`;
    return `arrival:${this.calls.size}`;
  }
}
