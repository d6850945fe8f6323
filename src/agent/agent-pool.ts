/**
 * Agent Pool
 *
 * One AgentLoop per conversation key. Requests for the same key run one at a
 * time in arrival order; different keys run concurrently.
 */

import type { AgentLoop } from './agent-loop.js';
import { AgentStateError } from './errors.js';
import { AgentState } from '../types/agent-types.js';
import type { AgentRunResult, AgentStreamEvent } from '../types/agent-types.js';

export const GUEST_KEY = 'guest';

export type AgentFactory = (key: string) => AgentLoop;

export interface HandledMessage {
  reply: string;
  result: AgentRunResult;
}

interface PoolEntry {
  agent: AgentLoop;
  tail: Promise<void>;
}

export class AgentPool {
  private entries = new Map<string, PoolEntry>();
  private createAgent: AgentFactory;

  constructor(createAgent: AgentFactory) {
    this.createAgent = createAgent;
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string | undefined): boolean {
    return this.entries.has(normalizeKey(key));
  }

  /**
   * Run `fn` with exclusive access to the key's agent.
   */
  async withAgent<T>(key: string | undefined, fn: (agent: AgentLoop) => Promise<T>): Promise<T> {
    const entry = this.entry(normalizeKey(key));
    const release = await this.acquire(entry);
    try {
      return await fn(entry.agent);
    } finally {
      release();
    }
  }

  /**
   * Handle one inbound message. `history` is the stored conversation with the
   * just-submitted message last; everything before it replaces the agent's
   * memory.
   */
  async handleMessage(
    key: string | undefined,
    input: string,
    history?: readonly unknown[]
  ): Promise<HandledMessage> {
    return this.withAgent(key, async (agent) => {
      if (history) agent.rehydrate(history.slice(0, -1));
      const result = await agent.run(input);
      return { reply: result.reply, result };
    });
  }

  /**
   * Streaming variant of handleMessage. The key stays locked until the
   * returned stream finishes or is abandoned with `return()`.
   */
  async *stream(
    key: string | undefined,
    input: string,
    history?: readonly unknown[]
  ): AsyncGenerator<AgentStreamEvent, void, undefined> {
    const entry = this.entry(normalizeKey(key));
    const release = await this.acquire(entry);
    try {
      if (history) entry.agent.rehydrate(history.slice(0, -1));
      yield* entry.agent.runStream(input);
    } finally {
      release();
    }
  }

  /**
   * Drop a conversation's agent. Refused while the agent is running.
   */
  evict(key: string | undefined): boolean {
    const normalized = normalizeKey(key);
    const entry = this.entries.get(normalized);
    if (!entry) return false;
    if (entry.agent.state !== AgentState.IDLE) {
      throw new AgentStateError(`Cannot evict '${normalized}' while its agent is ${entry.agent.state}`);
    }
    this.entries.delete(normalized);
    return true;
  }

  private entry(key: string): PoolEntry {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { agent: this.createAgent(key), tail: Promise.resolve() };
      this.entries.set(key, entry);
    }
    return entry;
  }

  private async acquire(entry: PoolEntry): Promise<() => void> {
    let release: () => void = () => undefined;
    const previous = entry.tail;
    entry.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;
    return release;
  }
}

function normalizeKey(key: string | undefined): string {
  return key && key.length > 0 ? key : GUEST_KEY;
}
