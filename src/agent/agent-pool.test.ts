/**
 * Agent Pool Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AgentLoop } from './agent-loop.js';
import { AgentPool, GUEST_KEY } from './agent-pool.js';
import { AgentStateError } from './errors.js';
import type { ChatParams, LLMProvider } from './llm-provider.js';
import { chatCompletion } from './test-utils.js';
import type { AgentStreamEvent, ChatCompletion } from '../types/agent-types.js';

/** Replies "echo: <last user message>"; calls can be held until released */
class EchoProvider implements LLMProvider {
  readonly calls: ChatParams[] = [];
  private gate: Promise<void> = Promise.resolve();
  private open: () => void = () => undefined;

  hold(): void {
    this.gate = new Promise<void>((resolve) => {
      this.open = resolve;
    });
  }

  release(): void {
    this.open();
  }

  async chat(params: ChatParams): Promise<ChatCompletion> {
    this.calls.push(params);
    await this.gate;
    const lastUser = [...params.messages].reverse().find((m) => m.role === 'user');
    return chatCompletion(`echo: ${lastUser?.content ?? ''}`);
  }

  async chatStream(params: ChatParams): Promise<ChatCompletion> {
    return this.chat(params);
  }
}

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

async function drain(stream: AsyncIterable<AgentStreamEvent>): Promise<void> {
  for await (const event of stream) {
    expect(event).toBeDefined();
  }
}

describe('AgentPool', () => {
  let provider: EchoProvider;
  let pool: AgentPool;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    provider = new EchoProvider();
    pool = new AgentPool((key) => new AgentLoop({ provider, name: key }));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('replies through the key agent', async () => {
    const { reply, result } = await pool.handleMessage('alice', 'hello');
    expect(reply).toBe('echo: hello');
    expect(result.outcome).toBe('finished');
    expect(pool.has('alice')).toBe(true);
  });

  it('serializes requests for the same key', async () => {
    provider.hold();
    const first = pool.handleMessage('alice', 'one');
    const second = pool.handleMessage('alice', 'two');

    await tick();
    expect(provider.calls).toHaveLength(1);

    provider.release();
    const replies = await Promise.all([first, second]);
    expect(replies.map((r) => r.reply)).toEqual(['echo: one', 'echo: two']);
    expect(provider.calls[1].messages.map((m) => m.content)).toEqual(['one', 'echo: one', 'two']);
  });

  it('runs different keys concurrently', async () => {
    provider.hold();
    const a = pool.handleMessage('alice', 'hi');
    const b = pool.handleMessage('bob', 'hi');

    await tick();
    expect(provider.calls).toHaveLength(2);

    provider.release();
    await Promise.all([a, b]);
    expect(pool.size).toBe(2);
  });

  it('uses the guest key when none is given', async () => {
    await pool.handleMessage(undefined, 'hi');
    await pool.handleMessage('', 'again');

    expect(pool.has(GUEST_KEY)).toBe(true);
    expect(pool.size).toBe(1);
    expect(provider.calls[1].messages.map((m) => m.content)).toEqual(['hi', 'echo: hi', 'again']);
  });

  it('rebuilds memory from history, leaving out the message being answered', async () => {
    await pool.handleMessage('alice', 'now?', [
      { role: 'user', content: 'before' },
      { role: 'assistant', content: 'earlier answer' },
      { role: 'user', content: 'now?' },
    ]);

    expect(provider.calls[0].messages.map((m) => m.toDict())).toEqual([
      { role: 'user', content: 'before' },
      { role: 'assistant', content: 'earlier answer' },
      { role: 'user', content: 'now?' },
    ]);
  });

  it('holds the key while a stream is open', async () => {
    const stream = pool.stream('alice', 'one');
    const first = await stream.next();
    expect(first.value).toEqual({ type: 'step_start', step: 1 });

    let answered = false;
    const next = pool.handleMessage('alice', 'two').then((handled) => {
      answered = true;
      return handled;
    });

    await tick();
    expect(answered).toBe(false);

    await drain(stream);
    expect((await next).reply).toBe('echo: two');
  });

  it('releases the key when a stream is abandoned', async () => {
    const stream = pool.stream('alice', 'one');
    await stream.next();
    await stream.return(undefined);

    const { reply } = await pool.handleMessage('alice', 'two');
    expect(reply).toBe('echo: two');
  });

  it('releases the key after a failing callback', async () => {
    await expect(
      pool.withAgent('alice', async () => {
        throw new Error('callback failed');
      })
    ).rejects.toThrow('callback failed');

    const { reply } = await pool.handleMessage('alice', 'still there?');
    expect(reply).toBe('echo: still there?');
  });

  describe('evict', () => {
    it('drops an idle agent', async () => {
      await pool.handleMessage('alice', 'hi');
      expect(pool.evict('alice')).toBe(true);
      expect(pool.has('alice')).toBe(false);
      expect(pool.evict('alice')).toBe(false);
    });

    it('refuses while the agent is running', async () => {
      const stream = pool.stream('alice', 'hi');
      await stream.next();

      expect(() => pool.evict('alice')).toThrow(AgentStateError);

      await drain(stream);
      expect(pool.evict('alice')).toBe(true);
    });
  });
});
