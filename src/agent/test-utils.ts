/**
 * In-process Converse backend for tests. Replies are scripted up front and
 * every request is recorded.
 */

import type { ConverseRequest, ConverseResponse } from './providers/converse-format.js';
import type { ConverseClient } from './providers/converse-provider.js';
import type { ConverseStreamEvent } from './providers/converse-stream.js';
import type { ChatCompletion, JsonObject, ToolCall } from '../types/agent-types.js';

export interface ScriptedToolUse {
  id: string;
  name: string;
  input?: JsonObject;
}

/** Completion as a provider returns it, for tests that bypass the wire format */
export function chatCompletion(content: string, toolCalls: ToolCall[] | null = null): ChatCompletion {
  return {
    id: 'chatcmpl-test',
    created: 0,
    created_at: '1970-01-01T00:00:00.000Z',
    object: 'chat.completion',
    system_fingerprint: null,
    choices: [
      {
        finish_reason: toolCalls ? 'tool_use' : 'end_turn',
        index: 0,
        message: { content, role: 'assistant', tool_calls: toolCalls, function_call: null },
      },
    ],
    usage: { completion_tokens: 0, prompt_tokens: 0, total_tokens: 0 },
  };
}

export function textResponse(text: string, totalTokens = 0): ConverseResponse {
  return {
    output: { message: { role: 'assistant', content: [{ text }] } },
    stopReason: 'end_turn',
    usage: { inputTokens: totalTokens, outputTokens: 0, totalTokens },
  };
}

export function toolUseResponse(calls: ScriptedToolUse[], text = ''): ConverseResponse {
  const content = calls.map((c) => ({ toolUse: { toolUseId: c.id, name: c.name, input: c.input ?? {} } }));
  return {
    output: { message: { role: 'assistant', content: text ? [{ text }, ...content] : content } },
    stopReason: 'tool_use',
  };
}

/**
 * Replay a complete response as the event stream a backend would send.
 * Text is split in two deltas and tool input in single-character deltas.
 */
export function toStreamEvents(response: ConverseResponse): ConverseStreamEvent[] {
  const message = response.output?.message;
  const events: ConverseStreamEvent[] = [{ messageStart: { role: message?.role ?? 'assistant' } }];

  (message?.content ?? []).forEach((block, contentBlockIndex) => {
    if (block.toolUse) {
      const { toolUseId, name } = block.toolUse;
      events.push({ contentBlockStart: { contentBlockIndex, start: { toolUse: { toolUseId, name } } } });
      for (const ch of JSON.stringify(block.toolUse.input ?? {})) {
        events.push({ contentBlockDelta: { contentBlockIndex, delta: { toolUse: { input: ch } } } });
      }
    } else if (block.text) {
      const half = Math.ceil(block.text.length / 2);
      for (const text of [block.text.slice(0, half), block.text.slice(half)]) {
        if (text) events.push({ contentBlockDelta: { contentBlockIndex, delta: { text } } });
      }
    }
    events.push({ contentBlockStop: { contentBlockIndex } });
  });

  events.push({ messageStop: { stopReason: response.stopReason ?? 'end_turn' } });
  if (response.usage) events.push({ metadata: { usage: response.usage } });
  return events;
}

export class ScriptedConverseClient implements ConverseClient {
  readonly requests: ConverseRequest[] = [];
  private replies: Array<ConverseResponse | Error>;
  private fallback: ConverseResponse | undefined;

  /**
   * @param fallback - returned once the scripted replies run out
   */
  constructor(replies: Array<ConverseResponse | Error>, fallback?: ConverseResponse) {
    this.replies = [...replies];
    this.fallback = fallback;
  }

  async converse(request: ConverseRequest): Promise<ConverseResponse> {
    return this.next(request);
  }

  async *converseStream(request: ConverseRequest): AsyncIterable<ConverseStreamEvent> {
    const response = this.next(request);
    for (const event of toStreamEvents(response)) {
      yield event;
    }
  }

  private next(request: ConverseRequest): ConverseResponse {
    this.requests.push(structuredClone(request));
    const reply = this.replies.shift() ?? this.fallback;
    if (!reply) {
      throw new Error('No scripted reply left');
    }
    if (reply instanceof Error) throw reply;
    return reply;
  }
}
