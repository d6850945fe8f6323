/**
 * Converse Wire Format Tests
 */

import { describe, it, expect } from 'vitest';
import {
  createCorrelationContext,
  fromConverseResponse,
  parseToolArguments,
  toConverseMessages,
  toConverseRequest,
  toConverseTools,
  type AdapterMessage,
  type ConverseToolResultBlock,
} from './converse-format.js';
import { Message } from '../canonical-format.js';
import { ConversionError } from '../errors.js';
import type { ToolCall, ToolDeclaration } from '../../types/agent-types.js';

function call(id: string, name: string, args = '{}'): ToolCall {
  return { id, type: 'function', function: { name, arguments: args } };
}

const options = { modelId: 'test-model', maxTokens: 512, temperature: 0 };

// =============================================================================
// Request translation
// =============================================================================

describe('toConverseMessages', () => {
  it('threads the tool call id into the tool result', () => {
    const messages = [
      Message.system('be terse'),
      Message.user('hi'),
      Message.fromToolCalls([call('c1', 'x')]),
      Message.tool('42', 'x', 'something-else'),
    ];
    const { system, messages: wire, correlation } = toConverseMessages(messages);

    expect(system).toEqual([{ text: 'be terse' }]);
    expect(wire).toEqual([
      { role: 'user', content: [{ text: 'hi' }] },
      { role: 'assistant', content: [{ toolUse: { toolUseId: 'c1', name: 'x', input: {} } }] },
      { role: 'user', content: [{ toolResult: { toolUseId: 'c1', content: [{ text: '42' }] } }] },
    ]);
    expect(correlation).toEqual({ currentToolUseId: 'c1', pendingToolUseIds: [] });
  });

  it('uses the last system message as the system prompt', () => {
    const { system, messages } = toConverseMessages([Message.system('first'), Message.system('second')]);
    expect(system).toEqual([{ text: 'second' }]);
    expect(messages).toEqual([]);
  });

  it('keeps assistant text ahead of tool calls', () => {
    const { messages } = toConverseMessages([Message.fromToolCalls([call('t1', 'search', '{"q":"cats"}')], 'Looking')]);
    expect(messages[0].content).toEqual([
      { text: 'Looking' },
      { toolUse: { toolUseId: 't1', name: 'search', input: { q: 'cats' } } },
    ]);
  });

  it('fills an empty assistant message with the placeholder', () => {
    const { messages } = toConverseMessages([Message.assistant('')]);
    expect(messages).toEqual([{ role: 'assistant', content: [{ text: '.' }] }]);
  });

  it('answers each tool call of a turn in order, in one user message', () => {
    const { messages, correlation } = toConverseMessages([
      Message.user('compare'),
      Message.fromToolCalls([call('a', 'fetch'), call('b', 'fetch')]),
      Message.tool('A', 'fetch', 'a'),
      Message.tool('B', 'fetch', 'b'),
    ]);

    expect(messages).toHaveLength(3);
    const results = messages[2].content.filter((b): b is ConverseToolResultBlock => 'toolResult' in b);
    expect(results.map((b) => b.toolResult.toolUseId)).toEqual(['a', 'b']);
    expect(correlation).toEqual({ currentToolUseId: 'b', pendingToolUseIds: [] });
  });

  it('correlates every result to the first call in single tool-use mode', () => {
    const { messages } = toConverseMessages(
      [Message.fromToolCalls([call('a', 'fetch'), call('b', 'fetch')]), Message.tool('A', 'fetch', 'a'), Message.tool('B', 'fetch', 'b')],
      createCorrelationContext(),
      true
    );

    expect(messages[0].content).toHaveLength(1);
    expect(messages[1].content).toEqual([
      { toolResult: { toolUseId: 'a', content: [{ text: 'A' }] } },
      { toolResult: { toolUseId: 'a', content: [{ text: 'B' }] } },
    ]);
  });

  it('falls back to the correlation passed in', () => {
    const { messages } = toConverseMessages([Message.tool('late', 'x', 'ignored')], createCorrelationContext('prev'));
    expect(messages[0].content).toEqual([{ toolResult: { toolUseId: 'prev', content: [{ text: 'late' }] } }]);
  });

  it('keeps conversions independent of each other', () => {
    toConverseMessages([Message.fromToolCalls([call('other', 'x')])]);
    expect(() => toConverseMessages([Message.tool('orphan', 'x', 'id')])).toThrow(ConversionError);
  });

  it('rejects unknown roles', () => {
    const messages: AdapterMessage[] = [{ role: 'function', content: 'x' }];
    expect(() => toConverseMessages(messages)).toThrow('Invalid role: function');
  });
});

describe('toConverseTools', () => {
  it('maps functions to tool specs and drops other declarations', () => {
    const tools: ToolDeclaration[] = [
      {
        type: 'function',
        function: {
          name: 'search',
          description: 'Search the web',
          parameters: { type: 'object', properties: { q: { type: 'string' } }, required: ['q'] },
        },
      },
      { type: 'retrieval' },
      { type: 'function', function: { name: 'now' } },
    ];

    expect(toConverseTools(tools)).toEqual([
      {
        toolSpec: {
          name: 'search',
          description: 'Search the web',
          inputSchema: { json: { type: 'object', properties: { q: { type: 'string' } }, required: ['q'] } },
        },
      },
      {
        toolSpec: {
          name: 'now',
          description: '',
          inputSchema: { json: { type: 'object', properties: {}, required: [] } },
        },
      },
    ]);
  });
});

describe('toConverseRequest', () => {
  const tools: ToolDeclaration[] = [{ type: 'function', function: { name: 'terminate', description: 'Stop' } }];

  it('builds the request with inference settings', () => {
    const { request } = toConverseRequest([Message.user('hi')], options);
    expect(request).toEqual({
      modelId: 'test-model',
      system: [],
      messages: [{ role: 'user', content: [{ text: 'hi' }] }],
      inferenceConfig: { temperature: 0, maxTokens: 512 },
    });
  });

  it('maps tool choice', () => {
    const auto = toConverseRequest([Message.user('hi')], { ...options, tools, toolChoice: 'auto' }).request;
    const required = toConverseRequest([Message.user('hi')], { ...options, tools, toolChoice: 'required' }).request;
    const none = toConverseRequest([Message.user('hi')], { ...options, tools, toolChoice: 'none' }).request;

    expect(auto.toolConfig?.toolChoice).toEqual({ auto: {} });
    expect(required.toolConfig?.toolChoice).toEqual({ any: {} });
    expect(none.toolConfig).toBeUndefined();
  });

  it('omits the tool config without tools', () => {
    const { request } = toConverseRequest([Message.user('hi')], { ...options, tools: [], toolChoice: 'required' });
    expect(request.toolConfig).toBeUndefined();
  });
});

// =============================================================================
// Response assembly
// =============================================================================

describe('fromConverseResponse', () => {
  const now = new Date('2026-01-02T03:04:05.000Z');

  it('assembles a completion from text and tool use blocks', () => {
    const { completion, correlation } = fromConverseResponse(
      {
        output: {
          message: {
            role: 'assistant',
            content: [{ text: 'Let me ' }, { text: 'check.' }, { toolUse: { toolUseId: 't9', name: 'search', input: { q: 'cats' } } }],
          },
        },
        stopReason: 'tool_use',
        usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
      },
      createCorrelationContext(),
      now
    );

    expect(completion.id).toMatch(/^chatcmpl-[0-9a-f-]{36}$/);
    expect(completion.created).toBe(1767323045);
    expect(completion.created_at).toBe('2026-01-02T03:04:05.000Z');
    expect(completion.object).toBe('chat.completion');
    expect(completion.system_fingerprint).toBeNull();
    expect(completion.choices).toEqual([
      {
        finish_reason: 'tool_use',
        index: 0,
        message: {
          content: 'Let me check.',
          role: 'assistant',
          tool_calls: [call('t9', 'search', '{"q":"cats"}')],
          function_call: null,
        },
      },
    ]);
    expect(completion.usage).toEqual({ completion_tokens: 5, prompt_tokens: 10, total_tokens: 15 });
    expect(correlation).toEqual({ currentToolUseId: 't9', pendingToolUseIds: ['t9'] });
  });

  it('defaults empty responses', () => {
    const { completion } = fromConverseResponse({});
    expect(completion.choices[0].message).toEqual({
      content: '.',
      role: 'assistant',
      tool_calls: null,
      function_call: null,
    });
    expect(completion.choices[0].finish_reason).toBe('end_turn');
    expect(completion.usage).toEqual({ completion_tokens: 0, prompt_tokens: 0, total_tokens: 0 });
  });

  it('gives each completion a fresh id', () => {
    expect(fromConverseResponse({}).completion.id).not.toBe(fromConverseResponse({}).completion.id);
  });
});

describe('parseToolArguments', () => {
  it('parses an object', () => {
    expect(parseToolArguments('{"a":1}', 'f')).toEqual({ a: 1 });
  });

  it('treats an empty string as no arguments', () => {
    expect(parseToolArguments('', 'f')).toEqual({});
  });

  it('rejects invalid JSON and non-objects', () => {
    expect(() => parseToolArguments('{"a":', 'f')).toThrow(/^Arguments for tool 'f' are not valid JSON/);
    expect(() => parseToolArguments('[1]', 'f')).toThrow("Arguments for tool 'f' must be a JSON object");
  });
});
