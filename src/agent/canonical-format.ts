/**
 * Canonical Message Format
 *
 * Backend-neutral conversation model. Every provider converts to/from this
 * at its boundary, so history can be persisted and replayed against any
 * backend.
 */

import { z } from 'zod';
import { MessageConstructionError } from './errors.js';
import { ROLES, isRole } from '../types/agent-types.js';
import type { Role, ToolCall } from '../types/agent-types.js';

// ============================================================================
// Types
// ============================================================================

export interface MessageFields {
  content?: string;
  tool_calls?: ToolCall[];
  name?: string;
  tool_call_id?: string;
  base64_image?: string;
}

/** Serialized message. Absent fields are omitted, never null. */
export interface MessageDict extends MessageFields {
  role: Role;
}

const ToolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function').default('function'),
  function: z.object({
    name: z.string(),
    arguments: z.string(),
  }),
});

/**
 * Inbound message record, e.g. a row from conversation persistence.
 * Nulls are accepted and treated as absent.
 */
export const MessageRecordSchema = z.object({
  role: z.string(),
  content: z.string().nullish(),
  tool_calls: z.array(ToolCallSchema).nullish(),
  name: z.string().nullish(),
  tool_call_id: z.string().nullish(),
  base64_image: z.string().nullish(),
});

export type MessageRecord = z.input<typeof MessageRecordSchema>;

// ============================================================================
// Message
// ============================================================================

export class Message {
  readonly role: Role;
  readonly content?: string;
  readonly tool_calls?: ToolCall[];
  readonly name?: string;
  readonly tool_call_id?: string;
  readonly base64_image?: string;

  private constructor(role: Role, fields: MessageFields) {
    this.role = role;
    if (fields.content !== undefined) this.content = fields.content;
    if (fields.tool_calls !== undefined) this.tool_calls = fields.tool_calls.map(cloneToolCall);
    if (fields.name !== undefined) this.name = fields.name;
    if (fields.tool_call_id !== undefined) this.tool_call_id = fields.tool_call_id;
    if (fields.base64_image !== undefined) this.base64_image = fields.base64_image;
  }

  /**
   * Build a message for an arbitrary role string. Unknown roles throw.
   */
  static create(role: string, fields: MessageFields = {}): Message {
    if (!isRole(role)) {
      throw new MessageConstructionError(`Invalid role: ${role} (expected one of ${ROLES.join(', ')})`);
    }
    if (role === 'tool' && fields.tool_call_id === undefined) {
      throw new MessageConstructionError('A tool message requires tool_call_id');
    }
    return new Message(role, fields);
  }

  static user(content: string, base64Image?: string): Message {
    return new Message('user', { content, base64_image: base64Image });
  }

  static system(content: string): Message {
    return new Message('system', { content });
  }

  static assistant(content?: string, base64Image?: string): Message {
    return new Message('assistant', { content, base64_image: base64Image });
  }

  static tool(content: string, name: string, toolCallId: string, base64Image?: string): Message {
    return new Message('tool', { content, name, tool_call_id: toolCallId, base64_image: base64Image });
  }

  /**
   * Assistant message carrying the tool calls requested by the model.
   */
  static fromToolCalls(toolCalls: ToolCall[], content = '', base64Image?: string): Message {
    return new Message('assistant', { content, tool_calls: toolCalls, base64_image: base64Image });
  }

  /**
   * Validate and build a message from an untrusted record.
   */
  static fromDict(record: unknown): Message {
    const parsed = MessageRecordSchema.safeParse(record);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'message'}: ${i.message}`);
      throw new MessageConstructionError(`Malformed message: ${issues.join('; ')}`);
    }
    const r = parsed.data;
    return Message.create(r.role, {
      content: r.content ?? undefined,
      tool_calls: r.tool_calls ?? undefined,
      name: r.name ?? undefined,
      tool_call_id: r.tool_call_id ?? undefined,
      base64_image: r.base64_image ?? undefined,
    });
  }

  /**
   * Join messages and message lists, preserving argument order.
   */
  static concat(left: Message | readonly Message[], right: Message | readonly Message[]): Message[] {
    return [...toMessageList(left, 'left'), ...toMessageList(right, 'right')];
  }

  toDict(): MessageDict {
    const dict: MessageDict = { role: this.role };
    if (this.content !== undefined) dict.content = this.content;
    if (this.tool_calls !== undefined) dict.tool_calls = this.tool_calls.map(cloneToolCall);
    if (this.name !== undefined) dict.name = this.name;
    if (this.tool_call_id !== undefined) dict.tool_call_id = this.tool_call_id;
    if (this.base64_image !== undefined) dict.base64_image = this.base64_image;
    return dict;
  }
}

function cloneToolCall(call: ToolCall): ToolCall {
  return { id: call.id, type: 'function', function: { name: call.function.name, arguments: call.function.arguments } };
}

function toMessageList(operand: unknown, side: 'left' | 'right'): Message[] {
  if (operand instanceof Message) return [operand];
  if (Array.isArray(operand) && operand.every((m) => m instanceof Message)) {
    return operand.filter((m): m is Message => m instanceof Message);
  }
  const kind = operand === null ? 'null' : Array.isArray(operand) ? 'array of non-messages' : typeof operand;
  throw new TypeError(`Cannot concatenate a message with ${kind} (${side} operand)`);
}

// ============================================================================
// Memory
// ============================================================================

export const DEFAULT_MAX_MESSAGES = 100;

/**
 * Ordered conversation history. Appends beyond `maxMessages` evict the
 * oldest entries.
 */
export class Memory {
  readonly maxMessages: number;
  private items: Message[] = [];

  constructor(maxMessages = DEFAULT_MAX_MESSAGES) {
    if (!Number.isInteger(maxMessages) || maxMessages < 1) {
      throw new RangeError(`maxMessages must be a positive integer, got ${maxMessages}`);
    }
    this.maxMessages = maxMessages;
  }

  get messages(): readonly Message[] {
    return this.items;
  }

  get length(): number {
    return this.items.length;
  }

  addMessage(message: Message): void {
    this.addMessages([message]);
  }

  addMessages(messages: readonly Message[]): void {
    this.items.push(...messages);
    if (this.items.length > this.maxMessages) {
      this.items = this.items.slice(-this.maxMessages);
    }
  }

  clear(): void {
    this.items = [];
  }

  getRecentMessages(n: number): Message[] {
    if (n <= 0) return [];
    return this.items.slice(-n);
  }

  toDictList(): MessageDict[] {
    return this.items.map((m) => m.toDict());
  }
}
