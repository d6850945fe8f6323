/**
 * Converse Wire Format
 *
 * Converts canonical chat-completion state to and from the Converse wire
 * format (system prompt field, role-alternating messages made of text /
 * toolUse / toolResult blocks, toolSpec declarations).
 *
 * Tool results on the wire are correlated by the id of the tool call they
 * answer. That id is threaded through a CorrelationContext which each
 * conversion takes and returns; nothing is kept between calls.
 */

import { randomUUID } from 'crypto';
import { ConversionError } from '../errors.js';
import type {
  ChatCompletion,
  JsonObject,
  JsonValue,
  ToolCall,
  ToolChoice,
  ToolDeclaration,
} from '../../types/agent-types.js';

// ============================================================================
// Wire Types
// ============================================================================

export interface ConverseTextBlock {
  text: string;
}

export interface ConverseToolUseBlock {
  toolUse: {
    toolUseId: string;
    name: string;
    input: JsonValue;
  };
}

export interface ConverseToolResultBlock {
  toolResult: {
    toolUseId: string;
    content: ConverseTextBlock[];
  };
}

export type ConverseContentBlock = ConverseTextBlock | ConverseToolUseBlock | ConverseToolResultBlock;

export interface ConverseMessage {
  role: 'user' | 'assistant';
  content: ConverseContentBlock[];
}

export interface ConverseToolSpec {
  toolSpec: {
    name: string;
    description: string;
    inputSchema: { json: JsonObject };
  };
}

export type ConverseToolChoice = { auto: Record<string, never> } | { any: Record<string, never> };

export interface ConverseRequest {
  modelId: string;
  system: ConverseTextBlock[];
  messages: ConverseMessage[];
  inferenceConfig: { temperature: number; maxTokens: number };
  toolConfig?: { tools: ConverseToolSpec[]; toolChoice?: ConverseToolChoice };
}

export interface ConverseUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

/** Response content block as the backend returns it; every field optional */
export interface ConverseResponseBlock {
  text?: string;
  toolUse?: {
    toolUseId?: string;
    name?: string;
    input?: JsonValue;
  };
}

export interface ConverseResponse {
  output?: {
    message?: {
      role?: string;
      content?: ConverseResponseBlock[];
    };
  };
  stopReason?: string;
  usage?: ConverseUsage;
}

/** Any message-shaped record; the role is checked at conversion time */
export interface AdapterMessage {
  role: string;
  content?: string | null;
  tool_calls?: readonly ToolCall[] | null;
  tool_call_id?: string | null;
}

// ============================================================================
// Correlation
// ============================================================================

export interface CorrelationContext {
  /** Id of the tool call most recently seen */
  currentToolUseId?: string;
  /** Tool calls of the latest assistant turn that have no result yet */
  pendingToolUseIds: string[];
}

export function createCorrelationContext(currentToolUseId?: string): CorrelationContext {
  return { currentToolUseId, pendingToolUseIds: [] };
}

/** Substituted for an empty reply so assistant content is never empty */
export const PLACEHOLDER_CONTENT = '.';

// ============================================================================
// Request: canonical -> wire
// ============================================================================

export interface ConverseRequestOptions {
  modelId: string;
  maxTokens: number;
  temperature: number;
  tools?: readonly ToolDeclaration[];
  toolChoice?: ToolChoice;
  /**
   * Emit only the first tool call of an assistant turn. Later tool results
   * then all correlate to that call.
   */
  singleToolUse?: boolean;
}

export interface ConvertedMessages {
  system: ConverseTextBlock[];
  messages: ConverseMessage[];
  correlation: CorrelationContext;
}

/**
 * Convert canonical messages. The last system message becomes the system
 * prompt; each tool message answers the next pending tool call of the
 * preceding assistant turn, whatever its own `tool_call_id` says.
 */
export function toConverseMessages(
  messages: readonly AdapterMessage[],
  correlation: CorrelationContext = createCorrelationContext(),
  singleToolUse = false
): ConvertedMessages {
  let system: ConverseTextBlock[] = [];
  const out: ConverseMessage[] = [];
  let currentToolUseId = correlation.currentToolUseId;
  let pending = [...correlation.pendingToolUseIds];

  for (const message of messages) {
    switch (message.role) {
      case 'system':
        system = [{ text: message.content ?? '' }];
        break;

      case 'user':
        out.push({ role: 'user', content: [{ text: message.content ?? '' }] });
        break;

      case 'assistant': {
        const content: ConverseContentBlock[] = [];
        if (message.content) content.push({ text: message.content });

        const calls = message.tool_calls ?? [];
        const emitted = singleToolUse ? calls.slice(0, 1) : calls;
        for (const call of emitted) {
          content.push({
            toolUse: {
              toolUseId: call.id,
              name: call.function.name,
              input: parseToolArguments(call.function.arguments, call.function.name),
            },
          });
        }
        if (emitted.length > 0) {
          currentToolUseId = emitted[0].id;
          pending = emitted.map((c) => c.id);
        }
        if (content.length === 0) content.push({ text: PLACEHOLDER_CONTENT });

        out.push({ role: 'assistant', content });
        break;
      }

      case 'tool': {
        const toolUseId = pending.shift() ?? currentToolUseId;
        if (toolUseId === undefined) {
          throw new ConversionError('Tool result has no preceding tool call to answer');
        }
        currentToolUseId = toolUseId;

        const block: ConverseToolResultBlock = {
          toolResult: { toolUseId, content: [{ text: message.content ?? '' }] },
        };
        // Results for one assistant turn travel together in a single user message
        const previous = out[out.length - 1];
        if (previous && previous.role === 'user' && previous.content.every(isToolResultBlock)) {
          previous.content.push(block);
        } else {
          out.push({ role: 'user', content: [block] });
        }
        break;
      }

      default:
        throw new ConversionError(`Invalid role: ${message.role}`);
    }
  }

  return { system, messages: out, correlation: { currentToolUseId, pendingToolUseIds: pending } };
}

/**
 * Convert chat-completion tool declarations to toolSpecs. Declarations that
 * are not functions are dropped.
 */
export function toConverseTools(tools: readonly ToolDeclaration[]): ConverseToolSpec[] {
  const specs: ConverseToolSpec[] = [];
  for (const tool of tools) {
    if (tool.type !== 'function' || !tool.function) continue;
    const fn = tool.function;
    specs.push({
      toolSpec: {
        name: fn.name,
        description: fn.description ?? '',
        inputSchema: {
          json: {
            type: 'object',
            properties: fn.parameters?.properties ?? {},
            required: fn.parameters?.required ?? [],
          },
        },
      },
    });
  }
  return specs;
}

export interface TranslatedRequest {
  request: ConverseRequest;
  correlation: CorrelationContext;
}

export function toConverseRequest(
  messages: readonly AdapterMessage[],
  options: ConverseRequestOptions,
  correlation?: CorrelationContext
): TranslatedRequest {
  const converted = toConverseMessages(messages, correlation, options.singleToolUse);
  const request: ConverseRequest = {
    modelId: options.modelId,
    system: converted.system,
    messages: converted.messages,
    inferenceConfig: { temperature: options.temperature, maxTokens: options.maxTokens },
  };

  const tools = options.toolChoice === 'none' ? [] : toConverseTools(options.tools ?? []);
  if (tools.length > 0) {
    request.toolConfig = { tools };
    if (options.toolChoice === 'auto') request.toolConfig.toolChoice = { auto: {} };
    if (options.toolChoice === 'required') request.toolConfig.toolChoice = { any: {} };
  }

  return { request, correlation: converted.correlation };
}

// ============================================================================
// Response: wire -> canonical
// ============================================================================

export interface TranslatedResponse {
  completion: ChatCompletion;
  correlation: CorrelationContext;
}

/**
 * Assemble a chat completion from a Converse response. The last tool call id
 * becomes the current correlation id for the next request.
 */
export function fromConverseResponse(
  response: ConverseResponse,
  correlation: CorrelationContext = createCorrelationContext(),
  now: Date = new Date()
): TranslatedResponse {
  const message = response.output?.message;
  const blocks = message?.content ?? [];

  const text = blocks.map((b) => b.text ?? '').join('');
  const content = text === '' ? PLACEHOLDER_CONTENT : text;

  let currentToolUseId = correlation.currentToolUseId;
  const toolCalls: ToolCall[] = [];
  for (const block of blocks) {
    if (!block.toolUse) continue;
    const id = block.toolUse.toolUseId ?? '';
    currentToolUseId = id;
    toolCalls.push({
      id,
      type: 'function',
      function: {
        name: block.toolUse.name ?? '',
        arguments: JSON.stringify(block.toolUse.input ?? {}),
      },
    });
  }

  const completion: ChatCompletion = {
    id: `chatcmpl-${randomUUID()}`,
    created: Math.floor(now.getTime() / 1000),
    created_at: now.toISOString(),
    object: 'chat.completion',
    system_fingerprint: null,
    choices: [
      {
        finish_reason: response.stopReason || 'end_turn',
        index: 0,
        message: {
          content,
          role: message?.role || 'assistant',
          tool_calls: toolCalls.length > 0 ? toolCalls : null,
          function_call: null,
        },
      },
    ],
    usage: {
      completion_tokens: response.usage?.outputTokens ?? 0,
      prompt_tokens: response.usage?.inputTokens ?? 0,
      total_tokens: response.usage?.totalTokens ?? 0,
    },
  };

  return {
    completion,
    correlation: { currentToolUseId, pendingToolUseIds: toolCalls.map((c) => c.id) },
  };
}

// ============================================================================
// Helpers
// ============================================================================

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse serialized tool arguments. An empty string means no arguments.
 */
export function parseToolArguments(raw: string, toolName: string): JsonObject {
  if (raw.trim() === '') return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConversionError(`Arguments for tool '${toolName}' are not valid JSON: ${reason}`);
  }
  if (!isJsonObject(parsed)) {
    throw new ConversionError(`Arguments for tool '${toolName}' must be a JSON object`);
  }
  return parsed;
}

function isToolResultBlock(block: ConverseContentBlock): block is ConverseToolResultBlock {
  return 'toolResult' in block;
}
