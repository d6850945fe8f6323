/**
 * Agent Core Types
 *
 * Type definitions shared by the message model, the protocol adapter and the
 * agent loop.
 */

// ============================================================================
// Roles & States
// ============================================================================

export const ROLES = ['system', 'user', 'assistant', 'tool'] as const;

export type Role = (typeof ROLES)[number];

export function isRole(value: unknown): value is Role {
  return ROLES.some((role) => role === value);
}

export const TOOL_CHOICES = ['none', 'auto', 'required'] as const;

export type ToolChoice = (typeof TOOL_CHOICES)[number];

/**
 * Agent execution state. IDLE is the resting state between runs.
 */
export enum AgentState {
  IDLE = 'IDLE',
  RUNNING = 'RUNNING',
  FINISHED = 'FINISHED',
  ERROR = 'ERROR',
}

// ============================================================================
// JSON
// ============================================================================

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

// ============================================================================
// Tool Calls
// ============================================================================

export interface FunctionCall {
  name: string;
  /** Serialized JSON object */
  arguments: string;
}

export interface ToolCall {
  id: string;
  type: 'function';
  function: FunctionCall;
}

/**
 * JSON-schema-like parameter spec offered to the model.
 */
export interface ToolParameters {
  type: 'object';
  properties: Record<string, JsonValue>;
  required?: string[];
}

/**
 * A tool offered to the model in chat-completion form.
 *
 * `type` stays a plain string: declarations that are not functions are
 * accepted here and dropped by the adapter.
 */
export interface ToolDeclaration {
  type: string;
  function?: {
    name: string;
    description?: string;
    parameters?: ToolParameters;
  };
}

// ============================================================================
// Chat Completion Envelope
// ============================================================================

export interface ChatCompletionUsage {
  completion_tokens: number;
  prompt_tokens: number;
  total_tokens: number;
}

export interface ChatCompletionMessage {
  content: string;
  role: string;
  tool_calls: ToolCall[] | null;
  function_call: null;
}

export interface ChatCompletionChoice {
  finish_reason: string;
  index: number;
  message: ChatCompletionMessage;
}

export interface ChatCompletion {
  id: string;
  /** Unix seconds */
  created: number;
  /** ISO-8601 generation timestamp */
  created_at: string;
  object: 'chat.completion';
  system_fingerprint: null;
  choices: ChatCompletionChoice[];
  usage: ChatCompletionUsage;
}

// ============================================================================
// Agent Loop Types
// ============================================================================

export type AgentRunOutcome = 'finished' | 'max_steps' | 'error';

export interface AgentUsageStats {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of one top-level run.
 */
export interface AgentRunResult {
  /** `max_steps` is a normal termination, distinct from a model-signaled `finished` */
  outcome: AgentRunOutcome;
  steps: number;
  summaries: string[];
  /** User-visible reply */
  reply: string;
  usage: AgentUsageStats;
  error?: Error;
}

interface AgentStreamEventBase {
  step: number;
}

export interface StepStartEvent extends AgentStreamEventBase {
  type: 'step_start';
}

export interface TextEvent extends AgentStreamEventBase {
  type: 'text';
  text: string;
}

export interface ToolInputEvent extends AgentStreamEventBase {
  type: 'tool_input';
  text: string;
}

export interface ToolCallEvent extends AgentStreamEventBase {
  type: 'tool_call';
  toolCallId: string;
  toolName: string;
  arguments: string;
}

export interface ToolResultEvent extends AgentStreamEventBase {
  type: 'tool_result';
  toolCallId: string;
  toolName: string;
  status: 'completed' | 'failed';
  observation: string;
}

export interface NudgeEvent extends AgentStreamEventBase {
  type: 'nudge';
  directive: string;
}

export interface StepEndEvent extends AgentStreamEventBase {
  type: 'step_end';
  summary: string;
}

export interface DoneEvent extends AgentStreamEventBase {
  type: 'done';
  result: AgentRunResult;
}

export type AgentStreamEvent =
  | StepStartEvent
  | TextEvent
  | ToolInputEvent
  | ToolCallEvent
  | ToolResultEvent
  | NudgeEvent
  | StepEndEvent
  | DoneEvent;
