/**
 * converse-agent
 *
 * A tool-using chat agent over Converse-format model backends:
 * - Canonical chat-completion message model with bounded memory
 * - Protocol adapter between canonical messages and the Converse wire format
 * - Streaming accumulation of Converse event streams
 * - Think/act agent loop with stuck detection and a step cap
 * - Per-conversation agent pool
 *
 * @module converse-agent
 */

// Core types
export * from './types/agent-types.js';

// Errors
export {
  AgentError,
  MessageConstructionError,
  ConversionError,
  ToolError,
  ToolResultMergeError,
  AgentStateError,
} from './agent/errors.js';

// Canonical format
export { Message, Memory, MessageRecordSchema, DEFAULT_MAX_MESSAGES } from './agent/canonical-format.js';
export type { MessageFields, MessageDict, MessageRecord } from './agent/canonical-format.js';

// Tools
export { ToolResult, CLIResult, ToolFailure, defineTool, toToolParam, ok } from './agent/tools/types.js';
export type { ToolResultFields, ToolDefinition, AgentTool } from './agent/tools/types.js';
export { TERMINATE_TOOL_NAME, terminateTool } from './agent/tools/terminate.js';
export { ToolRegistry } from './agent/tool-registry.js';

// Providers
export type { LLMProvider, ChatParams } from './agent/llm-provider.js';
export * from './agent/providers/index.js';

// Agent
export {
  AgentLoop,
  DEFAULT_MAX_STEPS,
  DEFAULT_DUPLICATE_THRESHOLD,
  FALLBACK_REPLY,
  FAILURE_REPLY,
  STUCK_DIRECTIVE,
} from './agent/agent-loop.js';
export type { AgentLoopConfig, StepOptions } from './agent/agent-loop.js';
export { AgentPool, GUEST_KEY } from './agent/agent-pool.js';
export type { AgentFactory, HandledMessage } from './agent/agent-pool.js';
export { PromptBuilder, DEFAULT_SYSTEM_PROMPT, DEFAULT_NEXT_STEP_PROMPT } from './agent/prompt-builder.js';
export type { PromptBuilderConfig } from './agent/prompt-builder.js';

// Messaging
export { EventChannel } from './messaging/event-channel.js';

// Configuration
export { loadConfig, getConfig, resetConfig, validateConfig, shouldLog, DEFAULT_MODEL_ID } from './config/index.js';
export type { AgentEnvConfig, LogLevel } from './config/index.js';
