/**
 * Agent Errors
 *
 * Construction and conversion errors are fatal for the current request.
 * Tool errors are fed back into the conversation by the agent loop.
 */

export class AgentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid role or malformed message shape */
export class MessageConstructionError extends AgentError {}

/** Unparseable tool arguments or a role the backend cannot carry */
export class ConversionError extends AgentError {}

/** Raised by a tool instead of returning a result */
export class ToolError extends AgentError {}

/** Two tool results that both carry an image */
export class ToolResultMergeError extends AgentError {}

/** A run was started while the agent was not IDLE */
export class AgentStateError extends AgentError {}
