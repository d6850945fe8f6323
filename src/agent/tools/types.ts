/**
 * Tool Descriptor Types
 *
 * Declarative tool definition format for the agent, plus the mergeable
 * result every tool returns.
 */

import { ToolResultMergeError } from '../errors.js';
import type { ToolDeclaration, ToolParameters } from '../../types/agent-types.js';

// ============================================================================
// Tool Result
// ============================================================================

export interface ToolResultFields {
  /** Any value; rendered with `toString` when fed back to the model */
  output?: unknown;
  error?: string;
  base64_image?: string;
  system?: string;
}

export class ToolResult {
  readonly output?: unknown;
  readonly error?: string;
  readonly base64_image?: string;
  readonly system?: string;

  constructor(fields: ToolResultFields = {}) {
    this.output = fields.output;
    this.error = fields.error;
    this.base64_image = fields.base64_image;
    this.system = fields.system;
  }

  /** True iff every field is empty or absent */
  get isEmpty(): boolean {
    return isBlank(this.output) && !this.error && !this.base64_image && !this.system;
  }

  /**
   * Field-wise combination. Text fields concatenate, as do string or array
   * outputs; a result can carry only one image, so two images throw.
   */
  merge(other: ToolResult): ToolResult {
    if (this.base64_image && other.base64_image) {
      throw new ToolResultMergeError('Cannot combine tool results that both carry an image');
    }
    return new ToolResult({
      output: joinOutput(this.output, other.output),
      error: joinField(this.error, other.error),
      base64_image: this.base64_image || other.base64_image || undefined,
      system: joinField(this.system, other.system),
    });
  }

  /** Copy with the given fields replaced */
  replace(fields: ToolResultFields): ToolResult {
    return new ToolResult({ ...this.fields(), ...fields });
  }

  fields(): ToolResultFields {
    const out: ToolResultFields = {};
    if (this.output !== undefined) out.output = this.output;
    if (this.error !== undefined) out.error = this.error;
    if (this.base64_image !== undefined) out.base64_image = this.base64_image;
    if (this.system !== undefined) out.system = this.system;
    return out;
  }

  toString(): string {
    return this.error ? `Error: ${this.error}` : renderOutput(this.output);
  }
}

function isBlank(value: unknown): boolean {
  return !value || (Array.isArray(value) && value.length === 0);
}

function joinOutput(a: unknown, b: unknown): unknown {
  if (isBlank(a)) return isBlank(b) ? undefined : b;
  if (isBlank(b)) return a;
  if (typeof a === 'string' && typeof b === 'string') return a + b;
  if (Array.isArray(a) && Array.isArray(b)) return [...a, ...b];
  throw new ToolResultMergeError(`Cannot combine outputs of kind ${describe(a)} and ${describe(b)}`);
}

function describe(value: unknown): string {
  return Array.isArray(value) ? 'list' : typeof value;
}

function renderOutput(output: unknown): string {
  if (output === undefined || output === null) return '';
  if (typeof output === 'string') return output;
  return JSON.stringify(output) ?? String(output);
}

function joinField(a: string | undefined, b: string | undefined): string | undefined {
  if (a && b) return a + b;
  return a || b || undefined;
}

/** A result meant to be rendered as terminal output */
export class CLIResult extends ToolResult {}

/** A result representing a failed invocation */
export class ToolFailure extends ToolResult {}

// ============================================================================
// Tool Descriptor
// ============================================================================

export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly parameters: ToolParameters;
}

export interface AgentTool extends ToolDefinition {
  /** May throw ToolError instead of returning a failure result */
  execute(args: Record<string, unknown>): Promise<ToolResult>;
}

/**
 * Freeze a tool so its name, description and parameters cannot change after
 * registration.
 */
export function defineTool(tool: AgentTool): AgentTool {
  return Object.freeze({
    name: tool.name,
    description: tool.description,
    parameters: Object.freeze({ ...tool.parameters }),
    execute: (args: Record<string, unknown>) => tool.execute(args),
  });
}

/** Export a tool in the form offered to the model */
export function toToolParam(tool: ToolDefinition): ToolDeclaration {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}

export function ok(output: string): ToolResult {
  return new ToolResult({ output });
}
