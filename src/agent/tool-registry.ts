/**
 * Tool Registry
 *
 * Ordered map of tool names to tools. Execution never throws: an unknown
 * tool or a failing tool comes back as a ToolFailure the agent loop can feed
 * to the model.
 */

import { ToolError } from './errors.js';
import { ToolFailure, toToolParam, type AgentTool, type ToolResult } from './tools/types.js';
import type { ToolDeclaration } from '../types/agent-types.js';

export class ToolRegistry {
  private tools = new Map<string, AgentTool>();

  constructor(tools: readonly AgentTool[] = []) {
    for (const tool of tools) this.register(tool);
  }

  register(tool: AgentTool): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): AgentTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get names(): string[] {
    return Array.from(this.tools.keys());
  }

  /** Declarations in the form offered to the model */
  toParams(): ToolDeclaration[] {
    return Array.from(this.tools.values()).map(toToolParam);
  }

  async execute(name: string, args: Record<string, unknown>): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return new ToolFailure({ error: `Unknown tool: ${name}` });
    }
    try {
      return await tool.execute(args);
    } catch (error) {
      if (error instanceof ToolError) {
        return new ToolFailure({ error: error.message });
      }
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ToolRegistry] ${name} threw: ${message}`);
      return new ToolFailure({ error: `Tool '${name}' encountered a problem: ${message}` });
    }
  }
}
