/**
 * Prompt Builder
 *
 * Assembles the system prompt: the base prompt, the next-step guidance, and
 * any directives the agent loop injected into the conversation. The base and
 * next-step prompts can be overridden by SYSTEM.md / NEXT_STEP.md in a prompt
 * directory; file contents are cached with mtime-based invalidation.
 */

import * as fs from 'fs';
import * as path from 'path';

export interface PromptBuilderConfig {
  /** Directory holding SYSTEM.md and NEXT_STEP.md overrides */
  promptDir?: string;
  systemPrompt?: string;
  nextStepPrompt?: string;
}

export const DEFAULT_SYSTEM_PROMPT = `You are a capable, general-purpose assistant that solves the user's request step by step.
You can call the tools you are given. Call at most the tools you need, read each result carefully, and build on it.
Answer in the language the user writes in.`;

export const DEFAULT_NEXT_STEP_PROMPT = `Based on the conversation so far, choose the most useful next action.
For a complex task, break it down and use the tools one step at a time.
After each tool call, explain the result and decide what to do next.
When the request is fully handled, give the final answer and call the terminate tool.`;

const PROMPT_FILES = ['SYSTEM.md', 'NEXT_STEP.md'] as const;

type PromptFile = (typeof PROMPT_FILES)[number];

export class PromptBuilder {
  private config: PromptBuilderConfig;
  private cache: { content: string; mtimes: Map<PromptFile, number> } | null = null;

  constructor(config: PromptBuilderConfig = {}) {
    this.config = config;
  }

  /**
   * Build the full system prompt. `directives` are appended last, in order.
   */
  buildSystemPrompt(directives: readonly string[] = []): string {
    const staticPrompt = this.getStaticPrompt();
    const extra = directives.map((d) => d.trim()).filter((d) => d.length > 0);
    if (extra.length === 0) return staticPrompt;
    return [staticPrompt, ...extra].join('\n\n');
  }

  private getStaticPrompt(): string {
    const currentMtimes = this.getFileMtimes();
    if (this.cache && this.mtimesMatch(this.cache.mtimes, currentMtimes)) {
      return this.cache.content;
    }

    const parts: string[] = [];
    parts.push(this.readFile('SYSTEM.md') ?? this.config.systemPrompt ?? DEFAULT_SYSTEM_PROMPT);
    parts.push(this.readFile('NEXT_STEP.md') ?? this.config.nextStepPrompt ?? DEFAULT_NEXT_STEP_PROMPT);

    const content = parts.filter((p) => p.length > 0).join('\n\n');
    this.cache = { content, mtimes: currentMtimes };
    return content;
  }

  private readFile(name: PromptFile): string | null {
    if (!this.config.promptDir) return null;
    const filePath = path.join(this.config.promptDir, name);
    if (!fs.existsSync(filePath)) return null;
    return fs.readFileSync(filePath, 'utf8').trim() || null;
  }

  private getFileMtimes(): Map<PromptFile, number> {
    const mtimes = new Map<PromptFile, number>();
    if (!this.config.promptDir) return mtimes;
    for (const name of PROMPT_FILES) {
      const filePath = path.join(this.config.promptDir, name);
      if (fs.existsSync(filePath)) {
        mtimes.set(name, fs.statSync(filePath).mtimeMs);
      }
    }
    return mtimes;
  }

  private mtimesMatch(a: Map<PromptFile, number>, b: Map<PromptFile, number>): boolean {
    if (a.size !== b.size) return false;
    for (const [key, val] of a) {
      if (b.get(key) !== val) return false;
    }
    return true;
  }
}
