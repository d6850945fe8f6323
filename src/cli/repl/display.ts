/**
 * Terminal display utilities
 */

import type { AgentRunResult, AgentStreamEvent } from '../../types/agent-types.js';

// ANSI color codes (avoiding chalk dependency issues with ESM)
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
};

export function color(text: string, ...codes: (keyof typeof colors)[]): string {
  const prefix = codes.map((c) => colors[c]).join('');
  return `${prefix}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return color(text, 'bold');
}

export function dim(text: string): string {
  return color(text, 'dim');
}

export function success(text: string): string {
  return color(text, 'green');
}

export function error(text: string): string {
  return color(text, 'red');
}

export function warn(text: string): string {
  return color(text, 'yellow');
}

export function agent(text: string): string {
  return color(text, 'magenta');
}

/**
 * Format agent response for display
 */
export function formatAgentResponse(content: string): void {
  console.log();
  console.log(agent(bold('Agent:')));
  console.log(wrapText(content, 78));
  console.log();
}

/**
 * Format error for display
 */
export function formatError(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  console.log();
  console.log(error(`Error: ${message}`));
  console.log();
}

/**
 * Terminal text for one stream event. Text fragments come back unchanged so
 * they can be written as they arrive; tool input is not shown.
 */
export function renderStreamEvent(event: AgentStreamEvent): string {
  switch (event.type) {
    case 'step_start':
      return event.step === 1 ? `${agent(bold('Agent:'))}\n` : '\n';
    case 'text':
      return event.text;
    case 'tool_input':
      return '';
    case 'tool_call':
      return `\n${dim(`-> ${event.toolName}(${truncate(event.arguments, 120)})`)}\n`;
    case 'tool_result':
      return event.status === 'failed'
        ? `${error(`x ${event.toolName}: ${truncate(event.observation, 200)}`)}\n`
        : `${success(`ok ${event.toolName}`)}\n`;
    case 'nudge':
      return `${warn('(repeating itself, asked to change strategy)')}\n`;
    case 'step_end':
      return '';
    case 'done':
      return `\n${formatRunFooter(event.result)}\n`;
  }
}

/**
 * One-line run summary: outcome, steps and token usage.
 */
export function formatRunFooter(result: AgentRunResult): string {
  const parts = [
    result.outcome,
    `${result.steps} step${result.steps === 1 ? '' : 's'}`,
    `${result.usage.totalTokens} tokens`,
  ];
  const line = dim(`[${parts.join(' | ')}]`);
  return result.outcome === 'error' ? `${error(result.reply)}\n${line}` : line;
}

/**
 * Show a simple spinner
 */
export function showSpinner(text: string): { stop: () => void } {
  const frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  let i = 0;

  process.stdout.write(`\r${dim(frames[i])} ${dim(text)}`);

  const interval = setInterval(() => {
    i = (i + 1) % frames.length;
    process.stdout.write(`\r${dim(frames[i])} ${dim(text)}`);
  }, 80);

  return {
    stop: () => {
      clearInterval(interval);
      process.stdout.write('\r' + ' '.repeat(text.length + 4) + '\r');
    },
  };
}

/**
 * Wrap text to specified width
 */
export function wrapText(text: string, width: number): string {
  const lines: string[] = [];

  for (const paragraph of text.split('\n')) {
    if (paragraph.length <= width) {
      lines.push(paragraph);
      continue;
    }

    const words = paragraph.split(' ');
    let currentLine = '';

    for (const word of words) {
      if ((currentLine + ' ' + word).trim().length <= width) {
        currentLine = (currentLine + ' ' + word).trim();
      } else {
        if (currentLine) lines.push(currentLine);
        currentLine = word;
      }
    }
    if (currentLine) lines.push(currentLine);
  }

  return lines.join('\n');
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
