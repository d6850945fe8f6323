/**
 * Converse Stream Accumulator
 *
 * Folds a Converse event stream into one ConverseResponse, which then goes
 * through the same assembly as a non-streaming response.
 *
 * Blocks are tagged by kind when first seen and matched by index afterwards:
 * a `contentBlockStart` carrying a toolUse opens a tool-use block, a text
 * delta on an unseen index opens a text block. Any number of text and
 * tool-use blocks may appear in one turn, in any index order.
 */

import { ConversionError } from '../errors.js';
import { parseToolArguments } from './converse-format.js';
import type { ConverseResponse, ConverseResponseBlock, ConverseUsage } from './converse-format.js';
import type { JsonObject } from '../../types/agent-types.js';

export interface ConverseStreamEvent {
  messageStart?: { role?: string };
  contentBlockStart?: {
    contentBlockIndex?: number;
    start?: { toolUse?: { toolUseId?: string; name?: string } };
  };
  contentBlockDelta?: {
    contentBlockIndex?: number;
    delta?: { text?: string; toolUse?: { input?: string } };
  };
  contentBlockStop?: { contentBlockIndex?: number };
  messageStop?: { stopReason?: string };
  metadata?: { usage?: ConverseUsage };
}

export interface StreamFragment {
  kind: 'text' | 'tool_input';
  blockIndex: number;
  text: string;
}

export type StreamFragmentListener = (fragment: StreamFragment) => void;

interface TextBlockState {
  kind: 'text';
  text: string;
  closed: boolean;
}

interface ToolUseBlockState {
  kind: 'tool_use';
  toolUseId: string;
  name: string;
  input: string;
  parsed?: JsonObject;
  closed: boolean;
}

type BlockState = TextBlockState | ToolUseBlockState;

export class ConverseStreamAccumulator {
  private role = '';
  private stopReason = '';
  private usage: ConverseUsage | undefined;
  private blocks = new Map<number, BlockState>();
  private listener: StreamFragmentListener | undefined;
  private lastToolUseId: string | undefined;

  constructor(listener?: StreamFragmentListener) {
    this.listener = listener;
  }

  /** Id of the most recently started tool-use block */
  get currentToolUseId(): string | undefined {
    return this.lastToolUseId;
  }

  push(event: ConverseStreamEvent): void {
    if (event.messageStart?.role) {
      this.role = event.messageStart.role;
    }

    const start = event.contentBlockStart;
    if (start?.start?.toolUse) {
      const index = start.contentBlockIndex ?? this.blocks.size;
      if (this.blocks.has(index)) {
        throw new ConversionError(`Content block ${index} was started twice`);
      }
      const toolUse = start.start.toolUse;
      this.blocks.set(index, {
        kind: 'tool_use',
        toolUseId: toolUse.toolUseId ?? '',
        name: toolUse.name ?? '',
        input: '',
        closed: false,
      });
      this.lastToolUseId = toolUse.toolUseId;
    }

    const delta = event.contentBlockDelta;
    if (delta?.delta) {
      const index = delta.contentBlockIndex ?? 0;
      if (delta.delta.text) this.appendText(index, delta.delta.text);
      const input = delta.delta.toolUse?.input;
      if (input !== undefined) this.appendToolInput(index, input);
    }

    if (event.contentBlockStop) {
      this.closeBlock(event.contentBlockStop.contentBlockIndex ?? 0);
    }

    if (event.messageStop?.stopReason) {
      this.stopReason = event.messageStop.stopReason;
    }

    if (event.metadata?.usage) {
      this.usage = event.metadata.usage;
    }
  }

  /**
   * Build the accumulated response. Blocks still open are closed first.
   */
  finish(): ConverseResponse {
    const content: ConverseResponseBlock[] = [];
    const indices = Array.from(this.blocks.keys()).sort((a, b) => a - b);

    for (const index of indices) {
      this.closeBlock(index);
      const block = this.blocks.get(index);
      if (!block) continue;
      if (block.kind === 'text') {
        content.push({ text: block.text });
      } else {
        content.push({
          toolUse: { toolUseId: block.toolUseId, name: block.name, input: block.parsed ?? {} },
        });
      }
    }

    return {
      output: { message: { role: this.role, content } },
      stopReason: this.stopReason,
      usage: this.usage,
    };
  }

  private appendText(index: number, text: string): void {
    let block = this.blocks.get(index);
    if (!block) {
      block = { kind: 'text', text: '', closed: false };
      this.blocks.set(index, block);
    }
    if (block.kind !== 'text') {
      throw new ConversionError(`Text delta received for tool-use block ${index}`);
    }
    if (block.closed) {
      throw new ConversionError(`Text delta received after block ${index} stopped`);
    }
    block.text += text;
    this.listener?.({ kind: 'text', blockIndex: index, text });
  }

  private appendToolInput(index: number, input: string): void {
    const block = this.blocks.get(index);
    if (!block || block.kind !== 'tool_use') {
      throw new ConversionError(`Tool input received for block ${index}, which is not a started tool-use block`);
    }
    if (block.closed) {
      throw new ConversionError(`Tool input received after block ${index} stopped`);
    }
    block.input += input;
    this.listener?.({ kind: 'tool_input', blockIndex: index, text: input });
  }

  private closeBlock(index: number): void {
    const block = this.blocks.get(index);
    if (!block || block.closed) return;
    block.closed = true;
    if (block.kind === 'tool_use') {
      block.parsed = parseToolArguments(block.input, block.name);
    }
  }
}

/**
 * Drain an event stream into a single response.
 */
export async function collectConverseStream(
  events: AsyncIterable<ConverseStreamEvent>,
  listener?: StreamFragmentListener
): Promise<ConverseResponse> {
  const accumulator = new ConverseStreamAccumulator(listener);
  for await (const event of events) {
    accumulator.push(event);
  }
  return accumulator.finish();
}
