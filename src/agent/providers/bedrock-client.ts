/**
 * Bedrock Converse Client
 *
 * ConverseClient backed by @aws-sdk/client-bedrock-runtime. Credentials and
 * region come from the standard AWS provider chain unless overridden.
 */

import { BedrockRuntimeClient, ConverseCommand, ConverseStreamCommand } from '@aws-sdk/client-bedrock-runtime';
import type { ContentBlock, ConverseCommandOutput, ConverseStreamOutput } from '@aws-sdk/client-bedrock-runtime';
import type { ConverseRequest, ConverseResponse, ConverseResponseBlock } from './converse-format.js';
import type { ConverseStreamEvent } from './converse-stream.js';
import type { ConverseClient } from './converse-provider.js';

export interface BedrockConverseClientConfig {
  region?: string;
  /** Pre-built SDK client; takes precedence over `region` */
  client?: BedrockRuntimeClient;
}

export class BedrockConverseClient implements ConverseClient {
  private client: BedrockRuntimeClient;

  constructor(config: BedrockConverseClientConfig = {}) {
    this.client = config.client ?? new BedrockRuntimeClient(config.region ? { region: config.region } : {});
  }

  async converse(request: ConverseRequest): Promise<ConverseResponse> {
    const output = await this.client.send(new ConverseCommand(request));
    return fromSdkOutput(output);
  }

  async *converseStream(request: ConverseRequest): AsyncIterable<ConverseStreamEvent> {
    const output = await this.client.send(new ConverseStreamCommand(request));
    if (!output.stream) return;
    for await (const event of output.stream) {
      const mapped = fromSdkStreamEvent(event);
      if (mapped) yield mapped;
    }
  }
}

function fromSdkBlock(block: ContentBlock): ConverseResponseBlock {
  const mapped: ConverseResponseBlock = {};
  if (block.text !== undefined) mapped.text = block.text;
  if (block.toolUse) {
    mapped.toolUse = {
      toolUseId: block.toolUse.toolUseId,
      name: block.toolUse.name,
      input: block.toolUse.input,
    };
  }
  return mapped;
}

function fromSdkOutput(output: ConverseCommandOutput): ConverseResponse {
  const message = output.output?.message;
  return {
    output: {
      message: {
        role: message?.role,
        content: (message?.content ?? []).map(fromSdkBlock),
      },
    },
    stopReason: output.stopReason,
    usage: output.usage
      ? {
          inputTokens: output.usage.inputTokens,
          outputTokens: output.usage.outputTokens,
          totalTokens: output.usage.totalTokens,
        }
      : undefined,
  };
}

function fromSdkStreamEvent(event: ConverseStreamOutput): ConverseStreamEvent | undefined {
  if (event.messageStart) {
    return { messageStart: { role: event.messageStart.role } };
  }
  if (event.contentBlockStart) {
    const toolUse = event.contentBlockStart.start?.toolUse;
    return {
      contentBlockStart: {
        contentBlockIndex: event.contentBlockStart.contentBlockIndex,
        start: toolUse ? { toolUse: { toolUseId: toolUse.toolUseId, name: toolUse.name } } : {},
      },
    };
  }
  if (event.contentBlockDelta) {
    const delta = event.contentBlockDelta.delta;
    return {
      contentBlockDelta: {
        contentBlockIndex: event.contentBlockDelta.contentBlockIndex,
        delta: {
          text: delta?.text,
          toolUse: delta?.toolUse ? { input: delta.toolUse.input } : undefined,
        },
      },
    };
  }
  if (event.contentBlockStop) {
    return { contentBlockStop: { contentBlockIndex: event.contentBlockStop.contentBlockIndex } };
  }
  if (event.messageStop) {
    return { messageStop: { stopReason: event.messageStop.stopReason } };
  }
  if (event.metadata) {
    const usage = event.metadata.usage;
    return {
      metadata: {
        usage: usage
          ? { inputTokens: usage.inputTokens, outputTokens: usage.outputTokens, totalTokens: usage.totalTokens }
          : undefined,
      },
    };
  }
  return undefined;
}
