/**
 * Converse LLM Provider
 *
 * Implements LLMProvider against any backend speaking the Converse wire
 * format. Converts canonical <-> wire at the boundary; the transport is a
 * ConverseClient so tests can run against an in-process backend.
 */

import { fromConverseResponse, toConverseRequest } from './converse-format.js';
import type { ConverseRequest, ConverseResponse } from './converse-format.js';
import { collectConverseStream } from './converse-stream.js';
import type { ConverseStreamEvent, StreamFragmentListener } from './converse-stream.js';
import type { ChatParams, LLMProvider } from '../llm-provider.js';
import type { ChatCompletion } from '../../types/agent-types.js';

/** Transport for Converse requests */
export interface ConverseClient {
  converse(request: ConverseRequest): Promise<ConverseResponse>;
  converseStream(request: ConverseRequest): AsyncIterable<ConverseStreamEvent>;
}

export interface ConverseProviderConfig {
  client: ConverseClient;
  modelId: string;
  maxTokens: number;
  temperature: number;
  /** Send only the first tool call of each assistant turn */
  singleToolUse?: boolean;
}

export class ConverseProvider implements LLMProvider {
  private client: ConverseClient;
  private modelId: string;
  private maxTokens: number;
  private temperature: number;
  private singleToolUse: boolean;

  constructor(config: ConverseProviderConfig) {
    this.client = config.client;
    this.modelId = config.modelId;
    this.maxTokens = config.maxTokens;
    this.temperature = config.temperature;
    this.singleToolUse = config.singleToolUse ?? false;
  }

  async chat(params: ChatParams): Promise<ChatCompletion> {
    const request = this.buildRequest(params);
    const response = await this.client.converse(request);
    return fromConverseResponse(response).completion;
  }

  async chatStream(params: ChatParams, onFragment?: StreamFragmentListener): Promise<ChatCompletion> {
    const request = this.buildRequest(params);
    const response = await collectConverseStream(this.client.converseStream(request), onFragment);
    return fromConverseResponse(response).completion;
  }

  private buildRequest(params: ChatParams): ConverseRequest {
    const messages = [...(params.system ?? []), ...params.messages];
    const { request } = toConverseRequest(messages, {
      modelId: this.modelId,
      maxTokens: this.maxTokens,
      temperature: this.temperature,
      tools: params.tools,
      toolChoice: params.toolChoice,
      singleToolUse: this.singleToolUse,
    });
    return request;
  }
}
