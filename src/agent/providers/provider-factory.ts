/**
 * Provider Factory
 *
 * Builds the LLMProvider and agent instances from environment configuration.
 */

import { BedrockConverseClient } from './bedrock-client.js';
import { ConverseProvider, type ConverseClient } from './converse-provider.js';
import { AgentLoop } from '../agent-loop.js';
import type { LLMProvider } from '../llm-provider.js';
import { PromptBuilder } from '../prompt-builder.js';
import { ToolRegistry } from '../tool-registry.js';
import { terminateTool } from '../tools/terminate.js';
import type { AgentTool } from '../tools/types.js';
import type { AgentEnvConfig } from '../../config/index.js';

export interface ProviderOptions {
  /** Transport override, e.g. an in-process backend */
  client?: ConverseClient;
  singleToolUse?: boolean;
}

export function createProvider(config: AgentEnvConfig, options: ProviderOptions = {}): LLMProvider {
  return new ConverseProvider({
    client: options.client ?? new BedrockConverseClient({ region: config.awsRegion }),
    modelId: config.modelId,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    singleToolUse: options.singleToolUse,
  });
}

export interface AgentOptions {
  name?: string;
  /** Registered in addition to the terminate tool */
  tools?: AgentTool[];
}

/**
 * Build an agent wired to `provider` with the configured limits.
 */
export function createAgent(config: AgentEnvConfig, provider: LLMProvider, options: AgentOptions = {}): AgentLoop {
  const toolRegistry = new ToolRegistry([terminateTool(), ...(options.tools ?? [])]);
  return new AgentLoop({
    provider,
    toolRegistry,
    promptBuilder: new PromptBuilder({ promptDir: config.promptDir }),
    name: options.name,
    maxSteps: config.maxSteps,
    maxMessages: config.maxMessages,
    duplicateThreshold: config.duplicateThreshold,
    stream: config.stream,
  });
}
