/**
 * Chat command - start an interactive conversation with the agent
 */

import { AgentPool } from '../../agent/agent-pool.js';
import { createAgent, createProvider } from '../../agent/providers/provider-factory.js';
import { getConfig, validateConfig } from '../../config/index.js';
import { startChatREPL } from '../repl/chat-repl.js';
import { formatError } from '../repl/display.js';

export interface ChatOptions {
  conversation?: string;
  stream?: boolean;
  maxSteps?: string;
}

export async function chatCommand(options: ChatOptions): Promise<void> {
  const config = { ...getConfig() };
  if (options.stream !== undefined) config.stream = options.stream;
  if (options.maxSteps) config.maxSteps = Number.parseInt(options.maxSteps, 10);

  const { valid, errors } = validateConfig(config);
  if (!valid) {
    formatError(`Invalid configuration:\n  ${errors.join('\n  ')}`);
    process.exit(1);
  }

  const provider = createProvider(config);
  const pool = new AgentPool((key) => createAgent(config, provider, { name: key }));

  await startChatREPL({
    pool,
    conversation: options.conversation,
    stream: config.stream,
    modelId: config.modelId,
  });
}
