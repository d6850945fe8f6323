/**
 * Ask command - one prompt, one reply
 */

import { createAgent, createProvider } from '../../agent/providers/provider-factory.js';
import { getConfig, validateConfig } from '../../config/index.js';
import { formatError, formatRunFooter, renderStreamEvent } from '../repl/display.js';

export interface AskOptions {
  stream?: boolean;
  maxSteps?: string;
}

export async function askCommand(prompt: string, options: AskOptions): Promise<void> {
  const config = { ...getConfig() };
  if (options.stream !== undefined) config.stream = options.stream;
  if (options.maxSteps) config.maxSteps = Number.parseInt(options.maxSteps, 10);

  const { valid, errors } = validateConfig(config);
  if (!valid) {
    formatError(`Invalid configuration:\n  ${errors.join('\n  ')}`);
    process.exit(1);
  }

  const agent = createAgent(config, createProvider(config));

  if (config.stream) {
    let failed = false;
    for await (const event of agent.runStream(prompt)) {
      process.stdout.write(renderStreamEvent(event));
      if (event.type === 'done') failed = event.result.outcome === 'error';
    }
    if (failed) process.exitCode = 1;
    return;
  }

  const result = await agent.run(prompt);
  console.log(result.reply);
  console.error(formatRunFooter(result));
  if (result.outcome === 'error') process.exitCode = 1;
}
