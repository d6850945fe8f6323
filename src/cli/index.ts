#!/usr/bin/env node

/**
 * converse-agent CLI
 *
 * Talk to a tool-using agent backed by a Converse-format model endpoint.
 */

import 'dotenv/config';
import { Command } from 'commander';
import { askCommand } from './commands/ask.js';
import { chatCommand } from './commands/chat.js';

const program = new Command();

program
  .name('converse-agent')
  .description('Tool-using chat agent over the Converse API')
  .version('0.1.0');

program
  .command('chat')
  .description('Start an interactive chat session')
  .option('-c, --conversation <key>', 'Conversation key')
  .option('-s, --stream', 'Stream model output as it arrives')
  .option('--no-stream', 'Wait for complete replies')
  .option('--max-steps <n>', 'Step cap per message')
  .action(chatCommand);

program
  .command('ask')
  .description('Send one prompt and print the reply')
  .argument('<prompt>', 'Prompt text')
  .option('-s, --stream', 'Stream model output as it arrives')
  .option('--no-stream', 'Wait for the complete reply')
  .option('--max-steps <n>', 'Step cap for the run')
  .action(askCommand);

await program.parseAsync();
