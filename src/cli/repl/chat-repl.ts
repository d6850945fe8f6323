/**
 * Chat REPL. Calls the agent pool in-process; with streaming on, model text
 * and tool activity are printed as they arrive.
 */

import * as readline from 'readline';
import type { AgentPool } from '../../agent/agent-pool.js';
import {
  formatAgentResponse,
  formatError,
  formatRunFooter,
  renderStreamEvent,
  showSpinner,
  dim,
  bold,
} from './display.js';

export interface ChatREPLConfig {
  pool: AgentPool;
  /** Conversation key; the pool's guest key when omitted */
  conversation?: string;
  stream: boolean;
  modelId: string;
}

/**
 * Start a chat REPL. Returns a promise that resolves when the user exits.
 */
export function startChatREPL(config: ChatREPLConfig): Promise<void> {
  const { pool, conversation, stream, modelId } = config;

  return new Promise<void>((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: bold('> '),
    });

    console.log();
    console.log(`Chatting with ${dim(modelId)}${stream ? dim(' (streaming)') : ''}`);
    console.log(`Type your message or ${dim('/quit')} to exit.`);
    console.log();

    // Lines are handled one at a time, in order
    let queue = Promise.resolve();

    const handleLine = async (line: string): Promise<void> => {
      const input = line.trim();

      if (!input) {
        rl.prompt();
        return;
      }

      if (input.startsWith('/')) {
        handleCommand(input, rl, pool, conversation);
        return;
      }

      if (stream) {
        for await (const event of pool.stream(conversation, input)) {
          process.stdout.write(renderStreamEvent(event));
        }
        console.log();
      } else {
        const spinner = showSpinner('Thinking...');
        const handled = await pool.handleMessage(conversation, input).finally(() => spinner.stop());
        formatAgentResponse(handled.reply);
        console.log(formatRunFooter(handled.result));
      }

      rl.prompt();
    };

    rl.prompt();

    rl.on('line', (line) => {
      queue = queue.then(() => handleLine(line)).catch((err: unknown) => {
        formatError(err);
        rl.prompt();
      });
    });

    rl.on('close', () => {
      queue.then(resolve, resolve);
    });

    rl.on('SIGINT', () => {
      rl.close();
    });
  });
}

function handleCommand(
  input: string,
  rl: readline.Interface,
  pool: AgentPool,
  conversation: string | undefined
): void {
  const [command] = input.slice(1).split(' ');
  switch (command.toLowerCase()) {
    case 'quit':
    case 'exit':
    case 'q':
      rl.close();
      return;
    case 'help':
    case 'h':
      console.log();
      console.log('Commands:');
      console.log('  /quit, /exit, /q  - Exit the chat');
      console.log('  /help, /h         - Show this help');
      console.log('  /reset            - Forget the conversation so far');
      console.log('  /clear            - Clear the screen');
      console.log();
      break;
    case 'reset':
      pool.evict(conversation);
      console.log(dim('Conversation reset.'));
      break;
    case 'clear':
      console.clear();
      break;
    default:
      console.log(dim(`Unknown command: ${command}. Type /help for commands.`));
  }
  rl.prompt();
}
