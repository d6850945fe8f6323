/**
 * Terminate Tool
 *
 * The model calls this to signal that the task is complete. The agent loop
 * treats its invocation as the completion signal and moves to FINISHED.
 */

import { z } from 'zod';
import { ToolError } from '../errors.js';
import { defineTool, ok, type AgentTool } from './types.js';

export const TERMINATE_TOOL_NAME = 'terminate';

const TerminateArgsSchema = z.object({
  status: z.enum(['success', 'failure']),
});

export function terminateTool(): AgentTool {
  return defineTool({
    name: TERMINATE_TOOL_NAME,
    description:
      'Terminate the interaction when the request is met OR if the assistant cannot proceed further with the task. ' +
      'When you have finished all the tasks, call this tool to end the work.',
    parameters: {
      type: 'object',
      properties: {
        status: {
          type: 'string',
          description: 'The finish status of the interaction.',
          enum: ['success', 'failure'],
        },
      },
      required: ['status'],
    },
    execute: async (args) => {
      const parsed = TerminateArgsSchema.safeParse(args);
      if (!parsed.success) {
        throw new ToolError('status must be "success" or "failure"');
      }
      return ok(`The interaction has been completed with status: ${parsed.data.status}`);
    },
  });
}
