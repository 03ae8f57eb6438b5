// Task Completion Tool
// The completion signal: an agent calls it once its answer is written

import type { ToolDefinition } from './types.js';

export const COMPLETION_TOOL_NAME = 'mark_task_complete';

export const markTaskCompleteTool: ToolDefinition = {
  name: COMPLETION_TOOL_NAME,
  description: 'Signal that the task is finished. Call this only after the full answer has been written in your messages.',
  parameters: [
    {
      name: 'task_summary',
      type: 'string',
      description: 'One-sentence summary of what was done',
      required: true,
    },
    {
      name: 'completion_message',
      type: 'string',
      description: 'The final answer, or a short message to show the user',
      required: true,
    },
  ],
  execute: async (args) => ({
    status: 'completed',
    task_summary: typeof args.task_summary === 'string' ? args.task_summary : '',
    completion_message: typeof args.completion_message === 'string' ? args.completion_message : '',
  }),
};
