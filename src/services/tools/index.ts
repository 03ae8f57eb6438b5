// Tool System Initialization
// Builds the default tool set handed to every agent loop

import type { Logger } from 'pino';
import { env } from '../../env.js';
import { isWebSearchAvailable } from '../web-search.js';
import { calculatorTool } from './calculator-tool.js';
import { markTaskCompleteTool } from './mark-task-complete-tool.js';
import { webSearchTool } from './web-search-tool.js';
import type { ToolDefinition } from './types.js';

export { ToolRegistry } from './registry.js';
export { COMPLETION_TOOL_NAME, markTaskCompleteTool } from './mark-task-complete-tool.js';
export { calculatorTool } from './calculator-tool.js';
export { webSearchTool } from './web-search-tool.js';
export type { ToolDefinition, ToolParameter } from './types.js';

/**
 * The completion tool is always present; the rest follow the feature flags.
 */
export function createDefaultTools(logger?: Logger): ToolDefinition[] {
  const tools: ToolDefinition[] = [markTaskCompleteTool];

  if (env.TOOLS_ENABLED) {
    tools.push(calculatorTool);
  }

  if (env.TOOLS_ENABLED && isWebSearchAvailable()) {
    tools.push(webSearchTool);
  }

  logger?.debug({ tools: tools.map(t => t.name) }, 'Default tool set');
  return tools;
}
