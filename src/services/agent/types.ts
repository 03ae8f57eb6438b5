// Agent loop types

import type { Logger } from 'pino';
import type { Provider, ProviderUsage } from '../../providers/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolDefinition } from '../tools/types.js';

export interface DeduplicationOptions {
  /** Both normalized blocks must be at least this long before fuzzy matching applies. */
  minSimilarityLength: number;
  similarityThreshold: number;
}

export interface AgentLoopOptions {
  provider: Provider;
  tools?: ToolRegistry | ToolDefinition[];
  systemPrompt?: string;
  maxIterations?: number;
  noToolStreakThreshold?: number;
  completionToolName?: string;
  deduplication?: Partial<DeduplicationOptions>;
  logger?: Logger;
  signal?: AbortSignal;
}

export type AgentTermination = 'completion_tool' | 'no_tool_streak' | 'max_iterations';

/** Where the final response came from. */
export type ResponseSource = 'content' | 'completion_message' | 'default';

export interface AgentLoopResult {
  response: string;
  iterations: number;
  termination: AgentTermination;
  source: ResponseSource;
  toolCallsExecuted: number;
  usage: ProviderUsage;
}
