// Orchestrator Types

import type { Logger } from 'pino';
import type { Provider } from '../../providers/types.js';
import type { DeduplicationOptions } from '../agent/types.js';
import type { ToolDefinition } from '../tools/types.js';
import type { ProgressSnapshot } from './progress.js';

export type AgentRunStatus = 'success' | 'error' | 'timeout';

export interface AgentRunResult {
  readonly agentId: number;
  readonly status: AgentRunStatus;
  readonly response: string;
  readonly executionTimeMs: number;
}

export type AggregationStrategy = 'consensus';

export interface OrchestratorOptions {
  provider: Provider;
  tools?: ToolDefinition[];
  systemPrompt?: string;
  parallelAgents?: number;
  /** Defaults to parallelAgents. */
  maxConcurrency?: number;
  taskTimeoutMs?: number;
  /** Total attempts per agent, the first one included. */
  retryAttempts?: number;
  retryBackoffMs?: number;
  maxRetryBackoffMs?: number;
  aggregationStrategy?: AggregationStrategy;
  questionGenerationPrompt?: string;
  synthesisPrompt?: string;
  maxIterations?: number;
  finalizeAfterNoToolStreak?: number;
  deduplication?: Partial<DeduplicationOptions>;
  logger?: Logger;
}

export interface OrchestrationReport {
  response: string;
  subtasks: string[];
  results: readonly AgentRunResult[];
  progress: ProgressSnapshot;
  durationMs: number;
}
