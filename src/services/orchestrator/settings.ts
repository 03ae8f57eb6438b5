// Orchestrator defaults from the environment

import type { Logger } from 'pino';
import { env } from '../../env.js';
import type { OrchestratorOptions } from './types.js';

export type OrchestratorSettings = Omit<OrchestratorOptions, 'provider' | 'tools' | 'logger'>;

export function orchestratorSettingsFromEnv(logger?: Logger): OrchestratorSettings {
  if (env.AGGREGATION_STRATEGY !== 'consensus') {
    logger?.warn({ strategy: env.AGGREGATION_STRATEGY }, 'Unknown aggregation strategy, using consensus');
  }

  return {
    parallelAgents: env.PARALLEL_AGENTS,
    maxConcurrency: env.MAX_CONCURRENCY,
    taskTimeoutMs: env.TASK_TIMEOUT_SECONDS * 1000,
    retryAttempts: env.AGENT_RETRY_ATTEMPTS,
    retryBackoffMs: env.AGENT_RETRY_BACKOFF_SECONDS * 1000,
    aggregationStrategy: 'consensus',
    maxIterations: env.AGENT_MAX_ITERATIONS,
    finalizeAfterNoToolStreak: env.AGENT_FINALIZE_AFTER_NO_TOOL_STREAK,
    deduplication: {
      minSimilarityLength: env.DEDUP_MIN_LENGTH,
      similarityThreshold: env.DEDUP_SIMILARITY_THRESHOLD,
    },
  };
}
