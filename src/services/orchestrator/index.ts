export { ResearchOrchestrator } from './orchestrator.js';
export { ProgressTracker, ProgressLabel, retryingLabel, failedLabel } from './progress.js';
export type { ProgressSnapshot } from './progress.js';
export { withRetry, sleep, backoffDelay } from './retry.js';
export { buildFallbackSubtasks, fillTemplate, normalizeSubtasks, parseSubtasks } from './decomposition.js';
export { ALL_AGENTS_FAILED, describeTotalFailure, selectSubstantiveResults } from './aggregation.js';
export { QUESTION_GENERATION_PROMPT, SYNTHESIS_PROMPT } from './prompts.js';
export { orchestratorSettingsFromEnv } from './settings.js';
export type { OrchestratorSettings } from './settings.js';
export type {
  AgentRunResult,
  AgentRunStatus,
  AggregationStrategy,
  OrchestrationReport,
  OrchestratorOptions,
} from './types.js';
