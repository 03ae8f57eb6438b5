// Research Orchestrator
// Decomposes a request, runs one agent per subtask in parallel under a single
// deadline, then merges the answers.

import type { Logger } from 'pino';
import { silentLogger } from '../../logger.js';
import type { Provider } from '../../providers/types.js';
import { AgentTimeoutError, SynthesisError, errorMessage, formatSeconds } from '../../utils/errors.js';
import { AgentLoop } from '../agent/agent-loop.js';
import { DEFAULT_SYSTEM_PROMPT } from '../agent/prompts.js';
import type { DeduplicationOptions } from '../agent/types.js';
import { COMPLETION_TOOL_NAME } from '../tools/mark-task-complete-tool.js';
import { ToolRegistry } from '../tools/registry.js';
import {
  buildAgentResponsesSection,
  concatenateResponses,
  describeTotalFailure,
  selectSubstantiveResults,
} from './aggregation.js';
import { buildFallbackSubtasks, fillTemplate, normalizeSubtasks, parseSubtasks } from './decomposition.js';
import { ProgressLabel, ProgressTracker, failedLabel, retryingLabel, type ProgressSnapshot } from './progress.js';
import { QUESTION_GENERATION_PROMPT, SYNTHESIS_PROMPT } from './prompts.js';
import { clampTimerDelay, withRetry } from './retry.js';
import type { AgentRunResult, AggregationStrategy, OrchestrationReport, OrchestratorOptions } from './types.js';

export class ResearchOrchestrator {
  private readonly provider: Provider;
  private readonly tools: ToolRegistry;
  private readonly systemPrompt: string;
  private readonly parallelAgents: number;
  private readonly maxConcurrency: number;
  private readonly taskTimeoutMs: number;
  private readonly retryAttempts: number;
  private readonly retryBackoffMs: number;
  private readonly maxRetryBackoffMs: number;
  private readonly aggregationStrategy: AggregationStrategy;
  private readonly questionGenerationPrompt: string;
  private readonly synthesisPrompt: string;
  private readonly maxIterations: number;
  private readonly finalizeAfterNoToolStreak: number;
  private readonly deduplication?: Partial<DeduplicationOptions>;
  private readonly logger: Logger;
  private progress: ProgressTracker;

  constructor(options: OrchestratorOptions) {
    this.provider = options.provider;
    this.logger = (options.logger ?? silentLogger).child({ component: 'orchestrator' });
    this.tools = new ToolRegistry(options.tools ?? [], this.logger);
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.parallelAgents = Math.max(1, Math.floor(options.parallelAgents ?? 4));
    this.maxConcurrency = Math.max(1, Math.floor(options.maxConcurrency ?? this.parallelAgents));
    this.taskTimeoutMs = clampTimerDelay(options.taskTimeoutMs ?? 300_000);
    this.retryAttempts = Math.max(1, options.retryAttempts ?? 2);
    this.retryBackoffMs = options.retryBackoffMs ?? 1000;
    this.maxRetryBackoffMs = options.maxRetryBackoffMs ?? 30_000;
    this.aggregationStrategy = options.aggregationStrategy ?? 'consensus';
    this.questionGenerationPrompt = options.questionGenerationPrompt ?? QUESTION_GENERATION_PROMPT;
    this.synthesisPrompt = options.synthesisPrompt ?? SYNTHESIS_PROMPT;
    this.maxIterations = options.maxIterations ?? 10;
    this.finalizeAfterNoToolStreak = options.finalizeAfterNoToolStreak ?? 2;
    this.deduplication = options.deduplication;
    this.progress = new ProgressTracker(this.logger);
  }

  get agentCount(): number {
    return this.parallelAgents;
  }

  /** Progress of the current (or last) run. */
  getProgressStatus(): ProgressSnapshot {
    return this.progress.snapshot();
  }

  async orchestrate(userInput: string): Promise<string> {
    const report = await this.orchestrateDetailed(userInput);
    return report.response;
  }

  async orchestrateDetailed(userInput: string): Promise<OrchestrationReport> {
    const startedAt = Date.now();
    const progress = new ProgressTracker(this.logger);
    this.progress = progress;

    const subtasks = await this.decompose(userInput);
    this.logger.info({ agents: subtasks.length, maxConcurrency: this.maxConcurrency }, 'Starting parallel agents');

    for (let agentId = 0; agentId < subtasks.length; agentId++) {
      progress.update(agentId, ProgressLabel.QUEUED);
    }

    const results = (await this.runAgents(subtasks, progress)).sort((a, b) => a.agentId - b.agentId);
    const response = await this.aggregate(results);

    const durationMs = Date.now() - startedAt;
    this.logger.info(
      { durationMs, statuses: results.map(r => r.status) },
      'Orchestration finished'
    );

    return {
      response,
      subtasks,
      results,
      progress: progress.snapshot(),
      durationMs,
    };
  }

  /** Always yields exactly `parallelAgents` subtasks. */
  async decompose(userInput: string): Promise<string[]> {
    const count = this.parallelAgents;
    const prompt = fillTemplate(this.questionGenerationPrompt, { user_input: userInput, num_agents: count });

    try {
      const loop = new AgentLoop({
        provider: this.provider,
        tools: this.tools.without(COMPLETION_TOOL_NAME),
        systemPrompt: this.systemPrompt,
        maxIterations: this.maxIterations,
        noToolStreakThreshold: 1,
        deduplication: this.deduplication,
        logger: this.logger.child({ phase: 'decomposition' }),
      });
      const reply = await loop.run(prompt);
      return normalizeSubtasks(parseSubtasks(reply), count, userInput);
    } catch (error) {
      this.logger.warn({ err: error }, 'Task decomposition failed, using fallback questions');
      return buildFallbackSubtasks(userInput, count);
    }
  }

  async aggregate(results: readonly AgentRunResult[]): Promise<string> {
    const substantive = selectSubstantiveResults(results);
    if (substantive.length === 0) {
      this.logger.error('No agent produced a usable response');
      return describeTotalFailure(results, this.provider.name);
    }

    this.logger.debug({ strategy: this.aggregationStrategy, responses: substantive.length }, 'Aggregating responses');
    return this.synthesize(substantive);
  }

  private async synthesize(results: readonly AgentRunResult[]): Promise<string> {
    if (results.length === 1) {
      return results[0].response.trim();
    }

    const prompt = fillTemplate(this.synthesisPrompt, {
      num_responses: results.length,
      agent_responses: buildAgentResponsesSection(results),
    });

    try {
      const loop = new AgentLoop({
        provider: this.provider,
        tools: [],
        systemPrompt: this.systemPrompt,
        maxIterations: this.maxIterations,
        noToolStreakThreshold: 1,
        deduplication: this.deduplication,
        logger: this.logger.child({ phase: 'synthesis' }),
      });
      const outcome = await loop.execute(prompt);
      const text = outcome.response.trim();
      if (outcome.source !== 'content' || !text) {
        throw new SynthesisError(`Synthesis produced no content (${outcome.termination})`);
      }
      return text;
    } catch (error) {
      const failure = error instanceof SynthesisError
        ? error
        : new SynthesisError(`Synthesis failed: ${errorMessage(error)}`, error);
      this.logger.warn({ err: failure }, 'Falling back to concatenated agent responses');
      return concatenateResponses(results);
    }
  }

  /**
   * Bounded worker pool raced against one deadline. At the deadline the
   * shared signal aborts and unfinished agents are recorded as timed out.
   */
  private async runAgents(subtasks: string[], progress: ProgressTracker): Promise<AgentRunResult[]> {
    const controller = new AbortController();
    const results = new Map<number, AgentRunResult>();
    let nextAgent = 0;

    const worker = async (): Promise<void> => {
      while (nextAgent < subtasks.length && !controller.signal.aborted) {
        const agentId = nextAgent++;
        const result = await this.runAgent(agentId, subtasks[agentId], progress, controller.signal);
        if (!controller.signal.aborted) {
          results.set(agentId, result);
        }
      }
    };

    const workerCount = Math.min(this.maxConcurrency, subtasks.length);
    const pool = Promise.all(Array.from({ length: workerCount }, () => worker())).then(() => 'done' as const);

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => resolve('timeout'), this.taskTimeoutMs);
    });

    const outcome = await Promise.race([pool, deadline]);
    clearTimeout(timer);

    if (outcome === 'timeout') {
      controller.abort(new AgentTimeoutError(this.taskTimeoutMs));
      for (let agentId = 0; agentId < subtasks.length; agentId++) {
        if (results.has(agentId)) continue;
        progress.seal(agentId, ProgressLabel.TIMEOUT);
        results.set(agentId, {
          agentId,
          status: 'timeout',
          response: `Agent ${agentId + 1} timed out after ${formatSeconds(this.taskTimeoutMs)}`,
          executionTimeMs: this.taskTimeoutMs,
        });
      }
      this.logger.warn({ timeoutMs: this.taskTimeoutMs }, 'Orchestration deadline reached, abandoning unfinished agents');
    }

    return Array.from(results.values());
  }

  private async runAgent(
    agentId: number,
    subtask: string,
    progress: ProgressTracker,
    signal: AbortSignal
  ): Promise<AgentRunResult> {
    const logger = this.logger.child({ agentId });
    const startedAt = Date.now();

    try {
      const response = await withRetry(
        attempt => {
          progress.update(agentId, ProgressLabel.PROCESSING);
          logger.debug({ attempt }, 'Agent attempt started');
          const loop = new AgentLoop({
            provider: this.provider,
            tools: this.tools,
            systemPrompt: this.systemPrompt,
            maxIterations: this.maxIterations,
            noToolStreakThreshold: this.finalizeAfterNoToolStreak,
            deduplication: this.deduplication,
            logger,
            signal,
          });
          return loop.run(subtask);
        },
        {
          attempts: this.retryAttempts,
          backoffMs: this.retryBackoffMs,
          maxBackoffMs: this.maxRetryBackoffMs,
          signal,
          onRetry: ({ attempt, attempts, delayMs, error }) => {
            progress.update(agentId, retryingLabel(attempt, attempts));
            logger.warn({ attempt, attempts, delayMs, err: error }, 'Agent attempt failed, retrying');
          },
        }
      );

      progress.update(agentId, ProgressLabel.COMPLETED);
      return { agentId, status: 'success', response, executionTimeMs: Date.now() - startedAt };
    } catch (error) {
      const message = errorMessage(error);
      progress.update(agentId, failedLabel(message));
      logger.error({ err: error }, 'Agent failed');
      return { agentId, status: 'error', response: `Error: ${message}`, executionTimeMs: Date.now() - startedAt };
    }
  }
}
