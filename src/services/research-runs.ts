// Research run registry
// Keeps background orchestrations addressable by id until their TTL expires.

import crypto from 'crypto';
import type { Logger } from 'pino';
import { silentLogger } from '../logger.js';
import { errorMessage } from '../utils/errors.js';
import { TTLCache } from '../utils/ttl-cache.js';
import type { ResearchOrchestrator } from './orchestrator/orchestrator.js';
import type { ProgressSnapshot } from './orchestrator/progress.js';
import type { OrchestrationReport } from './orchestrator/types.js';

export type ResearchRunStatus = 'running' | 'completed' | 'failed';

export interface ResearchRun {
  runId: string;
  query: string;
  provider: string;
  status: ResearchRunStatus;
  createdAt: Date;
  finishedAt?: Date;
  report?: OrchestrationReport;
  error?: string;
  orchestrator: ResearchOrchestrator;
  /** Settles once the run finishes; never rejects. */
  done: Promise<ResearchRun>;
}

export interface ResearchRunView {
  runId: string;
  query: string;
  provider: string;
  status: ResearchRunStatus;
  createdAt: string;
  finishedAt: string | null;
  progress: ProgressSnapshot;
  report?: OrchestrationReport;
  error?: string;
}

export class ResearchRunRegistry {
  private readonly runs: TTLCache<string, ResearchRun>;

  constructor(ttlMs: number, private readonly logger: Logger = silentLogger) {
    this.runs = new TTLCache(ttlMs);
  }

  start(query: string, orchestrator: ResearchOrchestrator, provider: string): ResearchRun {
    const runId = crypto.randomUUID();
    const logger = this.logger.child({ runId });

    const run: ResearchRun = {
      runId,
      query,
      provider,
      status: 'running',
      createdAt: new Date(),
      orchestrator,
      done: Promise.resolve().then(() => orchestrator.orchestrateDetailed(query)).then(
        report => {
          run.status = 'completed';
          run.report = report;
          run.finishedAt = new Date();
          logger.info({ durationMs: report.durationMs }, 'Research run completed');
          return run;
        },
        (error: unknown) => {
          run.status = 'failed';
          run.error = errorMessage(error);
          run.finishedAt = new Date();
          logger.error({ err: error }, 'Research run failed');
          return run;
        }
      ),
    };

    this.runs.set(runId, run);
    logger.info({ provider, agents: orchestrator.agentCount }, 'Research run started');
    return run;
  }

  get(runId: string): ResearchRun | undefined {
    return this.runs.get(runId);
  }

  get size(): number {
    return this.runs.size;
  }

  destroy(): void {
    this.runs.destroy();
  }
}

export function viewResearchRun(run: ResearchRun): ResearchRunView {
  return {
    runId: run.runId,
    query: run.query,
    provider: run.provider,
    status: run.status,
    createdAt: run.createdAt.toISOString(),
    finishedAt: run.finishedAt ? run.finishedAt.toISOString() : null,
    progress: run.orchestrator.getProgressStatus(),
    ...(run.report ? { report: run.report } : {}),
    ...(run.error ? { error: run.error } : {}),
  };
}
