// Agent progress tracking
// One tracker per orchestration; every write goes through update() or seal().

import type { Logger } from 'pino';
import { silentLogger } from '../../logger.js';

export type ProgressSnapshot = Record<number, string>;

export const ProgressLabel = {
  QUEUED: 'QUEUED',
  PROCESSING: 'PROCESSING...',
  COMPLETED: 'COMPLETED',
  TIMEOUT: 'TIMEOUT',
} as const;

export function retryingLabel(attempt: number, attempts: number): string {
  return `RETRYING (${attempt}/${attempts})`;
}

export function failedLabel(reason: string): string {
  return `FAILED:${reason}`;
}

export class ProgressTracker {
  private readonly labels = new Map<number, string>();
  private readonly sealed = new Set<number>();

  constructor(private readonly logger: Logger = silentLogger) {}

  /** Returns false when the agent's label has been sealed. */
  update(agentId: number, label: string): boolean {
    if (this.sealed.has(agentId)) {
      this.logger.debug({ agentId, label }, 'Ignoring progress update for sealed agent');
      return false;
    }
    this.labels.set(agentId, label);
    this.logger.debug({ agentId, label }, 'Agent progress');
    return true;
  }

  /** Final label; later updates are dropped. */
  seal(agentId: number, label: string): void {
    this.labels.set(agentId, label);
    this.sealed.add(agentId);
  }

  get(agentId: number): string | undefined {
    return this.labels.get(agentId);
  }

  snapshot(): ProgressSnapshot {
    return Object.fromEntries(this.labels);
  }
}
