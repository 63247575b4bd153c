import type { AttemptEvent, ResolutionObserver, SettledEvent } from '../types/index.js';

export interface GroupMetrics {
  executions: number;
  resolved: number;
  exhausted: number;
  attempts: number;
  /** How often each position won, keyed by selector index. */
  winningIndex: Record<number, number>;
}

export interface ResolutionMetrics {
  startedAt: string;
  completedAt: string;
  durationMs: number;
  executions: number;
  resolved: number;
  exhausted: number;
  attempts: number;
  failedAttempts: number;
  /** Resolutions won by a selector other than the first one. */
  fallbackResolutions: number;
  errorTypes: Record<string, number>;
  groups: Record<string, GroupMetrics>;
}

export class ResolutionMetricsCollector implements ResolutionObserver {
  private startedAt = new Date().toISOString();
  private attempts = 0;
  private failedAttempts = 0;
  private errorTypes: Record<string, number> = {};
  private groups: Record<string, GroupMetrics> = {};

  reset(): void {
    this.startedAt = new Date().toISOString();
    this.attempts = 0;
    this.failedAttempts = 0;
    this.errorTypes = {};
    this.groups = {};
  }

  onAttempt(event: AttemptEvent): void {
    this.attempts++;
    this.group(event.group).attempts++;
    if (!event.ok) {
      this.failedAttempts++;
      const errorType = event.errorType ?? 'Unknown';
      this.errorTypes[errorType] = (this.errorTypes[errorType] ?? 0) + 1;
    }
  }

  onSettled(event: SettledEvent): void {
    const group = this.group(event.group);
    group.executions++;
    if (event.outcome === 'resolved' && event.resolvedIndex !== undefined) {
      group.resolved++;
      group.winningIndex[event.resolvedIndex] = (group.winningIndex[event.resolvedIndex] ?? 0) + 1;
    } else {
      group.exhausted++;
    }
  }

  finalize(): ResolutionMetrics {
    const groups = Object.values(this.groups);
    const sum = (pick: (g: GroupMetrics) => number) => groups.reduce((acc, g) => acc + pick(g), 0);
    const firstChoice = sum((g) => g.winningIndex[0] ?? 0);

    return {
      startedAt: this.startedAt,
      completedAt: new Date().toISOString(),
      durationMs: Date.now() - new Date(this.startedAt).getTime(),
      executions: sum((g) => g.executions),
      resolved: sum((g) => g.resolved),
      exhausted: sum((g) => g.exhausted),
      attempts: this.attempts,
      failedAttempts: this.failedAttempts,
      fallbackResolutions: sum((g) => g.resolved) - firstChoice,
      errorTypes: { ...this.errorTypes },
      groups: Object.fromEntries(
        Object.entries(this.groups).map(([name, g]) => [name, { ...g, winningIndex: { ...g.winningIndex } }]),
      ),
    };
  }

  private group(name: string): GroupMetrics {
    let metrics = this.groups[name];
    if (!metrics) {
      metrics = { executions: 0, resolved: 0, exhausted: 0, attempts: 0, winningIndex: {} };
      this.groups[name] = metrics;
    }
    return metrics;
  }
}
