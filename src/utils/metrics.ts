/**
 * Invocation metrics for a runner session
 */

import type { ExecutionSummary, InvocationRecord } from '../types';

interface SessionMetrics {
  startTime: number;
  invocations: InvocationRecord[];
  skipped: string[];
}

class MetricsCollector {
  private metrics: SessionMetrics;

  constructor() {
    this.metrics = {
      startTime: Date.now(),
      invocations: [],
      skipped: [],
    };
  }

  /**
   * Record the start of a task invocation; returns its record index.
   * A task may be invoked several times when deduplication is off.
   */
  startTask(taskName: string): number {
    this.metrics.invocations.push({
      taskName,
      startTime: Date.now(),
      status: 'running',
    });
    return this.metrics.invocations.length - 1;
  }

  completeTask(index: number): void {
    const record = this.metrics.invocations[index];
    if (record) {
      record.endTime = Date.now();
      record.status = 'completed';
    }
  }

  failTask(index: number, error: string): void {
    const record = this.metrics.invocations[index];
    if (record) {
      record.endTime = Date.now();
      record.status = 'failed';
      record.error = error;
    }
  }

  /**
   * Record a task dropped from a chain by deduplication
   */
  recordSkip(taskName: string): void {
    this.metrics.skipped.push(taskName);
  }

  getInvocations(): InvocationRecord[] {
    return this.metrics.invocations.map((record) => ({ ...record }));
  }

  /**
   * Names of the tasks invoked, in invocation order
   */
  getInvocationOrder(): string[] {
    return this.metrics.invocations.map((record) => record.taskName);
  }

  getTotalDuration(): number {
    return Date.now() - this.metrics.startTime;
  }

  generateSummary(): ExecutionSummary {
    const records = this.metrics.invocations;
    const completed = records.filter((r) => r.status === 'completed');
    const failed = records.filter((r) => r.status === 'failed');

    return {
      totalInvocations: records.length,
      completedInvocations: completed.length,
      failedInvocations: failed.length,
      skippedTasks: this.metrics.skipped.length,
      totalDurationMs: this.getTotalDuration(),
      errors: failed.map((r) => ({
        taskName: r.taskName,
        error: r.error ?? 'Unknown error',
      })),
    };
  }

  /**
   * Average duration of completed invocations in milliseconds
   */
  getAverageTaskDuration(): number {
    const finished = this.metrics.invocations.filter(
      (r): r is InvocationRecord & { endTime: number } =>
        r.status === 'completed' && r.endTime !== undefined
    );

    if (finished.length === 0) {
      return 0;
    }

    const total = finished.reduce((sum, r) => sum + (r.endTime - r.startTime), 0);
    return total / finished.length;
  }

  reset(): void {
    this.metrics = {
      startTime: Date.now(),
      invocations: [],
      skipped: [],
    };
  }
}

let metricsCollector: MetricsCollector | null = null;

/**
 * Get the global metrics collector
 */
export function getMetrics(): MetricsCollector {
  if (!metricsCollector) {
    metricsCollector = new MetricsCollector();
  }
  return metricsCollector;
}

/**
 * Reset the global metrics collector
 */
export function resetMetrics(): void {
  metricsCollector = new MetricsCollector();
}

export { MetricsCollector };
