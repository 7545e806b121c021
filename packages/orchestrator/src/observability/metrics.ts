/**
 * Metrics Interface
 *
 * Write-only signals for observability.
 *
 * HARD CONSTRAINT: the orchestrator must NEVER read metrics or act on them.
 *
 * Default implementation is no-op.
 */

import type { ErrorKind } from '../workflows/types.js';

// =============================================================================
// METRICS INTERFACE
// =============================================================================

/**
 * Write-only metrics sink.
 *
 * Implementations must never throw.
 */
export interface WorkflowMetrics {
  runStarted(runId: string, steps: number): void;

  stepStarted(step: string): void;

  stepSucceeded(step: string, durationMs: number): void;

  stepFailed(step: string, kind: ErrorKind, durationMs: number): void;

  /**
   * Step never ran: missing dependency or an earlier fatal failure.
   */
  stepSkipped(step: string, reason: string): void;

  runCompleted(
    runId: string,
    counts: { succeeded: number; failed: number; skipped: number },
    durationMs: number
  ): void;
}

// =============================================================================
// NO-OP IMPLEMENTATION (Default)
// =============================================================================

export class NoOpMetrics implements WorkflowMetrics {
  runStarted(_runId: string, _steps: number): void {}
  stepStarted(_step: string): void {}
  stepSucceeded(_step: string, _durationMs: number): void {}
  stepFailed(_step: string, _kind: ErrorKind, _durationMs: number): void {}
  stepSkipped(_step: string, _reason: string): void {}
  runCompleted(
    _runId: string,
    _counts: { succeeded: number; failed: number; skipped: number },
    _durationMs: number
  ): void {}
}

// =============================================================================
// CONSOLE IMPLEMENTATION (Development)
// =============================================================================

/**
 * Writes every signal as one JSON line.
 */
export class ConsoleMetrics implements WorkflowMetrics {
  constructor(private readonly write: (line: string) => void = (line) => console.log(line)) {}

  private log(category: string, event: string, data: Record<string, unknown>): void {
    this.write(JSON.stringify({
      timestamp: new Date().toISOString(),
      category,
      event,
      ...data,
    }));
  }

  runStarted(runId: string, steps: number): void {
    this.log('run', 'started', { runId, steps });
  }

  stepStarted(step: string): void {
    this.log('step', 'started', { step });
  }

  stepSucceeded(step: string, durationMs: number): void {
    this.log('step', 'succeeded', { step, durationMs });
  }

  stepFailed(step: string, kind: ErrorKind, durationMs: number): void {
    this.log('step', 'failed', { step, kind, durationMs });
  }

  stepSkipped(step: string, reason: string): void {
    this.log('step', 'skipped', { step, reason });
  }

  runCompleted(
    runId: string,
    counts: { succeeded: number; failed: number; skipped: number },
    durationMs: number
  ): void {
    this.log('run', 'completed', { runId, ...counts, durationMs });
  }
}
