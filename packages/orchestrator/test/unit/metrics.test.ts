/**
 * Metrics Tests
 *
 * Proves:
 * - Metrics are write-only signals
 * - Default no-op implementation exists
 */

import { describe, it, expect, vi } from 'vitest';
import { ConsoleMetrics, NoOpMetrics } from '../../src/observability/metrics.js';

describe('NoOpMetrics', () => {
  it('should implement all methods', () => {
    const metrics = new NoOpMetrics();

    expect(() => metrics.runStarted('run-1', 13)).not.toThrow();
    expect(() => metrics.stepStarted('list-ips')).not.toThrow();
    expect(() => metrics.stepSucceeded('list-ips', 12)).not.toThrow();
    expect(() => metrics.stepFailed('list-ips', 'Unauthorized', 12)).not.toThrow();
    expect(() => metrics.stepSkipped('create-ip-pool', 'missing dedicatedIps')).not.toThrow();
    expect(() => metrics.runCompleted('run-1', { succeeded: 12, failed: 1, skipped: 0 }, 900)).not.toThrow();
  });
});

describe('ConsoleMetrics', () => {
  it('should log to console by default', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    try {
      new ConsoleMetrics().stepStarted('list-ips');

      expect(consoleSpy).toHaveBeenCalledTimes(1);
      const parsed = JSON.parse(String(consoleSpy.mock.calls[0][0]));
      expect(parsed).toMatchObject({ category: 'step', event: 'started', step: 'list-ips' });
    } finally {
      consoleSpy.mockRestore();
    }
  });

  it('should write one JSON line per signal', () => {
    const lines: string[] = [];
    const metrics = new ConsoleMetrics((line) => lines.push(line));

    metrics.runStarted('run-1', 13);
    metrics.stepFailed('create-sub-account', 'Forbidden', 40);
    metrics.stepSkipped('get-message-details', 'missing messageId');
    metrics.runCompleted('run-1', { succeeded: 11, failed: 1, skipped: 1 }, 900);

    const parsed = lines.map((line) => JSON.parse(line));
    expect(parsed[0]).toMatchObject({ category: 'run', event: 'started', runId: 'run-1', steps: 13 });
    expect(parsed[1]).toMatchObject({ category: 'step', event: 'failed', step: 'create-sub-account', kind: 'Forbidden', durationMs: 40 });
    expect(parsed[2]).toMatchObject({ category: 'step', event: 'skipped', reason: 'missing messageId' });
    expect(parsed[3]).toMatchObject({
      category: 'run',
      event: 'completed',
      runId: 'run-1',
      succeeded: 11,
      failed: 1,
      skipped: 1,
      durationMs: 900,
    });
    expect(typeof parsed[0].timestamp).toBe('string');
  });
});
