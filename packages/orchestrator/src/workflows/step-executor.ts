/**
 * Step Executor
 *
 * Runs exactly one operation and turns its outcome into a StepResult.
 * Never throws: a StepSkip becomes SKIPPED, every other error a FAILURE.
 */

import type { Logger } from '../utils/logger.js';
import { classifyError } from './classify.js';
import { StepResult } from './types.js';

/**
 * Thrown by an operation that finds, once running, it has nothing to act on.
 */
export class StepSkip extends Error {
  constructor(public readonly reason: string) {
    super(reason);
    this.name = 'StepSkip';
  }
}

export interface ExecuteStepOptions {
  logger: Logger;
  /** Injected for deterministic durations in tests */
  now?: () => number;
}

export async function executeStep<T>(
  step: string,
  title: string,
  operation: () => Promise<T>,
  options: ExecuteStepOptions
): Promise<StepResult<T>> {
  const now = options.now ?? Date.now;
  const startedAt = now();

  try {
    const value = await operation();
    const durationMs = now() - startedAt;
    options.logger.info({ step, outcome: 'success', durationMs }, `${title} succeeded`);
    return { type: 'SUCCESS', step, title, value, durationMs };
  } catch (caught) {
    if (caught instanceof StepSkip) {
      options.logger.warn({ step, outcome: 'skipped', reason: caught.reason }, `${title} skipped`);
      return { type: 'SKIPPED', step, title, reason: caught.reason };
    }
    const durationMs = now() - startedAt;
    const error = classifyError(caught);
    options.logger.error(
      {
        step,
        outcome: 'failure',
        durationMs,
        errorKind: error.kind,
        statusCode: error.statusCode,
        responseBody: error.responseBody,
        error: caught instanceof Error ? caught : undefined,
      },
      `${title} failed: ${error.message}`
    );
    return { type: 'FAILURE', step, title, error, durationMs };
  }
}
