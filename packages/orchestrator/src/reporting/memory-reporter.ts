/**
 * In-memory reporter for tests and embedding.
 */

import type { EngineEvent } from '../workflows/engine.js';
import type { RunSummary, StepResult } from '../workflows/types.js';
import type { ResultReporter } from './types.js';

export class MemoryReporter implements ResultReporter {
  readonly events: EngineEvent[] = [];

  handle(event: EngineEvent): void {
    this.events.push(event);
  }

  /**
   * Step results in the order they were recorded.
   */
  get results(): StepResult[] {
    const results: StepResult[] = [];
    for (const event of this.events) {
      if (event.type === 'STEP_SUCCEEDED' || event.type === 'STEP_FAILED' || event.type === 'STEP_SKIPPED') {
        results.push(event.result);
      }
    }
    return results;
  }

  resultFor(step: string): StepResult | undefined {
    return this.results.find((result) => result.step === step);
  }

  get summary(): RunSummary | undefined {
    for (const event of this.events) {
      if (event.type === 'RUN_COMPLETED') return event.summary;
    }
    return undefined;
  }
}
