/**
 * Result reporting contract.
 */

import type { EngineEvent, WorkflowOrchestrator } from '../workflows/engine.js';

/**
 * Consumes the orchestrator's event stream. Must not throw; the
 * orchestrator logs and ignores a reporter that does.
 */
export interface ResultReporter {
  handle(event: EngineEvent): void;
}

export function attachReporter(orchestrator: WorkflowOrchestrator, reporter: ResultReporter): void {
  orchestrator.onEvent((event) => reporter.handle(event));
}
