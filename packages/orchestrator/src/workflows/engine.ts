/**
 * Workflow Orchestrator
 *
 * Runs a fixed, ordered list of step definitions against one in-memory
 * workflow context.
 *
 * Invariants:
 * 1. Steps run strictly one at a time, in definition order
 * 2. A context field is read only after the step producing it succeeded
 * 3. A missing hard dependency means SKIPPED: the operation is never called
 * 4. A non-fatal failure never stops later steps
 * 5. The context lives for one run and is discarded afterwards
 */

import { v4 as uuidv4 } from 'uuid';
import type { CredentialScope } from '../client/types.js';
import type { Logger } from '../utils/logger.js';
import type { WorkflowMetrics } from '../observability/metrics.js';
import { NoOpMetrics } from '../observability/metrics.js';
import { assertUniqueStepNames } from '../boundaries/invariants.js';
import { executeStep } from './step-executor.js';
import {
  ContextField,
  DependencyPolicy,
  RunSummary,
  StepDefinition,
  StepOutput,
  StepResult,
  WorkflowContext,
} from './types.js';

// =============================================================================
// ENGINE EVENTS
// =============================================================================

type ResultOf<K extends StepResult['type']> = Extract<StepResult, { type: K }>;

export type EngineEvent =
  | { type: 'RUN_STARTED'; runId: string; steps: number }
  | { type: 'STEP_STARTED'; runId: string; index: number; step: string; title: string; scope: CredentialScope }
  | { type: 'STEP_FALLBACK'; runId: string; index: number; step: string; fields: ContextField[] }
  | { type: 'STEP_SUCCEEDED'; runId: string; index: number; result: ResultOf<'SUCCESS'> }
  | { type: 'STEP_FAILED'; runId: string; index: number; result: ResultOf<'FAILURE'> }
  | { type: 'STEP_SKIPPED'; runId: string; index: number; result: ResultOf<'SKIPPED'> }
  | { type: 'RUN_COMPLETED'; runId: string; summary: RunSummary };

export type EventHandler = (event: EngineEvent) => void;

// =============================================================================
// OPTIONS
// =============================================================================

export interface OrchestratorOptions {
  logger: Logger;
  metrics?: WorkflowMetrics;
  /** Per-step replacement for a definition's onMissing */
  policyOverrides?: Readonly<Record<string, DependencyPolicy>>;
  now?: () => number;
  createRunId?: () => string;
}

function isPresent(value: WorkflowContext[ContextField]): boolean {
  if (value === undefined) return false;
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

function snapshot(context: WorkflowContext): Readonly<WorkflowContext> {
  return Object.freeze({
    ...context,
    knownSubAccountIds: context.knownSubAccountIds && [...context.knownSubAccountIds],
    dedicatedIps: context.dedicatedIps && [...context.dedicatedIps],
  });
}

/**
 * How a step should run given the current context.
 */
type Admission =
  | { run: true; view: Readonly<WorkflowContext>; fallbackFields: ContextField[] }
  | { run: false; reason: string };

// =============================================================================
// WORKFLOW ORCHESTRATOR
// =============================================================================

export class WorkflowOrchestrator {
  private logger: Logger;
  private metrics: WorkflowMetrics;
  private policyOverrides: Readonly<Record<string, DependencyPolicy>>;
  private now: () => number;
  private createRunId: () => string;
  private eventHandlers: EventHandler[] = [];

  constructor(options: OrchestratorOptions) {
    this.logger = options.logger;
    this.metrics = options.metrics ?? new NoOpMetrics();
    this.policyOverrides = options.policyOverrides ?? {};
    this.now = options.now ?? Date.now;
    this.createRunId = options.createRunId ?? (() => uuidv4());
  }

  /**
   * Subscribe to engine events.
   */
  onEvent(handler: EventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emit(event: EngineEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.error({ event: event.type, error }, 'Event handler error');
      }
    }
  }

  /**
   * Run every definition once, in order, and summarise the outcome.
   * Resolves even when every step fails.
   */
  async run(definitions: readonly StepDefinition[]): Promise<RunSummary> {
    assertUniqueStepNames(definitions);

    const runId = this.createRunId();
    const logger = this.logger.child({ runId });
    const startedAt = this.now();
    const context: WorkflowContext = {};
    const results: StepResult[] = [];
    let fatalFailure: string | undefined;

    this.metrics.runStarted(runId, definitions.length);
    this.emit({ type: 'RUN_STARTED', runId, steps: definitions.length });
    logger.info({ steps: definitions.length }, 'Run started');

    for (const [position, definition] of definitions.entries()) {
      const index = position + 1;
      const { name: step, title } = definition;

      const admission: Admission = fatalFailure
        ? { run: false, reason: `aborted after fatal failure of ${fatalFailure}` }
        : this.admit(definition, context);

      if (!admission.run) {
        const result: ResultOf<'SKIPPED'> = { type: 'SKIPPED', step, title, reason: admission.reason };
        results.push(result);
        logger.warn({ step, outcome: 'skipped', reason: admission.reason }, `${title} skipped`);
        this.metrics.stepSkipped(step, admission.reason);
        this.emit({ type: 'STEP_SKIPPED', runId, index, result });
        continue;
      }

      if (admission.fallbackFields.length > 0) {
        logger.info({ step, fields: admission.fallbackFields }, `${title} using fallback values`);
        this.emit({ type: 'STEP_FALLBACK', runId, index, step, fields: admission.fallbackFields });
      }

      this.metrics.stepStarted(step);
      this.emit({ type: 'STEP_STARTED', runId, index, step, title, scope: definition.scope });

      const view = admission.view;
      const result = await executeStep<StepOutput>(step, title, () => definition.run(view), {
        logger: logger.child({ step, scope: definition.scope }),
        now: this.now,
      });
      results.push(result);

      if (result.type === 'SUCCESS') {
        Object.assign(context, result.value.produces ?? {});
        this.metrics.stepSucceeded(step, result.durationMs);
        this.emit({ type: 'STEP_SUCCEEDED', runId, index, result });
      } else if (result.type === 'FAILURE') {
        this.metrics.stepFailed(step, result.error.kind, result.durationMs);
        this.emit({ type: 'STEP_FAILED', runId, index, result });
        if (definition.fatal) {
          fatalFailure = step;
        }
      } else {
        this.metrics.stepSkipped(step, result.reason);
        this.emit({ type: 'STEP_SKIPPED', runId, index, result });
      }
    }

    const summary: RunSummary = {
      runId,
      total: results.length,
      succeeded: results.filter((r) => r.type === 'SUCCESS').length,
      failed: results.filter((r) => r.type === 'FAILURE').length,
      skipped: results.filter((r) => r.type === 'SKIPPED').length,
      durationMs: this.now() - startedAt,
      results,
    };

    this.metrics.runCompleted(
      runId,
      { succeeded: summary.succeeded, failed: summary.failed, skipped: summary.skipped },
      summary.durationMs
    );
    logger.info(
      { succeeded: summary.succeeded, failed: summary.failed, skipped: summary.skipped, durationMs: summary.durationMs },
      'Run completed'
    );
    this.emit({ type: 'RUN_COMPLETED', runId, summary });

    return summary;
  }

  /**
   * The effective policy: configuration override first, then the definition.
   */
  policyFor(definition: StepDefinition): DependencyPolicy {
    return this.policyOverrides[definition.name] ?? definition.onMissing;
  }

  // ===========================================================================
  // PRIVATE: Dependency resolution
  // ===========================================================================

  private admit(definition: StepDefinition, context: WorkflowContext): Admission {
    const missing = definition.requires.filter((field) => !isPresent(context[field]));
    if (missing.length === 0) {
      return { run: true, view: snapshot(context), fallbackFields: [] };
    }

    const policy = this.policyFor(definition);
    switch (policy) {
      case 'skip':
        return { run: false, reason: `missing ${missing.join(', ')}` };

      case 'attempt':
        return { run: true, view: snapshot(context), fallbackFields: [] };

      case 'fallback': {
        let resolved: Partial<WorkflowContext> | undefined;
        try {
          resolved = definition.fallback?.(snapshot(context));
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          return { run: false, reason: `missing ${missing.join(', ')}; fallback failed: ${message}` };
        }
        const patch = resolved;
        if (!patch || !missing.every((field) => isPresent(patch[field]))) {
          return { run: false, reason: `missing ${missing.join(', ')}; no fallback available` };
        }
        return { run: true, view: snapshot({ ...context, ...patch }), fallbackFields: missing };
      }
    }
  }
}
