/**
 * Workflow Types
 *
 * Type definitions for the step execution model.
 */

import type { CredentialScope } from '../client/types.js';

// =============================================================================
// WORKFLOW CONTEXT (Mutable, owned by the orchestrator for one run)
// =============================================================================

export interface WorkflowContext {
  subAccountId?: number;
  domainId?: string;
  messageId?: string;
  webhookId?: number;
  ipPoolId?: number;
  /** Ids seen by the sub-account listing, in API order */
  knownSubAccountIds?: number[];
  /** Public addresses of dedicated IPs on the account */
  dedicatedIps?: string[];
}

export type ContextField = keyof WorkflowContext;

// =============================================================================
// ERROR CLASSIFICATION
// =============================================================================

export type ErrorKind =
  | 'Unauthorized'  // 401
  | 'Forbidden'     // 403
  | 'NotFound'      // 404
  | 'Validation'    // 422, or an empty configuration value
  | 'Conflict'      // 409
  | 'Transport'     // No response: connection, timeout, closed client
  | 'Unknown';      // Everything else

export interface ClassifiedError {
  kind: ErrorKind;
  message: string;
  statusCode?: number;
  responseBody?: string;
}

// =============================================================================
// STEP OUTPUT & RESULT
// =============================================================================

export type DetailValue = string | number | boolean | null | readonly string[];

/**
 * Key result fields, in display order.
 */
export type StepDetails = Record<string, DetailValue>;

/**
 * What a step operation resolves to.
 */
export interface StepOutput {
  details: StepDetails;
  /** Merged into the workflow context when the step succeeds */
  produces?: Partial<WorkflowContext>;
}

export type StepResult<T = StepOutput> =
  | { type: 'SUCCESS'; step: string; title: string; value: T; durationMs: number }
  | { type: 'FAILURE'; step: string; title: string; error: ClassifiedError; durationMs: number }
  | { type: 'SKIPPED'; step: string; title: string; reason: string };

// =============================================================================
// STEP DEFINITION (Static, never mutated)
// =============================================================================

/**
 * What to do when a required context field is absent.
 *
 * - skip: record SKIPPED, never call the operation
 * - fallback: ask the definition's fallback resolver; skip if it cannot help
 * - attempt: run anyway with the field absent
 */
export type DependencyPolicy = 'skip' | 'fallback' | 'attempt';

export const DEPENDENCY_POLICIES: readonly DependencyPolicy[] = ['skip', 'fallback', 'attempt'];

export interface StepDefinition {
  name: string;
  title: string;
  scope: CredentialScope;
  requires: readonly ContextField[];
  onMissing: DependencyPolicy;
  /** Supplies substitutes for missing fields; undefined means none available */
  fallback?: (context: Readonly<WorkflowContext>) => Partial<WorkflowContext> | undefined;
  /** A failure of a fatal step skips every later step */
  fatal: boolean;
  run(context: Readonly<WorkflowContext>): Promise<StepOutput>;
}

// =============================================================================
// RUN SUMMARY
// =============================================================================

export interface RunSummary {
  runId: string;
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  durationMs: number;
  results: StepResult[];
}
