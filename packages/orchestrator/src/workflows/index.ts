/**
 * Workflow Engine
 *
 * Sequential step orchestration with per-step dependency policies.
 *
 * Design invariants:
 * - Steps run one at a time, in definition order
 * - Step errors are data (FAILURE), never exceptions
 * - Missing hard dependencies skip the step without calling the ESP
 */

// Types
export type {
  WorkflowContext,
  ContextField,
  ErrorKind,
  ClassifiedError,
  DetailValue,
  StepDetails,
  StepOutput,
  StepResult,
  DependencyPolicy,
  StepDefinition,
  RunSummary,
} from './types.js';
export { DEPENDENCY_POLICIES } from './types.js';

// Classification
export { classifyError, errorKindForStatus } from './classify.js';

// Step executor
export type { ExecuteStepOptions } from './step-executor.js';
export { executeStep, StepSkip } from './step-executor.js';

// Orchestrator
export type {
  EngineEvent,
  EventHandler,
  OrchestratorOptions,
} from './engine.js';
export { WorkflowOrchestrator } from './engine.js';

// ESP pipeline
export type {
  PipelineSettings,
  PipelineOptions,
  EspStepName,
} from './esp-pipeline.js';
export {
  STEP_NAMES,
  ESP_STEP_NAMES,
  DEPENDENT_STEP_NAMES,
  statsWindow,
  createEspPipeline,
} from './esp-pipeline.js';
