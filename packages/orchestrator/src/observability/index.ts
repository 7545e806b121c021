/**
 * Observability Module
 */

export type { WorkflowMetrics } from './metrics.js';
export { NoOpMetrics, ConsoleMetrics } from './metrics.js';
