/**
 * Boundaries Module
 */

export type { NonEmptyString } from './invariants.js';

export {
  InvariantViolation,
  requireSetting,
  assertUniqueStepNames,
} from './invariants.js';
