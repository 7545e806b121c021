/**
 * Boundary Invariants
 *
 * Runtime guards for values that cross into the workflow from
 * configuration, and for the shape of a pipeline.
 */

import type { StepDefinition } from '../workflows/types.js';

// =============================================================================
// BRANDED TYPES
// =============================================================================

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

/**
 * A configuration string that passed the non-empty check.
 */
export type NonEmptyString = Brand<string, 'NonEmptyString'>;

// =============================================================================
// ASSERTIONS
// =============================================================================

/**
 * Invariant violation error.
 * Thrown when a value does not satisfy a constraint checked at use.
 */
export class InvariantViolation extends Error {
  constructor(
    public readonly invariant: string,
    public readonly details: string
  ) {
    super(`INVARIANT VIOLATION: ${invariant}: ${details}`);
    this.name = 'InvariantViolation';
  }
}

function isNonEmpty(value: string): value is NonEmptyString {
  return value.trim() !== '';
}

/**
 * Checks a static setting right before a step uses it.
 */
export function requireSetting(value: string | undefined, name: string): NonEmptyString {
  if (value === undefined || !isNonEmpty(value)) {
    throw new InvariantViolation('NON_EMPTY', `${name} must not be empty`);
  }
  return value;
}

/**
 * A pipeline must name each step once; results and overrides are keyed by name.
 */
export function assertUniqueStepNames(definitions: readonly StepDefinition[]): void {
  const seen = new Set<string>();
  for (const definition of definitions) {
    if (seen.has(definition.name)) {
      throw new InvariantViolation('UNIQUE_STEP_NAME', `step "${definition.name}" is defined twice`);
    }
    seen.add(definition.name);
  }
}
