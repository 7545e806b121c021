/**
 * Boundary Invariant Tests
 *
 * Proves that the boundary guards enforce:
 * 1. Static settings are non-empty at the point of use
 * 2. A pipeline names each step once
 */

import { describe, it, expect } from 'vitest';
import {
  InvariantViolation,
  assertUniqueStepNames,
  requireSetting,
} from '../../src/boundaries/index.js';
import type { StepDefinition } from '../../src/workflows/types.js';

function definition(name: string): StepDefinition {
  return {
    name,
    title: name,
    scope: 'account',
    requires: [],
    onMissing: 'skip',
    fatal: false,
    run: async () => ({ details: {} }),
  };
}

describe('requireSetting', () => {
  it('should return a non-empty value unchanged', () => {
    const value: string = requireSetting('sender@example.com', 'sender email');
    expect(value).toBe('sender@example.com');
  });

  it('should reject blank and missing values', () => {
    expect(() => requireSetting('   ', 'sender email')).toThrow(
      'INVARIANT VIOLATION: NON_EMPTY: sender email must not be empty'
    );
    expect(() => requireSetting(undefined, 'webhook URL')).toThrow(InvariantViolation);
  });

  it('should carry the invariant name and details', () => {
    try {
      requireSetting('', 'domain name');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvariantViolation);
      expect(error).toMatchObject({ invariant: 'NON_EMPTY', details: 'domain name must not be empty' });
    }
  });
});

describe('assertUniqueStepNames', () => {
  it('should accept distinct names', () => {
    expect(() => assertUniqueStepNames([definition('a'), definition('b')])).not.toThrow();
  });

  it('should reject a repeated name', () => {
    expect(() => assertUniqueStepNames([definition('a'), definition('b'), definition('a')])).toThrow(
      'INVARIANT VIOLATION: UNIQUE_STEP_NAME: step "a" is defined twice'
    );
  });
});
