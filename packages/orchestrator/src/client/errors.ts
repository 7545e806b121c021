/**
 * ESP client errors.
 */

import type { CredentialScope } from './types.js';

/**
 * Non-2xx response from the ESP.
 */
export class EspApiError extends Error {
  constructor(
    public readonly operation: string,
    public readonly status: number,
    public readonly body: string
  ) {
    super(`${operation} failed with HTTP ${status}`);
    this.name = 'EspApiError';
  }
}

/**
 * Raised before any request is made when the scope's API key is empty.
 * Reported as 401 so it classifies exactly like a rejected key.
 */
export class MissingCredentialError extends EspApiError {
  constructor(
    operation: string,
    public readonly scope: CredentialScope
  ) {
    super(operation, 401, `No ${scope === 'account' ? 'account' : 'sub-account'} API key configured`);
    this.name = 'MissingCredentialError';
  }
}

/**
 * The request never produced a response: connection failure,
 * timeout, or the client was closed.
 */
export class EspTransportError extends Error {
  constructor(
    public readonly operation: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${operation}: ${message}`, options);
    this.name = 'EspTransportError';
  }
}

/**
 * 2xx response whose body does not match the expected record.
 */
export class EspDecodeError extends Error {
  constructor(
    public readonly operation: string,
    public readonly body: string,
    public readonly issues: string[]
  ) {
    super(`${operation} returned an unexpected payload: ${issues.join('; ')}`);
    this.name = 'EspDecodeError';
  }
}
