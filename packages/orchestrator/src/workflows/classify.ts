/**
 * Error Classification
 *
 * Pure mapping from anything a step can throw to a ClassifiedError.
 */

import {
  EspApiError,
  EspDecodeError,
  EspTransportError,
} from '../client/errors.js';
import { InvariantViolation } from '../boundaries/invariants.js';
import { ClassifiedError, ErrorKind } from './types.js';

const STATUS_KINDS: ReadonlyMap<number, ErrorKind> = new Map<number, ErrorKind>([
  [401, 'Unauthorized'],
  [403, 'Forbidden'],
  [404, 'NotFound'],
  [409, 'Conflict'],
  [422, 'Validation'],
]);

export function errorKindForStatus(status: number): ErrorKind {
  return STATUS_KINDS.get(status) ?? 'Unknown';
}

/**
 * Errors that mean "no response arrived" when raised outside the client,
 * e.g. by a fetch passed in directly.
 */
function isTransportLike(error: Error): boolean {
  if (error.name === 'AbortError' || error.name === 'TimeoutError') {
    return true;
  }
  return error instanceof TypeError && error.message === 'fetch failed';
}

export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof EspApiError) {
    return {
      kind: errorKindForStatus(error.status),
      message: error.message,
      statusCode: error.status,
      responseBody: error.body,
    };
  }

  if (error instanceof EspTransportError) {
    return { kind: 'Transport', message: error.message };
  }

  if (error instanceof EspDecodeError) {
    return { kind: 'Unknown', message: error.message, responseBody: error.body };
  }

  if (error instanceof InvariantViolation) {
    return { kind: 'Validation', message: error.message };
  }

  if (error instanceof Error) {
    return {
      kind: isTransportLike(error) ? 'Transport' : 'Unknown',
      message: error.message,
    };
  }

  return { kind: 'Unknown', message: String(error) };
}
