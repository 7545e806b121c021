/**
 * Step Executor Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { EspApiError } from '../../src/client/errors.js';
import { executeStep, StepSkip } from '../../src/workflows/step-executor.js';
import { createTestLogger } from '../helpers.js';

describe('executeStep', () => {
  it('should wrap the value in a SUCCESS with its duration', async () => {
    const { logger, entries } = createTestLogger();
    const now = vi.fn().mockReturnValueOnce(100).mockReturnValueOnce(250);

    const result = await executeStep('list-ips', 'List dedicated IPs', async () => 42, { logger, now });

    expect(result).toEqual({ type: 'SUCCESS', step: 'list-ips', title: 'List dedicated IPs', value: 42, durationMs: 150 });
    expect(entries()[0]).toMatchObject({
      level: 'info',
      message: 'List dedicated IPs succeeded',
      step: 'list-ips',
      outcome: 'success',
      durationMs: 150,
    });
  });

  it('should turn a thrown error into a classified FAILURE', async () => {
    const { logger } = createTestLogger();

    const result = await executeStep(
      'get-message-details',
      'Get message details',
      async () => {
        throw new EspApiError('getMessage', 404, '{"error":"not found"}');
      },
      { logger, now: () => 0 }
    );

    expect(result).toEqual({
      type: 'FAILURE',
      step: 'get-message-details',
      title: 'Get message details',
      durationMs: 0,
      error: {
        kind: 'NotFound',
        message: 'getMessage failed with HTTP 404',
        statusCode: 404,
        responseBody: '{"error":"not found"}',
      },
    });
  });

  it('should log the failure with kind, status and body', async () => {
    const { logger, entries } = createTestLogger();

    await executeStep(
      'create-webhook',
      'Create webhook',
      async () => {
        throw new EspApiError('createWebhook', 422, '{"error":"invalid url"}');
      },
      { logger, now: () => 0 }
    );

    expect(entries()[0]).toMatchObject({
      level: 'error',
      message: 'Create webhook failed: createWebhook failed with HTTP 422',
      outcome: 'failure',
      errorKind: 'Validation',
      statusCode: 422,
      responseBody: '{"error":"invalid url"}',
      error: { name: 'EspApiError', message: 'createWebhook failed with HTTP 422' },
    });
  });

  it('should never throw, whatever the operation rejects with', async () => {
    const { logger } = createTestLogger();

    const result = await executeStep('odd', 'Odd step', () => Promise.reject('not an error'), { logger });

    expect(result.type).toBe('FAILURE');
    expect(result).toMatchObject({ error: { kind: 'Unknown', message: 'not an error' } });
  });

  it('should turn a StepSkip into SKIPPED and log a warning', async () => {
    const { logger, entries } = createTestLogger();

    const result = await executeStep(
      'create-ip-pool',
      'Create IP pool',
      async () => {
        throw new StepSkip('no dedicated IPs available');
      },
      { logger, now: () => 0 }
    );

    expect(result).toEqual({
      type: 'SKIPPED',
      step: 'create-ip-pool',
      title: 'Create IP pool',
      reason: 'no dedicated IPs available',
    });
    expect(entries()[0]).toMatchObject({
      level: 'warn',
      message: 'Create IP pool skipped',
      outcome: 'skipped',
      reason: 'no dedicated IPs available',
    });
  });
});
