/**
 * Logger Tests
 *
 * Proves:
 * - One JSON object per line, context merged, undefined fields dropped
 * - Credential-like fields never reach the sink
 */

import { describe, it, expect } from 'vitest';
import { createLogger, JsonLogger } from '../../src/utils/logger.js';

function capture() {
  const lines: string[] = [];
  const sink = (line: string) => {
    lines.push(line);
  };
  const parsed = (index: number): Record<string, unknown> => JSON.parse(lines[index]);
  return { lines, sink, parsed };
}

describe('JsonLogger', () => {
  it('should write level, message and merged context', () => {
    const { sink, parsed } = capture();
    const logger = new JsonLogger({ service: 'esp-orchestrator' }, 'info', sink);

    logger.child({ runId: 'run-1' }).info({ step: 'list-ips', durationMs: 12, missing: undefined }, 'List IPs succeeded');

    const entry = parsed(0);
    expect(entry).toMatchObject({
      level: 'info',
      message: 'List IPs succeeded',
      service: 'esp-orchestrator',
      runId: 'run-1',
      step: 'list-ips',
      durationMs: 12,
    });
    expect(typeof entry.timestamp).toBe('string');
    expect('missing' in entry).toBe(false);
  });

  it('should drop entries below the configured level', () => {
    const { lines, sink } = capture();
    const logger = new JsonLogger({}, 'warn', sink);

    logger.debug({}, 'debug');
    logger.info({}, 'info');
    logger.warn({}, 'warn');
    logger.error({}, 'error');

    expect(lines.map((line) => JSON.parse(line).message)).toEqual(['warn', 'error']);
  });

  it('should serialise errors with name, message and stack', () => {
    const { sink, parsed } = capture();
    const logger = new JsonLogger({}, 'info', sink);

    logger.error({ error: new TypeError('fetch failed') }, 'Request failed');

    expect(parsed(0).error).toMatchObject({ name: 'TypeError', message: 'fetch failed' });
    expect(parsed(0).error).toHaveProperty('stack');
  });

  it('should redact credential-like keys at any depth', () => {
    const { sink, parsed } = capture();
    const logger = new JsonLogger({ accountApiKey: 'test-secret' }, 'info', sink);

    logger.info(
      {
        headers: { 'X-SubAccount-ApiKey': 'test-secret', Accept: 'application/json' },
        subAccounts: [{ id: 1, apiKey: 'test-secret' }],
        authorization: 'Bearer test-secret',
      },
      'Request sent'
    );

    expect(parsed(0)).toMatchObject({
      accountApiKey: '[REDACTED]',
      headers: { 'X-SubAccount-ApiKey': '[REDACTED]', Accept: 'application/json' },
      subAccounts: [{ id: 1, apiKey: '[REDACTED]' }],
      authorization: '[REDACTED]',
    });
  });
});

describe('createLogger', () => {
  it('should default the service name and level', () => {
    const { lines, sink, parsed } = capture();
    const logger = createLogger({ sink });

    logger.debug({}, 'hidden');
    logger.info({}, 'shown');

    expect(lines).toHaveLength(1);
    expect(parsed(0)).toMatchObject({ service: 'esp-orchestrator', message: 'shown' });
  });
});
