/**
 * Shared test fixtures: a capturing logger, a vi.fn-backed gateway and an
 * in-process ESP behind a fake fetch.
 */

import { vi } from 'vitest';
import type {
  AccountStat,
  CreateDomainRequest,
  CreateIpPoolRequest,
  CreateSubAccountRequest,
  CreateWebhookRequest,
  DateRange,
  Domain,
  EmailMessage,
  EspGateway,
  Ip,
  IpPool,
  Message,
  SendResult,
  StatCounters,
  SubAccount,
  SubAccountStat,
  Webhook,
} from '../src/client/types.js';
import { JsonLogger, Logger, LogLevel } from '../src/utils/logger.js';
import type { PipelineSettings } from '../src/workflows/esp-pipeline.js';
import type { ClassifiedError, StepOutput, StepResult } from '../src/workflows/types.js';

// =============================================================================
// CLOCK
// =============================================================================

export const FIXED_NOW = new Date('2026-03-15T12:00:00Z');
export const FIXED_UNIX = 1773576000;

// =============================================================================
// LOGGER
// =============================================================================

export interface CapturedLogger {
  logger: Logger;
  lines: string[];
  entries(): Array<Record<string, unknown>>;
}

export function createTestLogger(level: LogLevel = 'debug'): CapturedLogger {
  const lines: string[] = [];
  return {
    logger: new JsonLogger({ service: 'test' }, level, (line) => lines.push(line)),
    lines,
    entries: () => lines.map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

// =============================================================================
// FIXTURES
// =============================================================================

export const SUB_ACCOUNTS: SubAccount[] = [
  { id: 101, name: 'Existing Client', type: 1, blocked: false },
  { id: 102, name: 'Legacy Client', type: 0, blocked: true },
];

export const CREATED_SUB_ACCOUNT: SubAccount = { id: 201, name: `ESP Client - ${FIXED_UNIX}`, type: 0 };

export const WEBHOOK: Webhook = { id: 301, url: 'https://webhook.example.com/esp-events', enabled: true };

export const DOMAIN: Domain = {
  id: '401',
  name: 'example.com',
  verified: false,
  dkim: { type: 'TXT', host: 'esp._domainkey.example.com', textValue: 'k=rsa; p=TESTKEY' },
};

export const SEND_RESULT: SendResult = { messageId: 'msg-1', to: 'recipient@example.com', submittedAt: FIXED_UNIX };

export const MESSAGE: Message = {
  messageId: 'msg-1',
  accountId: 11,
  subAccountId: 201,
  emailType: 'transactional',
  from: { email: 'sender@example.com', name: 'Example Sender' },
  to: { email: 'recipient@example.com', name: 'Customer' },
  subject: 'Order Confirmation - Transactional Email',
  attempt: 1,
};

export const SUB_ACCOUNT_STATS: SubAccountStat[] = [
  { date: '2026-03-14', stats: { processed: 10, delivered: 9 } },
  { date: '2026-03-15', stats: { processed: 5, delivered: 5 } },
];

export const AGGREGATE: StatCounters = { processed: 15, delivered: 14, opened: 6, clicked: 2 };

export const ACCOUNT_STATS: AccountStat[] = [
  { date: '2026-03-14', stat: { processed: 10, delivered: 9, opened: 4, clicked: 1 } },
  { date: '2026-03-15', stat: { processed: 5, delivered: 5, opened: 2, clicked: 1 } },
];

export const IPS: Ip[] = [{ id: 501, publicIP: '203.0.113.10', reverseDNSHostname: 'mail.example.com' }];

export const IP_POOL: IpPool = {
  id: 601,
  name: `Marketing Pool - ${FIXED_UNIX}`,
  routingStrategy: 0,
  ips: [{ publicIP: '203.0.113.10' }],
};

export const SETTINGS: PipelineSettings = {
  fromEmail: 'sender@example.com',
  fromName: 'Example Sender',
  toEmail: 'recipient@example.com',
  domainName: 'example.com',
  webhookUrl: 'https://webhook.example.com/esp-events',
  statsWindowDays: 7,
  extended: false,
};

// =============================================================================
// FAKE GATEWAY
// =============================================================================

/**
 * Every operation succeeds with the fixtures above unless a test overrides it.
 */
export function createFakeGateway() {
  return {
    listSubAccounts: vi.fn(async () => SUB_ACCOUNTS),
    createSubAccount: vi.fn(async (_request: CreateSubAccountRequest) => CREATED_SUB_ACCOUNT),
    createWebhook: vi.fn(async (_request: CreateWebhookRequest) => WEBHOOK),
    listWebhooks: vi.fn(async () => [WEBHOOK]),
    addDomain: vi.fn(async (_request: CreateDomainRequest) => DOMAIN),
    getDomain: vi.fn(async (_domainId: string) => DOMAIN),
    listDomains: vi.fn(async () => [DOMAIN]),
    sendEmail: vi.fn(async (_message: EmailMessage) => [SEND_RESULT]),
    getMessage: vi.fn(async (_messageId: string) => MESSAGE),
    getSubAccountStats: vi.fn(async (_subAccountId: number, _range: DateRange) => SUB_ACCOUNT_STATS),
    getAggregateStats: vi.fn(async (_range: DateRange) => AGGREGATE),
    getAccountStats: vi.fn(async (_range: DateRange) => ACCOUNT_STATS),
    listIps: vi.fn(async () => IPS),
    createIpPool: vi.fn(async (_request: CreateIpPoolRequest) => IP_POOL),
    listIpPools: vi.fn(async () => [IP_POOL]),
  } satisfies EspGateway;
}

export type FakeGateway = ReturnType<typeof createFakeGateway>;

// =============================================================================
// IN-PROCESS ESP (fake fetch)
// =============================================================================

export const TEST_BASE_URL = 'https://api.test/api/v1';

const ROUTES: Record<string, unknown> = {
  'GET /account/subaccount/': SUB_ACCOUNTS,
  'POST /account/subaccount/': CREATED_SUB_ACCOUNT,
  'POST /account/webhook/': WEBHOOK,
  'GET /account/webhook/': [WEBHOOK],
  'POST /subaccount/domain/': { ...DOMAIN, id: 401 },
  'GET /subaccount/domain/': [DOMAIN],
  'POST /subaccount/email/': [SEND_RESULT],
  'GET /account/message/msg-1': MESSAGE,
  'GET /subaccount/stat/201': SUB_ACCOUNT_STATS,
  'GET /subaccount/stat/555': SUB_ACCOUNT_STATS,
  'GET /account/stat/aggregate': AGGREGATE,
  'GET /account/stat/': ACCOUNT_STATS,
  'GET /account/ip/': IPS,
  'POST /account/ippool/': IP_POOL,
  'GET /account/ippool/': [IP_POOL],
};

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

/**
 * Answers the client's requests from the fixture table. Rejects calls that
 * lack the header of their scope with 401, unknown routes with 404.
 */
export function createFakeEsp() {
  return vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(String(input));
    const path = url.pathname.replace(/^\/api\/v1/, '');
    const headers = new Headers(init?.headers);
    const header = path.startsWith('/subaccount/') ? 'X-SubAccount-ApiKey' : 'X-Account-ApiKey';
    if (!headers.get(header)) {
      return json(401, { error: 'missing api key' });
    }
    const key = `${init?.method ?? 'GET'} ${path}`;
    if (!(key in ROUTES)) {
      return json(404, { error: `no route ${key}` });
    }
    return json(200, ROUTES[key]);
  });
}

// =============================================================================
// RESULT ACCESS
// =============================================================================

export function successOf(results: readonly StepResult[], step: string): StepOutput {
  const result = results.find((r) => r.step === step);
  if (result?.type !== 'SUCCESS') {
    throw new Error(`expected ${step} to succeed, got ${JSON.stringify(result)}`);
  }
  return result.value;
}

export function failureOf(results: readonly StepResult[], step: string): ClassifiedError {
  const result = results.find((r) => r.step === step);
  if (result?.type !== 'FAILURE') {
    throw new Error(`expected ${step} to fail, got ${JSON.stringify(result)}`);
  }
  return result.error;
}

export function skipReasonOf(results: readonly StepResult[], step: string): string {
  const result = results.find((r) => r.step === step);
  if (result?.type !== 'SKIPPED') {
    throw new Error(`expected ${step} to be skipped, got ${JSON.stringify(result)}`);
  }
  return result.reason;
}
