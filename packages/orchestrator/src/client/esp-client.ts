/**
 * ESP API Client
 *
 * Authenticated HTTP access to the ESP for both credential scopes.
 * https://docs.sendpost.io
 *
 * One client serves one run: close() aborts anything in flight and
 * rejects every later call with EspTransportError.
 */

import { z } from 'zod';
import {
  AccountStat,
  AccountStatSchema,
  CREDENTIAL_HEADERS,
  CreateDomainRequest,
  CreateIpPoolRequest,
  CreateSubAccountRequest,
  CreateWebhookRequest,
  CredentialScope,
  DateRange,
  Domain,
  DomainSchema,
  EmailMessage,
  EspCredentials,
  EspGateway,
  Ip,
  IpPool,
  IpPoolSchema,
  IpSchema,
  Message,
  MessageSchema,
  SendResult,
  SendResultSchema,
  StatCounters,
  StatCountersSchema,
  SubAccount,
  SubAccountSchema,
  SubAccountStat,
  SubAccountStatSchema,
  Webhook,
  WebhookSchema,
} from './types.js';
import {
  EspApiError,
  EspDecodeError,
  EspTransportError,
  MissingCredentialError,
} from './errors.js';

export const DEFAULT_BASE_URL = 'https://api.sendpost.io/api/v1';

/**
 * Configuration for the ESP client
 */
export interface EspClientConfig {
  /** API base URL, without trailing slash */
  baseUrl: string;
  credentials: EspCredentials;
  /** Per-request timeout in ms (default: 30000) */
  timeoutMs?: number;
  /** Injected for tests; defaults to the global fetch */
  fetch?: typeof fetch;
}

interface RequestOptions {
  query?: Record<string, string>;
  body?: unknown;
}

/**
 * ESP API Client
 */
export class EspApiClient implements EspGateway {
  private config: EspClientConfig;
  private fetchImpl: typeof fetch;
  private lifetime = new AbortController();

  constructor(config: EspClientConfig) {
    this.config = {
      timeoutMs: 30000,
      ...config,
      baseUrl: config.baseUrl.replace(/\/+$/, ''),
    };
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // SUB-ACCOUNTS
  // ═══════════════════════════════════════════════════════════════════════════

  async listSubAccounts(): Promise<SubAccount[]> {
    return this.request('account', 'listSubAccounts', 'GET', '/account/subaccount/', z.array(SubAccountSchema));
  }

  async createSubAccount(request: CreateSubAccountRequest): Promise<SubAccount> {
    return this.request('account', 'createSubAccount', 'POST', '/account/subaccount/', SubAccountSchema, {
      body: request,
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // WEBHOOKS
  // ═══════════════════════════════════════════════════════════════════════════

  async createWebhook(request: CreateWebhookRequest): Promise<Webhook> {
    return this.request('account', 'createWebhook', 'POST', '/account/webhook/', WebhookSchema, {
      body: request,
    });
  }

  async listWebhooks(): Promise<Webhook[]> {
    return this.request('account', 'listWebhooks', 'GET', '/account/webhook/', z.array(WebhookSchema));
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // DOMAINS
  // ═══════════════════════════════════════════════════════════════════════════

  async addDomain(request: CreateDomainRequest): Promise<Domain> {
    return this.request('subAccount', 'addDomain', 'POST', '/subaccount/domain/', DomainSchema, {
      body: request,
    });
  }

  async getDomain(domainId: string): Promise<Domain> {
    return this.request(
      'subAccount',
      'getDomain',
      'GET',
      `/subaccount/domain/${encodeURIComponent(domainId)}`,
      DomainSchema
    );
  }

  async listDomains(): Promise<Domain[]> {
    return this.request('subAccount', 'listDomains', 'GET', '/subaccount/domain/', z.array(DomainSchema));
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // EMAIL & MESSAGES
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Send one message. The ESP answers with one result per recipient.
   */
  async sendEmail(message: EmailMessage): Promise<SendResult[]> {
    return this.request('subAccount', 'sendEmail', 'POST', '/subaccount/email/', z.array(SendResultSchema), {
      body: message,
    });
  }

  async getMessage(messageId: string): Promise<Message> {
    return this.request(
      'account',
      'getMessage',
      'GET',
      `/account/message/${encodeURIComponent(messageId)}`,
      MessageSchema
    );
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // STATISTICS
  // ═══════════════════════════════════════════════════════════════════════════

  async getSubAccountStats(subAccountId: number, range: DateRange): Promise<SubAccountStat[]> {
    return this.request(
      'subAccount',
      'getSubAccountStats',
      'GET',
      `/subaccount/stat/${subAccountId}`,
      z.array(SubAccountStatSchema),
      { query: { from: range.from, to: range.to } }
    );
  }

  async getAggregateStats(range: DateRange): Promise<StatCounters> {
    return this.request('account', 'getAggregateStats', 'GET', '/account/stat/aggregate', StatCountersSchema, {
      query: { from: range.from, to: range.to },
    });
  }

  async getAccountStats(range: DateRange): Promise<AccountStat[]> {
    return this.request('account', 'getAccountStats', 'GET', '/account/stat/', z.array(AccountStatSchema), {
      query: { from: range.from, to: range.to },
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // IPS & IP POOLS
  // ═══════════════════════════════════════════════════════════════════════════

  async listIps(): Promise<Ip[]> {
    return this.request('account', 'listIps', 'GET', '/account/ip/', z.array(IpSchema));
  }

  async createIpPool(request: CreateIpPoolRequest): Promise<IpPool> {
    return this.request('account', 'createIpPool', 'POST', '/account/ippool/', IpPoolSchema, {
      body: request,
    });
  }

  async listIpPools(): Promise<IpPool[]> {
    return this.request('account', 'listIpPools', 'GET', '/account/ippool/', z.array(IpPoolSchema));
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Release the client. Idempotent.
   */
  close(): void {
    if (!this.lifetime.signal.aborted) {
      this.lifetime.abort();
    }
  }

  get closed(): boolean {
    return this.lifetime.signal.aborted;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // HTTP
  // ═══════════════════════════════════════════════════════════════════════════

  private async request<T>(
    scope: CredentialScope,
    operation: string,
    method: 'GET' | 'POST',
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    const apiKey =
      scope === 'account' ? this.config.credentials.accountApiKey : this.config.credentials.subAccountApiKey;
    if (apiKey.trim() === '') {
      throw new MissingCredentialError(operation, scope);
    }
    if (this.closed) {
      throw new EspTransportError(operation, 'client is closed');
    }

    const url = new URL(`${this.config.baseUrl}${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);
    const onClose = (): void => controller.abort();
    this.lifetime.signal.addEventListener('abort', onClose, { once: true });

    let status: number;
    let text: string;
    try {
      const response = await this.fetchImpl(url.toString(), {
        method,
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          [CREDENTIAL_HEADERS[scope]]: apiKey,
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });
      status = response.status;
      text = await response.text();
      if (!response.ok) {
        throw new EspApiError(operation, status, text);
      }
    } catch (error) {
      if (error instanceof EspApiError) {
        throw error;
      }
      const reason = timedOut
        ? `request timed out after ${this.config.timeoutMs}ms`
        : this.closed
          ? 'client is closed'
          : error instanceof Error
            ? error.message
            : String(error);
      throw new EspTransportError(operation, reason, { cause: error });
    } finally {
      clearTimeout(timeout);
      this.lifetime.signal.removeEventListener('abort', onClose);
    }

    let payload: unknown;
    try {
      payload = text === '' ? null : JSON.parse(text);
    } catch {
      throw new EspDecodeError(operation, text, ['body is not valid JSON']);
    }

    const decoded = schema.safeParse(payload);
    if (!decoded.success) {
      throw new EspDecodeError(
        operation,
        text,
        decoded.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      );
    }
    return decoded.data;
  }
}
