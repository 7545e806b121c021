/**
 * ESP Demonstration Pipeline
 *
 * The fixed, ordered set of ESP operations:
 *  1. list-sub-accounts
 *  2. create-sub-account        → subAccountId
 *  3. create-webhook            → webhookId
 *  4. add-domain                → domainId       (subAccountId missing: attempt)
 *  5. list-domains
 *  6. send-transactional-email  → messageId
 *  7. send-marketing-email
 *  8. get-message-details                        (messageId missing: skip)
 *  9. sub-account-stats                          (subAccountId missing: fallback)
 * 10. aggregate-stats
 * 11. account-stats
 * 12. list-ips                  → dedicatedIps
 * 13. create-ip-pool            → ipPoolId       (dedicatedIps missing: attempt;
 *                                                  skipped when the account has none)
 *
 * The extended pipeline adds list-webhooks after 3 and list-ip-pools after 13.
 * No step is fatal.
 */

import type {
  DateRange,
  DnsRecord,
  Domain,
  EmailMessage,
  EspGateway,
  StatCounters,
} from '../client/types.js';
import { InvariantViolation, requireSetting } from '../boundaries/invariants.js';
import { StepSkip } from './step-executor.js';
import {
  ContextField,
  DetailValue,
  StepDefinition,
  StepDetails,
  WorkflowContext,
} from './types.js';

// =============================================================================
// SETTINGS
// =============================================================================

export interface PipelineSettings {
  fromEmail: string;
  fromName: string;
  toEmail: string;
  domainName: string;
  webhookUrl: string;
  /** Used by sub-account stats when no sub-account was created */
  fallbackSubAccountId?: number;
  statsWindowDays: number;
  extended: boolean;
}

export interface PipelineOptions {
  now?: () => Date;
}

export const STEP_NAMES = {
  LIST_SUB_ACCOUNTS: 'list-sub-accounts',
  CREATE_SUB_ACCOUNT: 'create-sub-account',
  CREATE_WEBHOOK: 'create-webhook',
  LIST_WEBHOOKS: 'list-webhooks',
  ADD_DOMAIN: 'add-domain',
  LIST_DOMAINS: 'list-domains',
  SEND_TRANSACTIONAL_EMAIL: 'send-transactional-email',
  SEND_MARKETING_EMAIL: 'send-marketing-email',
  GET_MESSAGE_DETAILS: 'get-message-details',
  SUB_ACCOUNT_STATS: 'sub-account-stats',
  AGGREGATE_STATS: 'aggregate-stats',
  ACCOUNT_STATS: 'account-stats',
  LIST_IPS: 'list-ips',
  CREATE_IP_POOL: 'create-ip-pool',
  LIST_IP_POOLS: 'list-ip-pools',
} as const;

export type EspStepName = typeof STEP_NAMES[keyof typeof STEP_NAMES];

export const ESP_STEP_NAMES: readonly EspStepName[] = Object.values(STEP_NAMES);

/**
 * Steps with context requirements; only these consult a dependency policy.
 */
export const DEPENDENT_STEP_NAMES: readonly EspStepName[] = [
  STEP_NAMES.ADD_DOMAIN,
  STEP_NAMES.GET_MESSAGE_DETAILS,
  STEP_NAMES.SUB_ACCOUNT_STATS,
  STEP_NAMES.CREATE_IP_POOL,
];

// =============================================================================
// HELPERS
// =============================================================================

const ROUND_ROBIN = 0;

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Window ending today (UTC) and starting `days` days earlier.
 */
export function statsWindow(now: Date, days: number): DateRange {
  const from = new Date(now.getTime() - days * 24 * 60 * 60 * 1000);
  return { from: formatDate(from), to: formatDate(now) };
}

function unixSeconds(now: Date): number {
  return Math.floor(now.getTime() / 1000);
}

function requireField<K extends ContextField>(
  context: Readonly<WorkflowContext>,
  field: K
): NonNullable<WorkflowContext[K]> {
  const value = context[field];
  if (value === undefined || value === null) {
    throw new InvariantViolation('CONTEXT_FIELD', `${field} is not available`);
  }
  return value;
}

/**
 * Drops absent values so the reporter only prints what the ESP returned.
 */
function compact(fields: Record<string, DetailValue | undefined>): StepDetails {
  const details: StepDetails = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined && value !== null) {
      details[key] = value;
    }
  }
  return details;
}

function dnsRecordLines(domain: Domain): string[] {
  const records: Array<[string, DnsRecord | null | undefined]> = [
    ['DKIM', domain.dkim],
    ['Return-Path', domain.returnPath],
    ['Tracking', domain.track],
    ['DMARC', domain.dmarc],
  ];
  const lines: string[] = [];
  for (const [label, record] of records) {
    if (!record || (!record.textValue && !record.host)) continue;
    lines.push(`${label}: ${record.type ?? 'TXT'} ${record.host ?? '@'} ${record.textValue ?? ''}`.trimEnd());
  }
  return lines;
}

function counterDetails(counters: StatCounters): StepDetails {
  return {
    processed: counters.processed ?? 0,
    delivered: counters.delivered ?? 0,
    dropped: counters.dropped ?? 0,
    hardBounced: counters.hardBounced ?? 0,
    softBounced: counters.softBounced ?? 0,
    opened: counters.opened ?? 0,
    clicked: counters.clicked ?? 0,
    unsubscribed: counters.unsubscribed ?? 0,
    spam: counters.spam ?? 0,
  };
}

// =============================================================================
// PIPELINE
// =============================================================================

export function createEspPipeline(
  gateway: EspGateway,
  settings: PipelineSettings,
  options: PipelineOptions = {}
): readonly StepDefinition[] {
  const now = options.now ?? (() => new Date());

  const sender = (name: string): EmailMessage['from'] => ({
    email: requireSetting(settings.fromEmail, 'sender email'),
    name: settings.fromName.trim() === '' ? name : settings.fromName,
  });

  const listSubAccounts: StepDefinition = {
    name: STEP_NAMES.LIST_SUB_ACCOUNTS,
    title: 'List sub-accounts',
    scope: 'account',
    requires: [],
    onMissing: 'skip',
    fatal: false,
    async run() {
      const subAccounts = await gateway.listSubAccounts();
      return {
        details: {
          count: subAccounts.length,
          subAccounts: subAccounts.map(
            (s) => `${s.id} ${s.name} (${s.type === 1 ? 'Plus' : 'Regular'}${s.blocked ? ', blocked' : ''})`
          ),
        },
        produces: { knownSubAccountIds: subAccounts.map((s) => s.id) },
      };
    },
  };

  const createSubAccount: StepDefinition = {
    name: STEP_NAMES.CREATE_SUB_ACCOUNT,
    title: 'Create sub-account',
    scope: 'account',
    requires: [],
    onMissing: 'skip',
    fatal: false,
    async run() {
      const subAccount = await gateway.createSubAccount({
        name: `ESP Client - ${unixSeconds(now())}`,
      });
      return {
        details: {
          subAccountId: subAccount.id,
          name: subAccount.name,
          type: subAccount.type === 1 ? 'Plus' : 'Regular',
        },
        produces: { subAccountId: subAccount.id },
      };
    },
  };

  const createWebhook: StepDefinition = {
    name: STEP_NAMES.CREATE_WEBHOOK,
    title: 'Create webhook',
    scope: 'account',
    requires: [],
    onMissing: 'skip',
    fatal: false,
    async run() {
      const webhook = await gateway.createWebhook({
        url: requireSetting(settings.webhookUrl, 'webhook URL'),
        enabled: true,
        processed: true,
        delivered: true,
        dropped: true,
        softBounced: true,
        hardBounced: true,
        opened: true,
        clicked: true,
        unsubscribed: true,
        spam: true,
      });
      return {
        details: compact({ webhookId: webhook.id, url: webhook.url, enabled: webhook.enabled }),
        produces: { webhookId: webhook.id },
      };
    },
  };

  const listWebhooks: StepDefinition = {
    name: STEP_NAMES.LIST_WEBHOOKS,
    title: 'List webhooks',
    scope: 'account',
    requires: [],
    onMissing: 'skip',
    fatal: false,
    async run() {
      const webhooks = await gateway.listWebhooks();
      return {
        details: {
          count: webhooks.length,
          webhooks: webhooks.map((w) => `${w.id} ${w.url} (${w.enabled ? 'enabled' : 'disabled'})`),
        },
      };
    },
  };

  const addDomain: StepDefinition = {
    name: STEP_NAMES.ADD_DOMAIN,
    title: 'Add domain',
    scope: 'subAccount',
    requires: ['subAccountId'],
    onMissing: 'attempt',
    fatal: false,
    async run(context) {
      const created = await gateway.addDomain({
        name: requireSetting(settings.domainName, 'domain name'),
      });
      let records = dnsRecordLines(created);
      if (records.length === 0) {
        records = dnsRecordLines(await gateway.getDomain(created.id));
      }
      return {
        details: compact({
          domainId: created.id,
          domain: created.name,
          subAccountId: context.subAccountId,
          verified: created.verified ? 'Yes' : 'No',
          dnsRecords: records,
        }),
        produces: { domainId: created.id },
      };
    },
  };

  const listDomains: StepDefinition = {
    name: STEP_NAMES.LIST_DOMAINS,
    title: 'List domains',
    scope: 'subAccount',
    requires: [],
    onMissing: 'skip',
    fatal: false,
    async run() {
      const domains = await gateway.listDomains();
      return {
        details: {
          count: domains.length,
          domains: domains.map((d) => `${d.id} ${d.name} (${d.verified ? 'verified' : 'unverified'})`),
        },
      };
    },
  };

  const sendTransactionalEmail: StepDefinition = {
    name: STEP_NAMES.SEND_TRANSACTIONAL_EMAIL,
    title: 'Send transactional email',
    scope: 'subAccount',
    requires: [],
    onMissing: 'skip',
    fatal: false,
    async run() {
      const message: EmailMessage = {
        from: sender('Transactional Sender'),
        to: [
          {
            email: requireSetting(settings.toEmail, 'recipient email'),
            name: 'Customer',
            customFields: { customer_id: '67890', order_value: '99.99' },
          },
        ],
        subject: 'Order Confirmation - Transactional Email',
        htmlBody:
          '<h1>Thank you for your order!</h1><p>Your order has been confirmed and will be processed shortly.</p>',
        textBody: 'Thank you for your order! Your order has been confirmed and will be processed shortly.',
        trackOpens: true,
        trackClicks: true,
        headers: { 'X-Order-ID': '12345', 'X-Email-Type': 'transactional' },
      };
      const [sent] = await gateway.sendEmail(message);
      if (!sent) {
        throw new Error('sendEmail returned no result for the recipient');
      }
      return {
        details: compact({ messageId: sent.messageId, to: sent.to, subject: message.subject }),
        produces: { messageId: sent.messageId },
      };
    },
  };

  const sendMarketingEmail: StepDefinition = {
    name: STEP_NAMES.SEND_MARKETING_EMAIL,
    title: 'Send marketing email',
    scope: 'subAccount',
    requires: [],
    onMissing: 'skip',
    fatal: false,
    async run() {
      const message: EmailMessage = {
        from: sender('Marketing Team'),
        to: [{ email: requireSetting(settings.toEmail, 'recipient email'), name: 'Customer 1' }],
        subject: 'Special Offer - 20% Off Everything!',
        htmlBody:
          '<html><body><h1>Special Offer!</h1>' +
          '<p>Get 20% off on all products. Use code: <strong>SAVE20</strong></p>' +
          '<p><a href="https://example.com/shop">Shop Now</a></p></body></html>',
        textBody: 'Special Offer! Get 20% off on all products. Use code: SAVE20. Visit: https://example.com/shop',
        trackOpens: true,
        trackClicks: true,
        groups: ['marketing', 'promotional'],
        headers: { 'X-Email-Type': 'marketing', 'X-Campaign-ID': 'campaign-001' },
      };
      const [sent] = await gateway.sendEmail(message);
      if (!sent) {
        throw new Error('sendEmail returned no result for the recipient');
      }
      // messageId stays with the transactional send
      return {
        details: compact({ messageId: sent.messageId, to: sent.to, subject: message.subject }),
      };
    },
  };

  const getMessageDetails: StepDefinition = {
    name: STEP_NAMES.GET_MESSAGE_DETAILS,
    title: 'Get message details',
    scope: 'account',
    requires: ['messageId'],
    onMissing: 'skip',
    fatal: false,
    async run(context) {
      const message = await gateway.getMessage(requireField(context, 'messageId'));
      return {
        details: compact({
          messageId: message.messageId,
          accountId: message.accountId,
          subAccountId: message.subAccountId,
          ipId: message.ipId,
          publicIp: message.publicIp,
          localIp: message.localIp,
          emailType: message.emailType,
          submittedAt: message.submittedAt,
          from: message.from?.email,
          to: message.to?.email,
          toName: message.to?.name,
          subject: message.subject,
          ipPool: message.ipPool,
          attempts: message.attempt,
        }),
      };
    },
  };

  const subAccountStats: StepDefinition = {
    name: STEP_NAMES.SUB_ACCOUNT_STATS,
    title: 'Sub-account statistics',
    scope: 'subAccount',
    requires: ['subAccountId'],
    onMissing: 'fallback',
    fallback(context) {
      const subAccountId = settings.fallbackSubAccountId ?? context.knownSubAccountIds?.[0];
      return subAccountId === undefined ? undefined : { subAccountId };
    },
    fatal: false,
    async run(context) {
      const subAccountId = requireField(context, 'subAccountId');
      const range = statsWindow(now(), settings.statsWindowDays);
      const stats = await gateway.getSubAccountStats(subAccountId, range);

      let totalProcessed = 0;
      let totalDelivered = 0;
      const days: string[] = [];
      for (const stat of stats) {
        const counters = stat.stats ?? {};
        totalProcessed += counters.processed ?? 0;
        totalDelivered += counters.delivered ?? 0;
        days.push(
          `${stat.date}: processed ${counters.processed ?? 0}, delivered ${counters.delivered ?? 0}, ` +
            `dropped ${counters.dropped ?? 0}, hard bounced ${counters.hardBounced ?? 0}, ` +
            `soft bounced ${counters.softBounced ?? 0}, unsubscribed ${counters.unsubscribed ?? 0}, ` +
            `spam ${counters.spam ?? 0}`
        );
      }

      return {
        details: {
          subAccountId,
          from: range.from,
          to: range.to,
          records: stats.length,
          totalProcessed,
          totalDelivered,
          days,
        },
      };
    },
  };

  const aggregateStats: StepDefinition = {
    name: STEP_NAMES.AGGREGATE_STATS,
    title: 'Aggregate statistics',
    scope: 'account',
    requires: [],
    onMissing: 'skip',
    fatal: false,
    async run() {
      const range = statsWindow(now(), settings.statsWindowDays);
      const counters = await gateway.getAggregateStats(range);
      return {
        details: { from: range.from, to: range.to, ...counterDetails(counters) },
      };
    },
  };

  const accountStats: StepDefinition = {
    name: STEP_NAMES.ACCOUNT_STATS,
    title: 'Account statistics',
    scope: 'account',
    requires: [],
    onMissing: 'skip',
    fatal: false,
    async run() {
      const range = statsWindow(now(), settings.statsWindowDays);
      const stats = await gateway.getAccountStats(range);
      const totals = { processed: 0, delivered: 0, opened: 0, clicked: 0 };
      for (const { stat } of stats) {
        totals.processed += stat?.processed ?? 0;
        totals.delivered += stat?.delivered ?? 0;
        totals.opened += stat?.opened ?? 0;
        totals.clicked += stat?.clicked ?? 0;
      }
      return {
        details: { from: range.from, to: range.to, records: stats.length, ...totals },
      };
    },
  };

  const listIps: StepDefinition = {
    name: STEP_NAMES.LIST_IPS,
    title: 'List dedicated IPs',
    scope: 'account',
    requires: [],
    onMissing: 'skip',
    fatal: false,
    async run() {
      const ips = await gateway.listIps();
      return {
        details: {
          count: ips.length,
          ips: ips.map((ip) => `${ip.id} ${ip.publicIP}${ip.reverseDNSHostname ? ` (${ip.reverseDNSHostname})` : ''}`),
        },
        produces: { dedicatedIps: ips.map((ip) => ip.publicIP) },
      };
    },
  };

  const createIpPool: StepDefinition = {
    name: STEP_NAMES.CREATE_IP_POOL,
    title: 'Create IP pool',
    scope: 'account',
    requires: ['dedicatedIps'],
    onMissing: 'attempt',
    fatal: false,
    async run(context) {
      const available = context.dedicatedIps ?? (await gateway.listIps()).map((ip) => ip.publicIP);
      const [firstIp] = available;
      if (firstIp === undefined) {
        throw new StepSkip('no dedicated IPs available');
      }
      const pool = await gateway.createIpPool({
        name: `Marketing Pool - ${unixSeconds(now())}`,
        routingStrategy: ROUND_ROBIN,
        ips: [{ publicIP: firstIp }],
      });
      return {
        details: {
          ipPoolId: pool.id,
          name: pool.name,
          routingStrategy: (pool.routingStrategy ?? ROUND_ROBIN) === ROUND_ROBIN ? 'Round Robin' : 'Email Provider',
          ips: (pool.ips ?? []).map((ip) => ip.publicIP),
        },
        produces: { ipPoolId: pool.id },
      };
    },
  };

  const listIpPools: StepDefinition = {
    name: STEP_NAMES.LIST_IP_POOLS,
    title: 'List IP pools',
    scope: 'account',
    requires: [],
    onMissing: 'skip',
    fatal: false,
    async run() {
      const pools = await gateway.listIpPools();
      return {
        details: {
          count: pools.length,
          pools: pools.map((p) => `${p.id} ${p.name} (${(p.ips ?? []).length} IPs)`),
        },
      };
    },
  };

  const steps: StepDefinition[] = [
    listSubAccounts,
    createSubAccount,
    createWebhook,
    ...(settings.extended ? [listWebhooks] : []),
    addDomain,
    listDomains,
    sendTransactionalEmail,
    sendMarketingEmail,
    getMessageDetails,
    subAccountStats,
    aggregateStats,
    accountStats,
    listIps,
    createIpPool,
    ...(settings.extended ? [listIpPools] : []),
  ];

  return Object.freeze(steps.map((step) => Object.freeze(step)));
}
