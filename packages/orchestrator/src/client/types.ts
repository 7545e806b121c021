/**
 * ESP API Types
 *
 * Response records are zod schemas so that every payload is decoded once,
 * at the client boundary. Request bodies are plain interfaces.
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// CREDENTIALS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Which API key authenticates a call.
 */
export type CredentialScope = 'account' | 'subAccount';

export const CREDENTIAL_HEADERS: Record<CredentialScope, string> = {
  account: 'X-Account-ApiKey',
  subAccount: 'X-SubAccount-ApiKey',
};

export interface EspCredentials {
  accountApiKey: string;
  subAccountApiKey: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SHARED
// ═══════════════════════════════════════════════════════════════════════════

/** Ids come back as numbers from some endpoints and strings from others. */
const IdSchema = z.union([z.number(), z.string()]).transform((value) => String(value));

export const StatCountersSchema = z.object({
  processed: z.number().nullish(),
  delivered: z.number().nullish(),
  dropped: z.number().nullish(),
  hardBounced: z.number().nullish(),
  softBounced: z.number().nullish(),
  opened: z.number().nullish(),
  clicked: z.number().nullish(),
  unsubscribed: z.number().nullish(),
  spam: z.number().nullish(),
});
export type StatCounters = z.infer<typeof StatCountersSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// SUB-ACCOUNTS
// ═══════════════════════════════════════════════════════════════════════════

export const SubAccountSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  apiKey: z.string().nullish(),
  /** 1 = Plus, anything else = Regular */
  type: z.number().nullish(),
  blocked: z.boolean().nullish(),
  created: z.number().nullish(),
});
export type SubAccount = z.infer<typeof SubAccountSchema>;

export interface CreateSubAccountRequest {
  name: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// WEBHOOKS
// ═══════════════════════════════════════════════════════════════════════════

export const WebhookSchema = z.object({
  id: z.number().int(),
  url: z.string(),
  enabled: z.boolean().nullish(),
});
export type Webhook = z.infer<typeof WebhookSchema>;

/**
 * Event flags select which deliveries the platform posts to the URL.
 */
export interface CreateWebhookRequest {
  url: string;
  enabled: boolean;
  processed: boolean;
  delivered: boolean;
  dropped: boolean;
  softBounced: boolean;
  hardBounced: boolean;
  opened: boolean;
  clicked: boolean;
  unsubscribed: boolean;
  spam: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════
// DOMAINS
// ═══════════════════════════════════════════════════════════════════════════

export const DnsRecordSchema = z.object({
  type: z.string().nullish(),
  host: z.string().nullish(),
  textValue: z.string().nullish(),
});
export type DnsRecord = z.infer<typeof DnsRecordSchema>;

export const DomainSchema = z.object({
  id: IdSchema,
  name: z.string(),
  verified: z.boolean().nullish(),
  dkim: DnsRecordSchema.nullish(),
  returnPath: DnsRecordSchema.nullish(),
  track: DnsRecordSchema.nullish(),
  dmarc: DnsRecordSchema.nullish(),
});
export type Domain = z.infer<typeof DomainSchema>;

export interface CreateDomainRequest {
  name: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// EMAIL
// ═══════════════════════════════════════════════════════════════════════════

export interface EmailAddress {
  email: string;
  name?: string;
}

export interface Recipient extends EmailAddress {
  customFields?: Record<string, string>;
}

export interface EmailMessage {
  from: EmailAddress;
  to: Recipient[];
  subject: string;
  htmlBody: string;
  textBody: string;
  trackOpens: boolean;
  trackClicks: boolean;
  headers?: Record<string, string>;
  groups?: string[];
}

export const SendResultSchema = z.object({
  messageId: z.string(),
  to: z.string().nullish(),
  submittedAt: z.number().nullish(),
  errorCode: z.number().nullish(),
});
export type SendResult = z.infer<typeof SendResultSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// MESSAGES
// ═══════════════════════════════════════════════════════════════════════════

export const MessageSchema = z.object({
  messageId: z.string(),
  accountId: z.number().nullish(),
  subAccountId: z.number().nullish(),
  ipId: z.number().nullish(),
  publicIp: z.string().nullish(),
  localIp: z.string().nullish(),
  emailType: z.string().nullish(),
  submittedAt: z.number().nullish(),
  from: z.object({ email: z.string().nullish(), name: z.string().nullish() }).nullish(),
  to: z.object({ email: z.string().nullish(), name: z.string().nullish() }).nullish(),
  subject: z.string().nullish(),
  ipPool: z.string().nullish(),
  attempt: z.number().nullish(),
});
export type Message = z.infer<typeof MessageSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// STATISTICS
// ═══════════════════════════════════════════════════════════════════════════

export interface DateRange {
  /** YYYY-MM-DD */
  from: string;
  /** YYYY-MM-DD */
  to: string;
}

export const SubAccountStatSchema = z.object({
  date: z.string(),
  stats: StatCountersSchema.nullish(),
});
export type SubAccountStat = z.infer<typeof SubAccountStatSchema>;

export const AccountStatSchema = z.object({
  date: z.string(),
  stat: StatCountersSchema.nullish(),
});
export type AccountStat = z.infer<typeof AccountStatSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// IPS & IP POOLS
// ═══════════════════════════════════════════════════════════════════════════

export const IpSchema = z.object({
  id: z.number().int(),
  publicIP: z.string(),
  reverseDNSHostname: z.string().nullish(),
  created: z.number().nullish(),
});
export type Ip = z.infer<typeof IpSchema>;

export const IpPoolSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  /** 0 = round robin, 1 = email provider strategy */
  routingStrategy: z.number().nullish(),
  ips: z.array(z.object({ publicIP: z.string() })).nullish(),
});
export type IpPool = z.infer<typeof IpPoolSchema>;

export interface CreateIpPoolRequest {
  name: string;
  routingStrategy: number;
  ips: Array<{ publicIP: string }>;
}

// ═══════════════════════════════════════════════════════════════════════════
// GATEWAY CONTRACT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Everything the workflow needs from the ESP.
 * Implementations throw the errors in ./errors.ts.
 */
export interface EspGateway {
  listSubAccounts(): Promise<SubAccount[]>;
  createSubAccount(request: CreateSubAccountRequest): Promise<SubAccount>;

  createWebhook(request: CreateWebhookRequest): Promise<Webhook>;
  listWebhooks(): Promise<Webhook[]>;

  addDomain(request: CreateDomainRequest): Promise<Domain>;
  getDomain(domainId: string): Promise<Domain>;
  listDomains(): Promise<Domain[]>;

  sendEmail(message: EmailMessage): Promise<SendResult[]>;
  getMessage(messageId: string): Promise<Message>;

  getSubAccountStats(subAccountId: number, range: DateRange): Promise<SubAccountStat[]>;
  getAggregateStats(range: DateRange): Promise<StatCounters>;
  getAccountStats(range: DateRange): Promise<AccountStat[]>;

  listIps(): Promise<Ip[]>;
  createIpPool(request: CreateIpPoolRequest): Promise<IpPool>;
  listIpPools(): Promise<IpPool[]>;
}
