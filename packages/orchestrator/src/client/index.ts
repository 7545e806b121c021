/**
 * ESP Client Module
 */

export type {
  CredentialScope,
  EspCredentials,
  StatCounters,
  SubAccount,
  CreateSubAccountRequest,
  Webhook,
  CreateWebhookRequest,
  DnsRecord,
  Domain,
  CreateDomainRequest,
  EmailAddress,
  Recipient,
  EmailMessage,
  SendResult,
  Message,
  DateRange,
  SubAccountStat,
  AccountStat,
  Ip,
  IpPool,
  CreateIpPoolRequest,
  EspGateway,
} from './types.js';

export { CREDENTIAL_HEADERS } from './types.js';

export {
  EspApiError,
  MissingCredentialError,
  EspTransportError,
  EspDecodeError,
} from './errors.js';

export type { EspClientConfig } from './esp-client.js';
export { EspApiClient, DEFAULT_BASE_URL } from './esp-client.js';
