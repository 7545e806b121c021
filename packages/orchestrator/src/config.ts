/**
 * Configuration
 *
 * Read once from the environment at process start, validated with zod and
 * frozen. Environment values win over the built-in defaults; blank values
 * count as unset.
 */

import { z } from 'zod';
import { DEFAULT_BASE_URL } from './client/esp-client.js';
import type { CredentialScope, EspCredentials } from './client/types.js';
import type { LogLevel } from './utils/logger.js';
import { DEPENDENT_STEP_NAMES, ESP_STEP_NAMES, PipelineSettings } from './workflows/esp-pipeline.js';
import { DEPENDENCY_POLICIES, DependencyPolicy } from './workflows/types.js';

export type EnvSource = Record<string, string | undefined>;

export type MetricsMode = 'none' | 'console';

export interface EspDemoConfig {
  credentials: EspCredentials;
  baseUrl: string;
  requestTimeoutMs: number;
  pipeline: PipelineSettings;
  /** Step name → policy replacing the step's own onMissing */
  dependencyPolicies: Record<string, DependencyPolicy>;
  metrics: MetricsMode;
  logLevel: LogLevel;
}

export const DEFAULT_SETTINGS = {
  fromEmail: 'sender@example.com',
  fromName: 'Example Sender',
  toEmail: 'recipient@example.com',
  domainName: 'example.com',
  webhookUrl: 'https://webhook.example.com/esp-events',
  statsWindowDays: 7,
  requestTimeoutMs: 30_000,
} as const;

export class EnvConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'EnvConfigError';
  }
}

// =============================================================================
// SCHEMA
// =============================================================================

const LOG_LEVEL_VALUES = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];
/** Largest delay setTimeout honours; longer ones fire after 1ms */
const MAX_TIMER_DELAY_MS = 2_147_483_647;
const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const BOOLEAN_VALUES = ['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'] as const;

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const text = (fallback: string) => z.preprocess(blankToUndefined, z.string().default(fallback));

const flag = z
  .preprocess(
    (value) => (typeof value === 'string' ? blankToUndefined(value.trim().toLowerCase()) : value),
    z.enum(BOOLEAN_VALUES).default('false')
  )
  .transform((value) => TRUE_VALUES.has(value));

function isStepName(value: string): boolean {
  return ESP_STEP_NAMES.some((name) => name === value);
}

function hasDependencies(value: string): boolean {
  return DEPENDENT_STEP_NAMES.some((name) => name === value);
}

function isPolicy(value: string): value is DependencyPolicy {
  return DEPENDENCY_POLICIES.some((policy) => policy === value);
}

/**
 * "add-domain:skip,sub-account-stats:attempt"
 */
const dependencyPolicies = z.preprocess(blankToUndefined, z.string().default('')).transform((raw, ctx) => {
  const policies: Record<string, DependencyPolicy> = {};
  for (const entry of raw.split(',').map((part) => part.trim()).filter((part) => part !== '')) {
    const [step = '', policy = ''] = entry.split(':').map((part) => part.trim());
    if (!isStepName(step)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown step "${step}"` });
      continue;
    }
    if (!hasDependencies(step)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `step "${step}" has no dependencies to apply a policy to` });
      continue;
    }
    if (!isPolicy(policy)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `policy for "${step}" must be one of ${DEPENDENCY_POLICIES.join(', ')}`,
      });
      continue;
    }
    policies[step] = policy;
  }
  return policies;
});

const EnvSchema = z.object({
  ACCOUNT_API_KEY: text(''),
  SUBACCOUNT_API_KEY: text(''),
  ESP_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_BASE_URL)),
  ESP_FROM_EMAIL: text(DEFAULT_SETTINGS.fromEmail),
  ESP_FROM_NAME: text(DEFAULT_SETTINGS.fromName),
  ESP_TO_EMAIL: text(DEFAULT_SETTINGS.toEmail),
  ESP_DOMAIN_NAME: text(DEFAULT_SETTINGS.domainName),
  ESP_WEBHOOK_URL: text(DEFAULT_SETTINGS.webhookUrl),
  ESP_FALLBACK_SUB_ACCOUNT_ID: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
  ESP_STATS_WINDOW_DAYS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).max(90).default(DEFAULT_SETTINGS.statsWindowDays)
  ),
  ESP_REQUEST_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().max(MAX_TIMER_DELAY_MS).default(DEFAULT_SETTINGS.requestTimeoutMs)
  ),
  ESP_EXTENDED_PIPELINE: flag,
  ESP_DEPENDENCY_POLICIES: dependencyPolicies,
  ESP_METRICS: z.preprocess(blankToUndefined, z.enum(['none', 'console']).default('none')),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? blankToUndefined(value.trim().toLowerCase()) : value),
    z.enum(LOG_LEVEL_VALUES).default('info')
  ),
});

// =============================================================================
// LOADING
// =============================================================================

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const inner of Object.values(value)) {
    if (inner !== null && typeof inner === 'object' && !Object.isFrozen(inner)) {
      deepFreeze(inner);
    }
  }
  return Object.freeze(value);
}

export function loadConfigFromEnv(env: EnvSource = process.env): Readonly<EspDemoConfig> {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`
    );
    throw new EnvConfigError(
      `Invalid environment configuration\n${issues.map((issue) => `  • ${issue}`).join('\n')}`,
      issues
    );
  }

  const vars = result.data;
  const config: EspDemoConfig = {
    credentials: {
      accountApiKey: vars.ACCOUNT_API_KEY,
      subAccountApiKey: vars.SUBACCOUNT_API_KEY,
    },
    baseUrl: vars.ESP_BASE_URL,
    requestTimeoutMs: vars.ESP_REQUEST_TIMEOUT_MS,
    pipeline: {
      fromEmail: vars.ESP_FROM_EMAIL,
      fromName: vars.ESP_FROM_NAME,
      toEmail: vars.ESP_TO_EMAIL,
      domainName: vars.ESP_DOMAIN_NAME,
      webhookUrl: vars.ESP_WEBHOOK_URL,
      fallbackSubAccountId: vars.ESP_FALLBACK_SUB_ACCOUNT_ID,
      statsWindowDays: vars.ESP_STATS_WINDOW_DAYS,
      extended: vars.ESP_EXTENDED_PIPELINE,
    },
    dependencyPolicies: vars.ESP_DEPENDENCY_POLICIES,
    metrics: vars.ESP_METRICS,
    logLevel: vars.LOG_LEVEL,
  };

  return deepFreeze(config);
}

/**
 * Scopes whose API key is empty. Calls in these scopes fail as Unauthorized.
 */
export function missingCredentials(credentials: EspCredentials): CredentialScope[] {
  const missing: CredentialScope[] = [];
  if (credentials.accountApiKey.trim() === '') missing.push('account');
  if (credentials.subAccountApiKey.trim() === '') missing.push('subAccount');
  return missing;
}
