/**
 * Structured Logger
 *
 * Minimal JSON-lines logger with run/step context.
 * Credential-like fields are redacted before anything is written.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  runId?: string;
  step?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(context: LogContext, message: string): void;
  warn(context: LogContext, message: string): void;
  error(context: LogContext, message: string): void;
  debug(context: LogContext, message: string): void;
  child(context: LogContext): Logger;
}

/** Receives one serialized log line. */
export type LogSink = (line: string) => void;

const REDACTED = '[REDACTED]';

/**
 * Matches keys that carry credentials: apiKey, accountApiKey,
 * X-SubAccount-ApiKey, authorization, password, secret, token.
 */
const SENSITIVE_KEY = /api[-_]?key|authorization|password|secret|token/i;

function redact(value: unknown, depth = 0): unknown {
  if (depth > 5 || value === null || typeof value !== 'object') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => redact(item, depth + 1));
  }
  if (value instanceof Error) {
    return value;
  }
  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    out[key] = SENSITIVE_KEY.test(key) ? REDACTED : redact(inner, depth + 1);
  }
  return out;
}

// =============================================================================
// JSON LOGGER IMPLEMENTATION
// =============================================================================

export class JsonLogger implements Logger {
  private context: LogContext;
  private level: LogLevel;
  private sink: LogSink;

  constructor(
    context: LogContext = {},
    level: LogLevel = 'info',
    sink: LogSink = (line) => console.log(line)
  ) {
    this.context = context;
    this.level = level;
    this.sink = sink;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  private log(level: LogLevel, context: LogContext, message: string): void {
    if (!this.shouldLog(level)) return;

    const entry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...context,
    };

    const cleaned: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(entry)) {
      if (value === undefined) continue;
      cleaned[key] = SENSITIVE_KEY.test(key) ? REDACTED : redact(value);
    }

    // Serialize errors
    const error = cleaned.error;
    if (error instanceof Error) {
      cleaned.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    this.sink(JSON.stringify(cleaned));
  }

  info(context: LogContext, message: string): void {
    this.log('info', context, message);
  }

  warn(context: LogContext, message: string): void {
    this.log('warn', context, message);
  }

  error(context: LogContext, message: string): void {
    this.log('error', context, message);
  }

  debug(context: LogContext, message: string): void {
    this.log('debug', context, message);
  }

  child(context: LogContext): Logger {
    return new JsonLogger({ ...this.context, ...context }, this.level, this.sink);
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export function createLogger(
  options?: {
    level?: LogLevel;
    service?: string;
    sink?: LogSink;
  }
): Logger {
  return new JsonLogger(
    { service: options?.service ?? 'esp-orchestrator' },
    options?.level ?? 'info',
    options?.sink
  );
}
