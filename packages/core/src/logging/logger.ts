/**
 * Structured logger
 *
 * Writes to stderr so stdout stays free for command output, and redacts
 * credentials from every record.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

export interface LoggerOptions {
  /** Lowest level written (default: info) */
  level?: LogLevel;
  format?: LogFormat;
  /** Fields added to every record */
  fields?: Record<string, unknown>;
}

type LogRecord = {
  ts: string;
  level: LogLevel;
  msg: string;
  [key: string]: unknown;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SECRET_KEY_PATTERN =
  /^(password|pass|token|accessToken|apiKey|secret|connectionString|uri|authorization)$/i;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

function redactString(value: string): string {
  return value
    .replace(/\bBearer\s+([A-Za-z0-9._-]{8,})\b/g, 'Bearer [REDACTED]')
    .replace(/([a-z][a-z0-9+.-]*:\/\/[^:\s/]+:)([^@\s/]+)(@)/gi, '$1[REDACTED]$3');
}

/**
 * Copy of a log payload with secret-named keys, bearer tokens and URL
 * passwords replaced by `[REDACTED]`
 */
export function redactSecrets(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === 'string') return redactString(value);
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(redactSecrets);
  if (value instanceof Error) {
    return {
      name: value.name,
      message: redactString(value.message),
      stack: value.stack ? redactString(value.stack) : undefined,
    };
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = SECRET_KEY_PATTERN.test(k) ? '[REDACTED]' : redactSecrets(v);
    }
    return out;
  }
  return String(value);
}

function formatText(record: LogRecord): string {
  const { ts, level, msg, ...fields } = record;
  const fieldPart = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
  return `[${ts}] ${level.toUpperCase()} ${msg}${fieldPart}`;
}

export class Logger {
  private readonly minimum: number;

  constructor(private readonly options: LoggerOptions = {}) {
    this.minimum = LEVEL_ORDER[options.level ?? 'info'];
  }

  /** Logger with the same settings that adds `fields` to every record */
  child(fields: Record<string, unknown>): Logger {
    return new Logger({ ...this.options, fields: { ...this.options.fields, ...fields } });
  }

  log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < this.minimum) return;

    const record = redactSecrets({
      ts: new Date().toISOString(),
      level,
      msg,
      ...this.options.fields,
      ...extra,
    }) as LogRecord;

    const line = this.options.format === 'json' ? JSON.stringify(record) : formatText(record);
    process.stderr.write(`${line}\n`);
  }

  debug(msg: string, extra?: Record<string, unknown>): void {
    this.log('debug', msg, extra);
  }
  info(msg: string, extra?: Record<string, unknown>): void {
    this.log('info', msg, extra);
  }
  warn(msg: string, extra?: Record<string, unknown>): void {
    this.log('warn', msg, extra);
  }
  error(msg: string, extra?: Record<string, unknown>): void {
    this.log('error', msg, extra);
  }
}
