/**
 * Redacting Logger Service
 *
 * Tax returns carry identifiers (SSNs, EINs, contact details) that must never
 * reach a log line. Every message and argument is scrubbed before output.
 */

import { config } from '../config.js';

interface Redaction {
  name: string;
  pattern: RegExp;
  replacement: string;
}

// Applied in order to every string that is logged
const REDACTIONS: Redaction[] = [
  { name: 'SSN', pattern: /\b\d{3}-\d{2}-\d{4}\b/g, replacement: '***-**-****' },
  { name: 'EIN', pattern: /\b\d{2}-\d{7}\b/g, replacement: '**-*******' },
  { name: 'Email', pattern: /\b([a-zA-Z0-9._%+-]+)@([a-zA-Z0-9.-]+\.[a-zA-Z]{2,})\b/g, replacement: '***@$2' },
  { name: 'JWT', pattern: /Bearer\s+[A-Za-z0-9\-_]+\.[A-Za-z0-9\-_]+\.[A-Za-z0-9\-_]+/gi, replacement: 'Bearer [REDACTED]' },
  { name: 'JWT', pattern: /eyJ[A-Za-z0-9\-_]+\.[A-Za-z0-9\-_]+\.[A-Za-z0-9\-_]+/g, replacement: '[JWT REDACTED]' }
];

// Object keys whose values are dropped entirely (compared lower-cased)
const REDACTED_KEYS = new Set([
  'ssn',
  'itin',
  'ein',
  'employerein',
  'taxpayername',
  'spousename',
  'dateofbirth',
  'email',
  'phone',
  'address',
  'token',
  'apikey',
  'secret'
]);

const MAX_DEPTH = 10;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

interface LoggerOptions {
  level?: LogLevel;
  enableConsole?: boolean;
  sanitize?: boolean;
}

// Minimal surface the engine's services log through
export interface LogSink {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

class Logger implements LogSink {
  private readonly level: LogLevel;
  private readonly enableConsole: boolean;
  private readonly sanitize: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? config.logLevel;
    this.enableConsole = options.enableConsole ?? true;
    this.sanitize = options.sanitize ?? true;
  }

  private redact(text: string): string {
    if (!this.sanitize) return text;
    return REDACTIONS.reduce((current, { pattern, replacement }) => current.replace(pattern, replacement), text);
  }

  /**
   * Deep copy of a log argument with identifiers removed.
   * Decimals and dates become their string form.
   */
  sanitizeValue(value: unknown, depth = 0): unknown {
    if (!this.sanitize) return value;
    if (depth > MAX_DEPTH) return '[MAX DEPTH]';

    switch (typeof value) {
      case 'string':
        return this.redact(value);
      case 'number':
      case 'boolean':
      case 'undefined':
        return value;
      case 'object':
        break;
      default:
        return String(value);
    }

    if (value === null) return null;

    if (value instanceof Error) {
      return {
        name: value.name,
        message: this.redact(value.message),
        stack: value.stack ? this.redact(value.stack) : undefined
      };
    }
    if (Array.isArray(value)) {
      return value.map(item => this.sanitizeValue(item, depth + 1));
    }
    if (!isPlainObject(value)) {
      return this.redact(String(value));
    }

    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [
        key,
        REDACTED_KEYS.has(key.toLowerCase()) ? '[REDACTED]' : this.sanitizeValue(entry, depth + 1)
      ])
    );
  }

  /**
   * Single output path for every level
   */
  emit(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.enableConsole || LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;

    const prefix = `[${new Date().toISOString()}] [${level.toUpperCase()}]`;
    console[level](prefix, this.redact(message), ...args.map(arg => this.sanitizeValue(arg)));
  }

  debug(message: string, ...args: unknown[]): void {
    this.emit('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.emit('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.emit('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.emit('error', message, args);
  }

  child(context: Record<string, string | number>): ContextLogger {
    return new ContextLogger(this, context);
  }
}

/**
 * Logger bound to a fixed context, rendered as "[key=value ...]" before each message
 */
class ContextLogger implements LogSink {
  private readonly prefix: string;

  constructor(
    private readonly parent: Logger,
    context: Record<string, string | number>
  ) {
    this.prefix = `[${Object.entries(context).map(([key, value]) => `${key}=${value}`).join(' ')}]`;
  }

  debug(message: string, ...args: unknown[]): void {
    this.parent.emit('debug', `${this.prefix} ${message}`, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.parent.emit('info', `${this.prefix} ${message}`, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.parent.emit('warn', `${this.prefix} ${message}`, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.parent.emit('error', `${this.prefix} ${message}`, args);
  }
}

export const logger = new Logger();

export { Logger, ContextLogger };
