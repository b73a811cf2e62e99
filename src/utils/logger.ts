/**
 * Structured logging utility
 * One logger per layer; wallet secrets are redacted before anything is printed.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  layer: string;
  message: string;
  data?: Record<string, unknown>;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// Matched case-insensitively as substrings of the data key
const SENSITIVE_KEYS = ['passphrase', 'mnemonic', 'seed', 'privatekey', 'secret', 'xprv'];

export const REDACTED = '[REDACTED]';

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

export class Logger {
  private readonly minLevel: LogLevel;
  private readonly layer: string;

  constructor(layer: string, minLevel: LogLevel = 'info') {
    this.layer = layer;
    this.minLevel = minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  private formatEntry(entry: LogEntry): string {
    const { timestamp, level, layer, message, data } = entry;
    const prefix = `[${timestamp}] [${level.toUpperCase().padEnd(5)}] [${layer}]`;

    if (data && Object.keys(data).length > 0) {
      return `${prefix} ${message} ${JSON.stringify(redact(data), jsonReplacer)}`;
    }

    return `${prefix} ${message}`;
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const formatted = this.formatEntry({
      timestamp: new Date().toISOString(),
      level,
      layer: this.layer,
      message,
      data,
    });

    switch (level) {
      case 'error':
        console.error(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      default:
        console.log(formatted);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Replace the value of every sensitive key, recursing into nested records and arrays.
 */
export function redact(data: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.some((sk) => lowerKey.includes(sk))) {
      result[key] = REDACTED;
    } else if (Array.isArray(value)) {
      result[key] = value.map((item) => (isRecord(item) ? redact(item) : item));
    } else if (isRecord(value)) {
      result[key] = redact(value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

// bigint has no JSON form; amounts in base units are logged as strings
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Create a logger for a specific layer
 */
export function createLogger(layer: string): Logger {
  const level = process.env['LOG_LEVEL'];
  return new Logger(layer, isLogLevel(level) ? level : 'info');
}
