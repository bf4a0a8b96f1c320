/**
 * Logger configuration using Pino
 * Structured logging with configurable levels and a compact pretty format
 */
import pino from 'pino';
import pretty from 'pino-pretty';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

interface LoggerOptions {
  level: LogLevel;
  pretty: boolean;
}

const levelSymbols: Record<string, string> = {
  fatal: '💀',
  error: '❌',
  warn: '⚠️',
  info: 'ℹ️',
  debug: '🔍',
  trace: '📝',
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function readLevel(): LogLevel {
  const level = process.env['LOG_LEVEL']?.toLowerCase();
  return isLogLevel(level) ? level : 'info';
}

const defaultOptions: LoggerOptions = {
  level: readLevel(),
  pretty: process.env['LOG_PRETTY'] !== 'false',
};

function formatValue(value: unknown, maxLen: number = 40): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') {
    return value.length > maxLen ? value.substring(0, maxLen) + '...' : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) {
    return value.length <= 3 ? value.map((v) => formatValue(v, 30)).join(', ') : `${value.length} items`;
  }
  if (typeof value === 'object') {
    return `{${Object.keys(value).length} fields}`;
  }
  return String(value);
}

// Fields shown first in pretty output
const priorityKeys = ['ruleId', 'collection', 'scope', 'zone', 'page', 'totalPages', 'count', 'name'];

function formatContext(log: Record<string, unknown>, excludeKeys: string[]): string {
  const keys = Object.keys(log)
    .filter((k) => !excludeKeys.includes(k))
    .sort((a, b) => {
      const aIdx = priorityKeys.indexOf(a);
      const bIdx = priorityKeys.indexOf(b);
      if (aIdx >= 0 && bIdx >= 0) return aIdx - bIdx;
      if (aIdx >= 0) return -1;
      if (bIdx >= 0) return 1;
      return 0;
    });

  const parts: string[] = [];
  for (const key of keys.slice(0, 5)) {
    const formatted = formatValue(log[key]);
    if (formatted) {
      parts.push(`${key}=${formatted}`);
    }
  }

  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

function createPrettyStream() {
  return pretty({
    colorize: true,
    translateTime: 'HH:MM:ss',
    ignore: 'app',
    hideObject: true,
    messageFormat: (log: Record<string, unknown>, messageKey: string) => {
      const level = String(log['level']);
      const service = log['service'];
      const symbol = levelSymbols[level] ?? 'ℹ️';

      let output = typeof service === 'string' ? `[${service}] ` : '';
      output += String(log[messageKey] ?? '');
      output += formatContext(log, ['level', 'time', 'app', 'service', messageKey, 'err', 'error', 'stack']);

      return `${symbol} ${output}`;
    },
    customPrettifiers: {
      level: () => '',
    },
  });
}

function createLogger(options: LoggerOptions = defaultOptions): pino.Logger {
  const baseConfig: pino.LoggerOptions = {
    level: options.level,
    base: {
      app: 'firewall-resources',
      pid: undefined,
      hostname: undefined,
    },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (options.pretty) {
    return pino(baseConfig, createPrettyStream());
  }

  return pino(baseConfig);
}

export const logger = createLogger();

/**
 * Set the log level at runtime
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(bindings: Record<string, unknown>): pino.Logger {
  return logger.child(bindings);
}

export default logger;
