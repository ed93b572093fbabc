/**
 * Structured Logging
 *
 * Every entry is a service/event pair with optional details.
 * - NEVER log API keys, secrets or signatures
 * - Sensitive fields are dropped and long strings truncated before writing
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  event: string;
  data_type?: string;
  details?: Record<string, unknown>;
  duration_ms?: number;
  error_code?: string;
}

export type LogData = Partial<Omit<LogEntry, 'timestamp' | 'level' | 'service' | 'event'>>;

/**
 * Logging capability handed to every component that reports progress
 */
export interface Logger {
  error(service: string, event: string, data?: LogData): void;
  warn(service: string, event: string, data?: LogData): void;
  info(service: string, event: string, data?: LogData): void;
  debug(service: string, event: string, data?: LogData): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Directory for the JSON-lines log file; console output only when absent */
  logDir?: string;
  console?: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3
};

const SENSITIVE_FIELDS = [
  'apikey', 'api_key', 'secret', 'password', 'token', 'credential',
  'private_key', 'auth', 'authorization', 'signature', 'api-sign', 'nonce'
];

class StructuredLogger implements Logger {
  private readonly level: LogLevel;
  private readonly logFile: string | null;
  private readonly toConsole: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.toConsole = options.console ?? true;
    this.logFile = null;

    if (options.logDir) {
      if (!existsSync(options.logDir)) {
        mkdirSync(options.logDir, { recursive: true });
      }
      this.logFile = join(options.logDir, 'sync.log');
    }
  }

  /**
   * Log an event with automatic sanitization
   */
  log(level: LogLevel, service: string, event: string, data: LogData = {}): void {
    if (LEVEL_RANK[level] > LEVEL_RANK[this.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service,
      event,
      ...data
    };
    if (data.details) {
      entry.details = sanitizeLogData(data.details);
    }

    if (this.logFile) {
      this.writeToFile(this.logFile, entry);
    }

    if (this.toConsole) {
      const line = `[${entry.timestamp}] ${entry.level.toUpperCase()} ${entry.service}:${entry.event}`;
      const suffix = entry.details ? ` ${JSON.stringify(entry.details)}` : '';
      if (level === 'error' || level === 'warn') {
        console.error(line + suffix);
      } else {
        console.log(line + suffix);
      }
    }
  }

  error(service: string, event: string, data?: LogData): void {
    this.log('error', service, event, data);
  }

  warn(service: string, event: string, data?: LogData): void {
    this.log('warn', service, event, data);
  }

  info(service: string, event: string, data?: LogData): void {
    this.log('info', service, event, data);
  }

  debug(service: string, event: string, data?: LogData): void {
    this.log('debug', service, event, data);
  }

  private writeToFile(filePath: string, entry: LogEntry): void {
    try {
      appendFileSync(filePath, `${JSON.stringify(entry)}\n`, 'utf8');
    } catch (error) {
      // Fallback to console if file writing fails
      console.error('Failed to write to log file:', error);
      console.log('LOG:', JSON.stringify(entry));
    }
  }
}

/**
 * Drop sensitive fields and truncate long strings, recursing into objects
 */
export function sanitizeLogData(data: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (isSensitiveField(key)) {
      continue;
    }

    if (typeof value === 'string') {
      sanitized[key] = value.length > 200 ? `${value.substring(0, 200)}...[truncated]` : value;
    } else if (isPlainObject(value)) {
      sanitized[key] = sanitizeLogData(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

function isSensitiveField(fieldName: string): boolean {
  const lower = fieldName.toLowerCase();
  return SENSITIVE_FIELDS.some(field => lower.includes(field));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new StructuredLogger(options);
}

/**
 * Logger that discards everything, for callers that opt out of logging
 */
export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined
};

export { StructuredLogger };
