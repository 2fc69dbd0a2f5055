import { Injectable } from '@nestjs/common';
import {
  LogLevel,
  LogCategory,
  LogConfig,
  buildDefaultLogConfig,
  logLevelName,
  parseLogLevel,
} from './log-levels';

/**
 * A single structured log entry.
 * In JSON format mode these are emitted as one JSON line per entry.
 */
export interface StructuredLogEntry {
  /** ISO-8601 timestamp */
  timestamp: string;
  /** Log severity */
  level: string;
  /** Functional category */
  category: string;
  /** Human-readable message */
  message: string;
  /** Resource type the entry concerns (User, Group, ...) */
  resourceType?: string;
  /** Error information */
  error?: {
    message: string;
    name?: string;
    stack?: string;
  };
  /** Additional structured data (rule, path, document excerpts) */
  data?: Record<string, unknown>;
}

/** Receives every emitted entry; the default sink writes to the console. */
export type LogSink = (level: LogLevel, entry: StructuredLogEntry, config: LogConfig) => void;

/**
 * ScimLogger: Structured, leveled logger for the SCIM engine.
 *
 * - RFC 5424-inspired log levels: TRACE → DEBUG → INFO → WARN → ERROR → FATAL
 * - Per-category and global level configuration, changeable at runtime
 * - JSON structured output for production; pretty human-readable for dev
 * - Payload truncation and secret redaction
 *
 * Usage:
 *   this.scimLogger.debug(LogCategory.SCIM_CODEC, 'Decode rejected', { rule: 'unknownAttribute', path: 'nickname' });
 *   this.scimLogger.trace(LogCategory.SCIM_CODEC, 'Decoding document', { body: text });
 */
@Injectable()
export class ScimLogger {
  private config: LogConfig;
  private sink: LogSink = consoleSink;

  constructor() {
    this.config = buildDefaultLogConfig();
  }

  // ─── Configuration ────────────────────────────────────────────────

  getConfig(): LogConfig {
    return { ...this.config, categoryLevels: { ...this.config.categoryLevels } };
  }

  setGlobalLevel(level: LogLevel | string | number): void {
    this.config.globalLevel = parseLogLevel(level);
  }

  setCategoryLevel(category: LogCategory, level: LogLevel | string | number): void {
    this.config.categoryLevels[category] = parseLogLevel(level);
  }

  /** Redirect output, e.g. to collect entries in tests. */
  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  // ─── Level-specific methods ───────────────────────────────────────

  trace(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, category, message, data);
  }

  debug(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, category, message, data);
  }

  info(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, category, message, data);
  }

  warn(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, category, message, data);
  }

  error(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, category, message, data, this.formatError(error));
  }

  /** Whether full documents may be attached to TRACE entries. */
  get includePayloads(): boolean {
    return this.config.includePayloads;
  }

  /** Check if a log at the given level + category should be emitted. */
  isEnabled(level: LogLevel, category?: LogCategory): boolean {
    if (level === LogLevel.OFF) return false;
    const categoryLevel = category === undefined ? undefined : this.config.categoryLevels[category];
    if (categoryLevel !== undefined) {
      return level >= categoryLevel;
    }
    return level >= this.config.globalLevel;
  }

  // ─── Core logging logic ───────────────────────────────────────────

  private log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: Record<string, unknown>,
    errorInfo?: StructuredLogEntry['error'],
  ): void {
    if (!this.isEnabled(level, category)) return;

    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level: logLevelName(level),
      category,
      message,
    };

    if (data && typeof data.resourceType === 'string') {
      entry.resourceType = data.resourceType;
    }

    if (errorInfo) {
      entry.error = errorInfo;
      if (!this.config.includeStackTraces) {
        delete entry.error.stack;
      }
    }

    if (data) {
      entry.data = this.sanitizeData(data);
    }

    this.sink(level, entry, this.config);
  }

  private formatError(error: unknown): StructuredLogEntry['error'] | undefined {
    if (!error) return undefined;
    if (error instanceof Error) {
      return {
        message: error.message,
        name: error.name,
        stack: error.stack,
      };
    }
    return { message: String(error) };
  }

  /** Sanitize data: truncate large payloads, redact secrets. */
  private sanitizeData(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    const max = this.config.maxPayloadSizeBytes;
    for (const [key, value] of Object.entries(data)) {
      if (/secret|password|token|authorization|bearer|jwt/i.test(key)) {
        result[key] = '[REDACTED]';
        continue;
      }

      if (typeof value === 'string' && value.length > max) {
        result[key] = value.slice(0, max) + `...[truncated ${value.length - max}B]`;
      } else if (typeof value === 'object' && value !== null) {
        const serialized = JSON.stringify(value);
        result[key] = serialized.length > max ? serialized.slice(0, max) + '...[truncated]' : value;
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

/** Console output: JSON lines or pretty text depending on `config.format`. */
export const consoleSink: LogSink = (level, entry, config) => {
  const line = config.format === 'json' ? JSON.stringify(entry) : formatPretty(level, entry, config);
  if (config.format === 'json') {
    const stream = level >= LogLevel.WARN ? process.stderr : process.stdout;
    stream.write(line + '\n');
    return;
  }
  switch (level) {
    case LogLevel.TRACE:
    case LogLevel.DEBUG:
      // eslint-disable-next-line no-console
      console.debug(line);
      break;
    case LogLevel.INFO:
      // eslint-disable-next-line no-console
      console.log(line);
      break;
    case LogLevel.WARN:
      // eslint-disable-next-line no-console
      console.warn(line);
      break;
    default:
      // eslint-disable-next-line no-console
      console.error(line);
  }
};

/** Pretty human-readable line for development. */
export function formatPretty(level: LogLevel, entry: StructuredLogEntry, config: LogConfig): string {
  const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
  const lvl = colorize(level, entry.level.padEnd(5));
  const cat = entry.category.padEnd(15);
  const rt = entry.resourceType ? ` [${entry.resourceType}]` : '';
  let line = `${ts} ${lvl} ${cat}${rt} ${entry.message}`;

  if (entry.error) {
    line += ` | ERROR: ${entry.error.message}`;
    if (entry.error.stack && config.includeStackTraces) {
      line += `\n${entry.error.stack}`;
    }
  }

  if (entry.data && Object.keys(entry.data).length > 0) {
    if (level <= LogLevel.DEBUG) {
      line += `\n  ${JSON.stringify(entry.data, null, 2).replace(/\n/g, '\n  ')}`;
    } else {
      const compact = JSON.stringify(entry.data);
      if (compact.length <= 200) {
        line += ` | ${compact}`;
      }
    }
  }
  return line;
}

function colorize(level: LogLevel, text: string): string {
  if (!process.stdout.isTTY) return text;
  switch (level) {
    case LogLevel.TRACE: return `\x1b[90m${text}\x1b[0m`;  // gray
    case LogLevel.DEBUG: return `\x1b[36m${text}\x1b[0m`;  // cyan
    case LogLevel.INFO:  return `\x1b[32m${text}\x1b[0m`;  // green
    case LogLevel.WARN:  return `\x1b[33m${text}\x1b[0m`;  // yellow
    case LogLevel.ERROR: return `\x1b[31m${text}\x1b[0m`;  // red
    case LogLevel.FATAL: return `\x1b[35m${text}\x1b[0m`;  // magenta
    default: return text;
  }
}
