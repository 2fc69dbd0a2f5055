/**
 * Structured Log Levels: follows RFC 5424 / OpenTelemetry severity conventions.
 *
 * Levels (ascending severity):
 *   TRACE → DEBUG → INFO → WARN → ERROR → FATAL → OFF
 *
 * Use cases:
 *   TRACE: Full JSON documents going through the codec.
 *   DEBUG: Rejected documents and failed validations with rule and path.
 *   INFO: Registry built, module configured.
 *   WARN: Recoverable anomalies: preserved unknown attributes.
 *   ERROR: Failures that are not input problems.
 *   FATAL: Unusable configuration.
 *   OFF: Suppress all log output.
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  FATAL = 5,
  OFF = 6,
}

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  TRACE: LogLevel.TRACE,
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  ERROR: LogLevel.ERROR,
  FATAL: LogLevel.FATAL,
  OFF: LogLevel.OFF,
};

const LEVELS_BY_NUMBER: readonly LogLevel[] = Object.values(LEVELS_BY_NAME);

/** String or number → enum mapping (case-insensitive). Unknown input falls back to INFO. */
export function parseLogLevel(value: string | number | undefined): LogLevel {
  if (value === undefined || value === '') return LogLevel.INFO;
  const upper = String(value).toUpperCase().trim();
  const named = LEVELS_BY_NAME[upper];
  if (named !== undefined) return named;
  const numeric = LEVELS_BY_NUMBER.find((level) => String(level) === upper);
  return numeric ?? LogLevel.INFO;
}

export function logLevelName(level: LogLevel): string {
  return LogLevel[level] ?? 'UNKNOWN';
}

/**
 * Log categories allow filtering by subsystem.
 */
export enum LogCategory {
  /** JSON encode/decode */
  SCIM_CODEC = 'scim.codec',
  /** Resource validation */
  SCIM_VALIDATION = 'scim.validation',
  /** Schema registry and discovery documents */
  SCIM_SCHEMA = 'scim.schema',
}

const CATEGORIES: readonly LogCategory[] = Object.values(LogCategory);

export function parseLogCategory(value: string): LogCategory | undefined {
  return CATEGORIES.find((category) => category === value);
}

/**
 * Runtime-configurable log configuration: global level plus per-category overrides.
 */
export interface LogConfig {
  /** Global minimum log level (default: INFO, can be overridden by LOG_LEVEL env var). */
  globalLevel: LogLevel;

  /**
   * Per-category level overrides.
   * Example: { 'scim.codec': LogLevel.TRACE }
   */
  categoryLevels: Partial<Record<LogCategory, LogLevel>>;

  /** Include full JSON documents in TRACE output (default: true in dev, false in prod). */
  includePayloads: boolean;

  /** Include stack traces in ERROR/FATAL output (default: true). */
  includeStackTraces: boolean;

  /** Maximum payload size to log in bytes (default: 8KB). Larger values are truncated. */
  maxPayloadSizeBytes: number;

  /** Output format: 'json' for structured (production), 'pretty' for human-readable (dev). */
  format: 'json' | 'pretty';
}

/** Build default log configuration from environment variables. */
export function buildDefaultLogConfig(env: NodeJS.ProcessEnv = process.env): LogConfig {
  const isProd = env.NODE_ENV === 'production';
  return {
    globalLevel: parseLogLevel(env.LOG_LEVEL),
    categoryLevels: parseCategoryLevels(env.LOG_CATEGORY_LEVELS),
    includePayloads: env.LOG_INCLUDE_PAYLOADS === 'true' || (!isProd && env.LOG_INCLUDE_PAYLOADS !== 'false'),
    includeStackTraces: env.LOG_INCLUDE_STACKS !== 'false',
    maxPayloadSizeBytes: Number(env.LOG_MAX_PAYLOAD_SIZE) || 8192,
    format: isProd || env.LOG_FORMAT === 'json' ? 'json' : 'pretty',
  };
}

/**
 * Parse LOG_CATEGORY_LEVELS env var.
 * Format: "scim.codec=TRACE,scim.validation=WARN"
 */
export function parseCategoryLevels(raw: string | undefined): Partial<Record<LogCategory, LogLevel>> {
  if (!raw) return {};
  const result: Partial<Record<LogCategory, LogLevel>> = {};
  for (const pair of raw.split(',')) {
    const [cat, level] = pair.trim().split('=');
    if (cat && level) {
      const category = parseLogCategory(cat.trim());
      if (category) {
        result[category] = parseLogLevel(level.trim());
      }
    }
  }
  return result;
}
