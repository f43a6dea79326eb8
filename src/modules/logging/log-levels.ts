/**
 * Structured Log Levels: follows RFC 5424 / OpenTelemetry severity conventions.
 *
 * Levels (ascending severity):
 *   TRACE → DEBUG → INFO → WARN → ERROR → FATAL → OFF
 *
 * Use cases:
 *   TRACE : Raw detail: parsed ticket fields, directory request bodies.
 *   DEBUG : Operational detail: field dispatch, group classification, seat counts.
 *   INFO  : Significant provisioning events: user created, group added, license assigned.
 *   WARN  : Recorded step failures: group not addable, seats exhausted, manager not found.
 *   ERROR : Failed remote operations: transport faults on any directory call.
 *   FATAL : Run-ending faults: unresolvable principal name, creation failed.
 *   OFF   : Suppress all log output.
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

/** String → enum mapping (case-insensitive). */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) return LogLevel.INFO;
  const upper = value.toUpperCase().trim();
  // Look up named key; typeof check avoids numeric enum reverse-mapping ('0' → 'TRACE')
  const mapped: unknown = LogLevel[upper as keyof typeof LogLevel];
  if (typeof mapped === 'number') return mapped;
  const num = Number(upper);
  if (!isNaN(num) && num >= (LogLevel.TRACE as number) && num <= (LogLevel.OFF as number)) return num;
  return LogLevel.INFO;
}

export function logLevelName(level: LogLevel): string {
  return LogLevel[level] ?? 'UNKNOWN';
}

/**
 * Log categories allow filtering by subsystem.
 */
export enum LogCategory {
  /** Ticket parsing and record building */
  TICKET = 'ticket',
  /** Org policy evaluation (groups, licenses) */
  POLICY = 'policy',
  /** Directory gateway calls */
  DIRECTORY = 'directory',
  /** Group classification and membership */
  GROUP = 'group',
  /** License seat checks and assignment */
  LICENSE = 'license',
  /** Provisioning state machine */
  ORCHESTRATOR = 'orchestrator',
  /** Configuration loading */
  CONFIG = 'config',
  /** General / uncategorized */
  GENERAL = 'general',
}

export interface LogConfig {
  /** Global minimum log level (default: INFO, can be overridden by LOG_LEVEL env var). */
  globalLevel: LogLevel;

  /**
   * Per-category level overrides.
   * Example: { 'group': LogLevel.TRACE, 'directory': LogLevel.WARN }
   */
  categoryLevels: Partial<Record<LogCategory, LogLevel>>;

  /** Include stack traces in ERROR/FATAL output (default: true). */
  includeStackTraces: boolean;

  /** Maximum payload size to log in bytes (default: 8KB). Larger values are truncated. */
  maxPayloadSizeBytes: number;

  /** Output format: 'json' for structured, 'pretty' for human-readable. */
  format: 'json' | 'pretty';
}

/** Build default log configuration from environment variables. */
export function buildDefaultLogConfig(): LogConfig {
  const isProd = process.env.NODE_ENV === 'production';
  return {
    globalLevel: parseLogLevel(process.env.LOG_LEVEL),
    categoryLevels: parseCategoryLevels(process.env.LOG_CATEGORY_LEVELS),
    includeStackTraces: process.env.LOG_INCLUDE_STACKS !== 'false',
    maxPayloadSizeBytes: Number(process.env.LOG_MAX_PAYLOAD_SIZE) || 8192,
    format: isProd ? 'json' : parseLogFormat(process.env.LOG_FORMAT),
  };
}

function parseLogFormat(raw: string | undefined): LogConfig['format'] {
  return raw?.trim().toLowerCase() === 'json' ? 'json' : 'pretty';
}

function isLogCategory(value: string): value is LogCategory {
  return (Object.values(LogCategory) as string[]).includes(value);
}

/**
 * Parse LOG_CATEGORY_LEVELS env var.
 * Format: "group=TRACE,directory=WARN"
 */
export function parseCategoryLevels(raw: string | undefined): Partial<Record<LogCategory, LogLevel>> {
  if (!raw) return {};
  const result: Partial<Record<LogCategory, LogLevel>> = {};
  for (const pair of raw.split(',')) {
    const [cat, level] = pair.trim().split('=');
    if (cat && level) {
      const category = cat.trim();
      if (isLogCategory(category)) {
        result[category] = parseLogLevel(level.trim());
      }
    }
  }
  return result;
}
