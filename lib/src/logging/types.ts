/**
 * Logging Types and Schemas
 *
 * Log levels, entry shape and logger configuration for the ingestion pipeline.
 */

import { z } from 'zod';

// =============================================================================
// Log Levels
// =============================================================================

/**
 * Log level severity (lower number = higher priority)
 */
export const LogLevel = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
  TRACE: 4,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const LogLevelName = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.TRACE]: 'TRACE',
} as const;

export type LogLevelName = (typeof LogLevelName)[keyof typeof LogLevelName];

export const LogLevelSchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
]);

// =============================================================================
// Log Entry
// =============================================================================

export const LogEntrySchema = z.object({
  level: LogLevelSchema,
  message: z.string(),
  timestamp: z.date(),
  /** Structured fields (filename, size, chunk counts; never document content) */
  context: z.record(z.unknown()).optional(),
  error: z
    .object({
      name: z.string(),
      message: z.string(),
      code: z.string().optional(),
      stack: z.string().optional(),
    })
    .optional(),
  /** Emitting component, e.g. "processor:extensions" */
  source: z.string().optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;

// =============================================================================
// Logger Configuration
// =============================================================================

export const LogFormat = {
  TEXT: 'text',
  JSON: 'json',
  COMPACT: 'compact',
  PRETTY: 'pretty',
} as const;

export type LogFormat = (typeof LogFormat)[keyof typeof LogFormat];

export const LogFormatSchema = z.enum(['text', 'json', 'compact', 'pretty']);

export const LoggerConfigSchema = z.object({
  /**
   * Minimum log level to output
   * @default LogLevel.INFO
   */
  level: LogLevelSchema.default(LogLevel.INFO),

  /**
   * Output format
   * @default 'text'
   */
  format: LogFormatSchema.default('text'),

  /** Whether to include timestamps */
  timestamps: z.boolean().default(true),

  /** Whether the pretty format uses ANSI colors */
  colors: z.boolean().default(true),

  /** Source identifier for all logs from this logger */
  source: z.string().optional(),

  /** Whether to write to the console when no custom output is set */
  console: z.boolean().default(true),

  /**
   * Custom output handler (receives formatted log entries)
   */
  output: z
    .function()
    .args(z.string(), LogLevelSchema)
    .returns(z.void())
    .optional(),
});

export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;

export function createDefaultLoggerConfig(overrides?: Partial<LoggerConfig>): LoggerConfig {
  return LoggerConfigSchema.parse(overrides ?? {});
}

/**
 * Read logger settings from the environment.
 *
 * - LOG_LEVEL: error | warn | info | debug | trace (default: info)
 * - LOG_FORMAT: text | json | compact | pretty (default: text)
 * - NO_COLOR: disables colors when set
 */
export function loadLoggerConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Partial<LoggerConfig> {
  const config: Partial<LoggerConfig> = {};

  const level = env['LOG_LEVEL'];
  if (level) {
    config.level = parseLogLevel(level);
  }

  const format = LogFormatSchema.safeParse(env['LOG_FORMAT']?.toLowerCase());
  if (format.success) {
    config.format = format.data;
  }

  if (env['NO_COLOR'] !== undefined) {
    config.colors = false;
  }

  return config;
}

// =============================================================================
// Log Formatting
// =============================================================================

/**
 * ANSI color codes for terminal output
 */
export const LogColors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

export const LogLevelColors: Record<LogLevel, string> = {
  [LogLevel.ERROR]: LogColors.red,
  [LogLevel.WARN]: LogColors.yellow,
  [LogLevel.INFO]: LogColors.blue,
  [LogLevel.DEBUG]: LogColors.cyan,
  [LogLevel.TRACE]: LogColors.gray,
};

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Parse a log level from string, defaulting to INFO
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.trim().toUpperCase()) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'TRACE':
      return LogLevel.TRACE;
    default:
      return LogLevel.INFO;
  }
}

export function getLogLevelName(level: LogLevel): LogLevelName {
  return LogLevelName[level];
}

/**
 * Check if a log level should be output given a minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return level <= minLevel;
}

/**
 * Format an error for logging. Error codes from domain errors are kept.
 */
export function formatError(
  error: unknown
): { name: string; message: string; code?: string; stack?: string } {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      ...(code !== undefined ? { code } : {}),
      ...(error.stack !== undefined ? { stack: error.stack } : {}),
    };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}
