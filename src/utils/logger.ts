/**
 * Logger Abstraction
 *
 * Console-backed logging shared by every pipeline component. Components take
 * an optional `logger` in their deps so tests can capture output.
 *
 * Supports both string messages (simple logging) and structured data objects
 * (JSON lines when LOG_FORMAT=json, for log aggregators).
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Log level for structured logging.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry for production logging.
 */
export interface StructuredLogEntry {
  /** Event type identifier (e.g., 'cycle_complete', 'gate_failed') */
  readonly event: string;
  /** Optional message for human readability */
  readonly message?: string;
  /** Additional structured data */
  readonly [key: string]: unknown;
}

/**
 * Basic logger interface (string-based).
 */
export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug: (message: string) => void;
}

/**
 * Extended logger interface supporting structured logging.
 */
export interface StructuredLogger extends Logger {
  /**
   * Log structured data at the specified level.
   * In JSON mode, outputs one JSON object; otherwise a readable line.
   */
  structured: (level: LogLevel, entry: StructuredLogEntry) => void;
}

/**
 * Context carried by a contextual logger. `correlationId` ties together every
 * line written during one workflow run.
 */
export interface LoggingContext {
  readonly correlationId: string;
  readonly [key: string]: unknown;
}

/**
 * Logger bound to a run context. `child()` derives a logger that shares the
 * correlation id and adds or overrides context values.
 */
export interface ContextualLogger extends StructuredLogger {
  readonly context: LoggingContext;
  child: (extra: Record<string, unknown>) => ContextualLogger;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Whether to output logs as JSON (for production log aggregators).
 * Controlled by LOG_FORMAT environment variable.
 */
const isJsonLogging = (): boolean => process.env.LOG_FORMAT === 'json';

// ============================================================================
// String-Based Logger
// ============================================================================

/**
 * Default logger implementation writing to the console.
 * Methods look up `console` at call time so tests can redirect it.
 */
export const logger: Logger = {
  info: (message: string) => console.log(message),
  warn: (message: string) => console.warn(message),
  error: (message: string) => console.error(message),
  debug: (message: string) => console.log(message),
};

/**
 * Creates a prefixed logger for specific modules.
 *
 * @param prefix - The prefix to add to all log messages
 *
 * @example
 * const log = createPrefixedLogger('[Research]');
 * log.info('Starting research'); // logs: "[Research] Starting research"
 */
export function createPrefixedLogger(prefix: string): Logger {
  return {
    info: (message: string) => logger.info(`${prefix} ${message}`),
    warn: (message: string) => logger.warn(`${prefix} ${message}`),
    error: (message: string) => logger.error(`${prefix} ${message}`),
    debug: (message: string) => logger.debug(`${prefix} ${message}`),
  };
}

// ============================================================================
// Structured Logger
// ============================================================================

/**
 * Formats a structured log entry as a readable string for development.
 */
function formatStructuredEntry(prefix: string, entry: StructuredLogEntry): string {
  const { event, message, ...rest } = entry;
  const dataStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  const msgStr = message ? `: ${message}` : '';
  return `${prefix} [${event}]${msgStr}${dataStr}`;
}

/**
 * Formats a structured log entry as JSON for production.
 */
function formatStructuredJson(prefix: string, level: LogLevel, entry: StructuredLogEntry): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    module: prefix.replace(/[[\]]/g, '').trim(),
    ...entry,
  });
}

function logAtLevel(level: LogLevel, message: string): void {
  switch (level) {
    case 'debug':
      logger.debug(message);
      break;
    case 'info':
      logger.info(message);
      break;
    case 'warn':
      logger.warn(message);
      break;
    case 'error':
      logger.error(message);
      break;
  }
}

/**
 * Creates a structured logger for specific modules.
 *
 * @example
 * const log = createStructuredLogger('[Revision]');
 * log.structured('info', {
 *   event: 'cycle_complete',
 *   revision: 2,
 *   gatePassed: false,
 * });
 */
export function createStructuredLogger(prefix: string): StructuredLogger {
  return {
    ...createPrefixedLogger(prefix),

    structured: (level: LogLevel, entry: StructuredLogEntry): void => {
      const formatted = isJsonLogging()
        ? formatStructuredJson(prefix, level, entry)
        : formatStructuredEntry(prefix, entry);
      logAtLevel(level, formatted);
    },
  };
}

// ============================================================================
// Contextual Logger
// ============================================================================

/**
 * Generates a short, sortable correlation id: base-36 timestamp and a
 * base-36 random suffix joined by a dash.
 */
export function generateCorrelationId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).slice(2, 10).padEnd(8, '0');
  return `${timestamp}-${random}`;
}

/**
 * Creates a logger that stamps every line with the run's correlation id.
 *
 * @example
 * const log = createContextualLogger('[Workflow]', { correlationId, topic });
 * log.info('Starting'); // "[Workflow] [k3j2...-a8f1...] Starting"
 * const reviewLog = log.child({ phase: 'review' });
 */
export function createContextualLogger(prefix: string, context: LoggingContext): ContextualLogger {
  const tag = `${prefix} [${context.correlationId}]`;
  const base = createStructuredLogger(tag);

  return {
    ...base,
    context,
    structured: (level: LogLevel, entry: StructuredLogEntry): void => {
      base.structured(level, { ...entry, correlationId: context.correlationId });
    },
    child: (extra: Record<string, unknown>): ContextualLogger =>
      createContextualLogger(prefix, { ...context, ...extra, correlationId: context.correlationId }),
  };
}
