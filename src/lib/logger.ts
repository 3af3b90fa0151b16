/**
 * Release Radar: Logger
 *
 * Structured logging on top of console.
 * JSON lines in production, one readable line per entry elsewhere.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LevelSetting = LogLevel | 'silent';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
  child: (defaultContext: LogContext) => Logger;
}

const LOG_LEVELS: Record<LevelSetting, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLevelSetting(value: string): value is LevelSetting {
  return value in LOG_LEVELS;
}

// Read on every call so LOG_LEVEL can change after import (tests, CLI flags)
function currentLevel(): number {
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLevelSetting(raw) ? LOG_LEVELS[raw] : LOG_LEVELS.info;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= currentLevel();
}

function formatEntry(entry: LogEntry): string {
  if (process.env.NODE_ENV === 'production') {
    return JSON.stringify(entry);
  }

  const { timestamp, level, message, context } = entry;
  const levelStr = level.toUpperCase().padEnd(5);
  const time = timestamp.split('T')[1]?.split('.')[0] ?? timestamp;

  let output = `${time} ${levelStr} ${message}`;

  if (context && Object.keys(context).length > 0) {
    output += ` ${JSON.stringify(context)}`;
  }

  return output;
}

function log(level: LogLevel, message: string, context?: LogContext): void {
  if (!shouldLog(level)) return;

  const formatted = formatEntry({
    timestamp: new Date().toISOString(),
    level,
    message,
    context,
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

function createLogger(defaultContext: LogContext = {}): Logger {
  const withDefaults = (context?: LogContext): LogContext | undefined =>
    Object.keys(defaultContext).length > 0 ? { ...defaultContext, ...context } : context;

  return {
    debug: (message, context) => log('debug', message, withDefaults(context)),
    info: (message, context) => log('info', message, withDefaults(context)),
    warn: (message, context) => log('warn', message, withDefaults(context)),
    error: (message, context) => log('error', message, withDefaults(context)),
    child: (childContext) => createLogger({ ...defaultContext, ...childContext }),
  };
}

export const logger: Logger = createLogger();

/**
 * Log how long an operation took, at debug level.
 */
export async function timeOperation<T>(
  name: string,
  operation: () => Promise<T>,
  log: Logger = logger
): Promise<T> {
  const start = performance.now();

  try {
    return await operation();
  } finally {
    log.debug(`${name} completed`, { durationMs: Math.round(performance.now() - start) });
  }
}
