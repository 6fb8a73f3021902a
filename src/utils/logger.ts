// Structured console logger for the login/profile service

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',   // gray
  info: '\x1b[34m',    // blue
  warn: '\x1b[33m',    // yellow
  error: '\x1b[31m',   // red
};

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

export interface LoggerOptions {
  level?: LogThreshold;
  sink?: (line: string, data?: LogData) => void;
}

const isThreshold = (value: string): value is LogThreshold => value in LEVEL_ORDER;

/**
 * Resolve the minimum level from LOG_LEVEL, falling back to info
 */
export function resolveLogLevel(raw: string | undefined): LogThreshold {
  const value = raw?.trim().toLowerCase();
  return value && isThreshold(value) ? value : 'info';
}

function formatTimestamp(): string {
  return new Date().toISOString().slice(11, 23);
}

function defaultSink(line: string, data?: LogData): void {
  if (data) {
    console.log(line, data);
  } else {
    console.log(line);
  }
}

export function createLogger(context: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? resolveLogLevel(process.env.LOG_LEVEL)];
  const sink = options.sink ?? defaultSink;

  const log = (level: LogLevel, message: string, data?: LogData): void => {
    if (LEVEL_ORDER[level] < threshold) return;

    const color = LOG_COLORS[level];
    const prefix = `${color}${formatTimestamp()} [${level.toUpperCase()}]${RESET} ${BOLD}${context}${RESET}`;
    sink(`${prefix} ${message}`, data);
  };

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
  };
}
