/**
 * Component-tagged console logger for conversion diagnostics.
 *
 * Writes to stderr, apart from the summary table on stdout. The level
 * comes from `LOG_LEVEL`; the CLI's --verbose and --quiet flags override it.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',  // gray
  info: '\x1b[36m',   // cyan
  warn: '\x1b[33m',   // yellow
  error: '\x1b[31m',  // red
};

const RESET = '\x1b[0m';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_PRIORITY, value);
}

const envLevel = process.env.LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'warn';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

function formatMessage(level: LogLevel, component: string, message: string): string {
  const timestamp = new Date().toISOString().substring(11, 23);
  const color = LEVEL_COLORS[level];
  const levelTag = level.toUpperCase().padEnd(5);
  return `${RESET}${timestamp} ${color}${levelTag}${RESET} [${component}] ${message}`;
}

function emit(level: LogLevel, component: string, message: string, data?: unknown): void {
  if (!shouldLog(level)) return;
  const line = formatMessage(level, component, message);
  if (data === undefined) {
    console.error(line);
  } else {
    console.error(line, data);
  }
}

export function createLogger(component: string) {
  return {
    debug: (message: string, data?: unknown) => emit('debug', component, message, data),
    info: (message: string, data?: unknown) => emit('info', component, message, data),
    warn: (message: string, data?: unknown) => emit('warn', component, message, data),
    error: (message: string, data?: unknown) => emit('error', component, message, data),
  };
}
