/**
 * Logger Module
 *
 * Structured JSON logging shared by every module. One line per entry:
 * level, module, message, caller metadata and an ISO timestamp.
 * Errors go to stderr, everything else to stdout.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface for observability
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  child(module: string): Logger;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_PRIORITY, value);
}

/**
 * Create a console-backed JSON logger for a module
 */
export function createLogger(module: string, minLevel: LogLevel = 'info'): Logger {
  const write = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) return;

    const line = JSON.stringify({
      level,
      module,
      message,
      ...meta,
      timestamp: new Date().toISOString(),
    });

    if (level === 'error') {
      process.stderr.write(line + '\n');
    } else {
      process.stdout.write(line + '\n');
    }
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
    child: (name) => createLogger(`${module}:${name}`, minLevel),
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  debug: () => { /* no-op */ },
  info: () => { /* no-op */ },
  warn: () => { /* no-op */ },
  error: () => { /* no-op */ },
  child: () => silentLogger,
};

/**
 * Metrics interface for observability
 */
export interface Metrics {
  increment(metric: string, tags?: Record<string, string>): void;
  timing(metric: string, valueMs: number, tags?: Record<string, string>): void;
}

/**
 * Default no-op metrics implementation
 */
export const noopMetrics: Metrics = {
  increment: () => { /* no-op */ },
  timing: () => { /* no-op */ },
};
