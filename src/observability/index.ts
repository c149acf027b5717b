/**
 * Observability Module
 *
 * Logger and Metrics hooks injected into every adapter, engine and handler.
 * The defaults write prefixed lines to the console and drop metrics; a host
 * process can pass its own implementations.
 */

export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

export interface Metrics {
  increment(metric: string, tags?: Record<string, string>): void;
  gauge(metric: string, value: number, tags?: Record<string, string>): void;
  timing(metric: string, value: number, tags?: Record<string, string>): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function format(meta: Record<string, unknown> | undefined): string {
  return meta ? JSON.stringify(meta) : '';
}

/**
 * Console logger tagged with the module name
 *
 * Lines look like `[INFO] [scoring] Scoring completed {"firm":"..."}`.
 */
export function createConsoleLogger(module: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (candidate: LogLevel): boolean => LEVEL_ORDER[candidate] >= threshold;

  return {
    info: (msg, meta) => {
      if (enabled('info')) console.log(`[INFO] [${module}] ${msg}`, format(meta));
    },
    warn: (msg, meta) => {
      if (enabled('warn')) console.warn(`[WARN] [${module}] ${msg}`, format(meta));
    },
    error: (msg, meta) => {
      if (enabled('error')) console.error(`[ERROR] [${module}] ${msg}`, format(meta));
    },
    debug: (msg, meta) => {
      if (enabled('debug')) console.debug(`[DEBUG] [${module}] ${msg}`, format(meta));
    },
  };
}

export const noopMetrics: Metrics = {
  increment: () => {},
  gauge: () => {},
  timing: () => {},
};
