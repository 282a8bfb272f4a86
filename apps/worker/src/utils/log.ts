/* eslint-disable no-console */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const ORDER: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

function isLogLevel(v: string | undefined): v is LogLevel {
  return ORDER.some((l) => l === v);
}

const envLevel = process.env.WORKER_LOG_LEVEL;
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export type Logger = {
  [K in LogLevel]: (message: string, details?: Record<string, unknown>) => void;
};

/** Scoped console logger: `[scope] message {details}`, filtered by WORKER_LOG_LEVEL. */
export function createLogger(scope: string): Logger {
  const write = (level: LogLevel) => (message: string, details?: Record<string, unknown>) => {
    if (ORDER.indexOf(level) < ORDER.indexOf(threshold)) return;
    const line = `[${scope}] ${message}`;
    const sink = level === 'error' || level === 'fatal' ? console.error : level === 'warn' ? console.warn : console.log;
    if (details) sink(line, details);
    else sink(line);
  };
  return {
    trace: write('trace'),
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    fatal: write('fatal'),
  };
}
