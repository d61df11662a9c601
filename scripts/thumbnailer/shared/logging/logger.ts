// Minimal leveled logger
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const order: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

export function levelFromEnv(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

export function formatLine(scope: string, message: string, meta?: LogMeta): string {
  const head = `[${scope}] ${message}`;
  if (!meta || Object.keys(meta).length === 0) return head;
  return `${head} ${JSON.stringify(meta)}`;
}

/**
 * Creates a scoped logger. Without an explicit level the threshold follows LOG_LEVEL at
 * call time, so tests and the CLI can change it after import.
 */
export function createLogger(scope: string, level?: LogLevel): Logger {
  function write(l: LogLevel, message: string, meta?: LogMeta) {
    const threshold = order[level ?? levelFromEnv()];
    if (order[l] < threshold) return;
    const line = formatLine(scope, message, meta);
    // eslint-disable-next-line no-console
    if (l === 'debug') console.log(line);
    else console[l](line);
  }
  return {
    debug: (m, meta) => write('debug', m, meta),
    info: (m, meta) => write('info', m, meta),
    warn: (m, meta) => write('warn', m, meta),
    error: (m, meta) => write('error', m, meta),
  };
}

export const log = {
  cli: createLogger('cli'),
  config: createLogger('config'),
  fetch: createLogger('fetch'),
  resolve: createLogger('resolve'),
  image: createLogger('image'),
  publish: createLogger('publish'),
  progress: createLogger('progress'),
} as const;
