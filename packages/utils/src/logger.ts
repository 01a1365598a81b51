export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  namespace: string;
  message: string;
  context?: LogContext;
  ts: number;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Derive a logger whose namespace is `parent:namespace`. */
  child(namespace: string): Logger;
}

export interface LoggerOptions {
  namespace?: string;
  /** Minimal level that reaches the output. Defaults to 'info'. */
  level?: LogLevel;
  output?: (entry: LogEntry) => void;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const defaultOutput = (entry: LogEntry): void => {
  const prefix = entry.namespace ? `[${entry.namespace}] ` : '';
  const line = `${prefix}${entry.message}`;
  const args: unknown[] = entry.context ? [line, entry.context] : [line];
  switch (entry.level) {
    case 'debug':
      console.debug(...args);
      break;
    case 'info':
      console.info(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    case 'error':
      console.error(...args);
      break;
  }
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const namespace = options.namespace ?? '';
  const threshold = LEVEL_WEIGHT[options.level ?? 'info'];
  const output = options.output ?? defaultOutput;

  const emit = (level: LogEntry['level'], message: string, context?: LogContext) => {
    if (LEVEL_WEIGHT[level] < threshold) return;
    const entry: LogEntry = { level, namespace, message, ts: Date.now() };
    if (context !== undefined) entry.context = context;
    output(entry);
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
    child: (child) =>
      createLogger({
        ...options,
        namespace: namespace ? `${namespace}:${child}` : child,
      }),
  };
}

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => noopLogger,
};
