// packages/core/src/utils/logger.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** Logger sharing level and sink, with `scope` appended to the prefix. */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  scope?: string;
  /** Where formatted lines go. Defaults to stderr so stdout stays machine-readable. */
  write?: (line: string) => void;
  /** Clock override for deterministic output. */
  now?: () => Date;
}

function formatArg(arg: unknown): string {
  if (typeof arg === 'string') return arg;
  if (arg instanceof Error) return arg.message;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

export function createLogger(level: LogLevel = 'info', options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS[level];
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const now = options.now ?? (() => new Date());

  function log(msgLevel: LogLevel, message: string, args: unknown[]): void {
    if (LOG_LEVELS[msgLevel] < threshold) return;
    const scope = options.scope ? ` [${options.scope}]` : '';
    const prefix = `[${now().toISOString()}] ${msgLevel.toUpperCase()}${scope}:`;
    const rest = args.length > 0 ? ` ${args.map(formatArg).join(' ')}` : '';
    write(`${prefix} ${message}${rest}`);
  }

  return {
    debug: (message, ...args) => log('debug', message, args),
    info: (message, ...args) => log('info', message, args),
    warn: (message, ...args) => log('warn', message, args),
    error: (message, ...args) => log('error', message, args),
    child: (scope) =>
      createLogger(level, {
        ...options,
        scope: options.scope ? `${options.scope}:${scope}` : scope,
      }),
  };
}

/** Logger that drops everything; default for library callers that pass none. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
