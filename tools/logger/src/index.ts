type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const noop: LogFn = () => {};

class Logger implements LoggerMethods {
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods) {
    this.debug = methods.debug;
    this.info = methods.info;
    this.warn = methods.warn;
    this.error = methods.error;
  }

  /**
   * Returns a logger that drops every call below `level`.
   */
  withLevel(level: LogLevel): Logger {
    const threshold = LEVEL_ORDER[level];
    const pick = (method: Exclude<LogLevel, 'silent'>): LogFn =>
      LEVEL_ORDER[method] >= threshold ? this[method] : noop;

    return new Logger({
      debug: pick('debug'),
      info: pick('info'),
      warn: pick('warn'),
      error: pick('error'),
    });
  }
}

/**
 * Console-backed logger. Diagnostics go to stderr so that stdout stays free
 * for command output.
 */
function createConsoleLogger(level: LogLevel = 'info'): Logger {
  return new Logger({
    debug: (...args) => console.error(...args),
    info: (...args) => console.error(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
  }).withLevel(level);
}

export { Logger, createConsoleLogger };
export type { LoggerMethods, LogFn, LogLevel };
