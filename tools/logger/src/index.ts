type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

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
}

interface ConsoleLoggerOptions {
  /**
   * Lowest level that reaches the console (default: 'info')
   */
  level?: LogLevel;
}

const noop: LogFn = () => {};

/**
 * Build a Logger that writes to the console, dropping calls below `level`.
 */
function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LOG_LEVEL_ORDER[options.level ?? 'info'];
  const pick = (level: LogLevel, fn: LogFn): LogFn =>
    LOG_LEVEL_ORDER[level] >= threshold ? fn : noop;

  return new Logger({
    debug: pick('debug', (...args) => console.debug(...args)),
    info: pick('info', (...args) => console.info(...args)),
    warn: pick('warn', (...args) => console.warn(...args)),
    error: pick('error', (...args) => console.error(...args)),
  });
}

export { Logger, createConsoleLogger };
export type { ConsoleLoggerOptions, LoggerMethods, LogFn, LogLevel };
