type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

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
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Create a logger that writes to the console, dropping messages below `level`.
 *
 * debug/info go to stdout, warn/error to stderr.
 */
function createConsoleLogger(
  level: LogLevel = 'info',
  sink: Pick<Console, 'debug' | 'info' | 'warn' | 'error'> = console,
): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const pick = (candidate: LogLevel, fn: LogFn): LogFn =>
    LOG_LEVELS.indexOf(candidate) >= threshold ? fn : noop;

  return new Logger({
    debug: pick('debug', (...args) => sink.debug(...args)),
    info: pick('info', (...args) => sink.info(...args)),
    warn: pick('warn', (...args) => sink.warn(...args)),
    error: pick('error', (...args) => sink.error(...args)),
  });
}

export { Logger, LOG_LEVELS, createConsoleLogger, isLogLevel };
export type { LoggerMethods, LogFn, LogLevel };
