/**
 * Module logging for the library layers
 *
 * The catalog, geocoder and HTTP client each log through a `Logger` bound to
 * their module name (and, for a catalog import, the city and type being
 * imported). Every logger writes to the one active `LogWriter`:
 * - by default a console writer (LOG_LEVEL gating, pretty lines in
 *   development, JSON lines in production)
 * - under the CLI, its `CLILogger`, so --json and --verbose govern library
 *   output too
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Destination for library log lines; `CLILogger` satisfies it
 */
export interface LogWriter {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
}

export interface ConsoleWriterOptions {
  readonly level?: LogLevel;
  readonly pretty?: boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * Console writer honouring LOG_LEVEL and NODE_ENV unless told otherwise
 */
export function createConsoleWriter(options: ConsoleWriterOptions = {}): LogWriter {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  const minLevel = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
  const pretty = options.pretty ?? process.env.NODE_ENV !== 'production';

  const write = (level: LogLevel, message: string, metadata?: LogMetadata): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

    const timestamp = new Date().toISOString();
    const fields = metadata ?? {};
    const line = pretty
      ? `[${timestamp}] ${level.toUpperCase()} ${message} ${JSON.stringify(fields)}`
      : JSON.stringify({ timestamp, level, message, ...fields });

    console[level](line);
  };

  return {
    debug: (message, metadata) => write('debug', message, metadata),
    info: (message, metadata) => write('info', message, metadata),
    warn: (message, metadata) => write('warn', message, metadata),
    error: (message, metadata) => write('error', message, metadata),
  };
}

let activeWriter: LogWriter = createConsoleWriter();

/**
 * Route all library logging to `writer`
 */
export function setLogWriter(writer: LogWriter): void {
  activeWriter = writer;
}

/**
 * Restore the default console writer
 */
export function resetLogWriter(): void {
  activeWriter = createConsoleWriter();
}

/**
 * Logger that stamps bound fields onto every entry
 *
 * The writer is looked up per call, so loggers created at import time follow
 * a writer installed later.
 */
export class Logger {
  constructor(private readonly fields: LogMetadata) {}

  /**
   * Logger with extra bound fields; call-site metadata wins on conflicts
   */
  child(fields: LogMetadata): Logger {
    return new Logger({ ...this.fields, ...fields });
  }

  debug(message: string, metadata?: LogMetadata): void {
    activeWriter.debug(message, this.with(metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    activeWriter.info(message, this.with(metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    activeWriter.warn(message, this.with(metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    activeWriter.error(message, this.with(metadata));
  }

  private with(metadata?: LogMetadata): LogMetadata {
    return metadata ? { ...this.fields, ...metadata } : this.fields;
  }
}

export function createLogger(context: { readonly module: string }): Logger {
  return new Logger({ module: context.module });
}
