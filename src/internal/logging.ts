/**
 * Leveled logger with pluggable transports.
 *
 * Conversions log at debug level only. Nothing is written unless a level is
 * configured, either with {@link configureLogging} or through the
 * `ATTR_REFLECT_LOG` environment variable.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
  [LogLevel.SILENT]: "SILENT",
};

const LOG_LEVEL_PARSE: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

export const LOG_ENV_VAR = "ATTR_REFLECT_LOG";

export interface LogEntry {
  /** ISO-8601 timestamp */
  timestamp: string;
  level: LogLevel;
  levelName: string;
  message: string;
  context: Record<string, unknown>;
  /** Module that produced the entry */
  package: string;
}

export interface LogTransport {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  /** Entries below this level are discarded. */
  level?: LogLevel;
  /** Defaults to a single {@link ConsoleTransport}. */
  transports?: LogTransport[];
}

let globalConfig: LoggerConfig = {};

/**
 * Sets the logging configuration for every logger that does not carry its
 * own. Takes effect immediately, including for loggers created earlier.
 */
export function configureLogging(config: LoggerConfig): void {
  globalConfig = { ...config };
}

/** Resets the global configuration. Used by tests. */
export function resetLoggingConfig(): void {
  globalConfig = {};
}

/**
 * Parses a level name such as `debug`; undefined for anything else.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (name === undefined) {
    return undefined;
  }
  const key = name.trim().toLowerCase();
  return Object.hasOwn(LOG_LEVEL_PARSE, key) ? LOG_LEVEL_PARSE[key] : undefined;
}

/**
 * Reads the level from {@link LOG_ENV_VAR}, silent when unset or invalid.
 */
export function logLevelFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
): LogLevel {
  return parseLogLevel(env[LOG_ENV_VAR]) ?? LogLevel.SILENT;
}

/**
 * Writes one line per entry to stderr.
 */
export class ConsoleTransport implements LogTransport {
  write(entry: LogEntry): void {
    const ctxKeys = Object.keys(entry.context);
    const ctxStr = ctxKeys.length > 0
      ? " " + ctxKeys.map((k) => `${k}=${JSON.stringify(entry.context[k])}`)
        .join(" ")
      : "";
    process.stderr.write(
      `${entry.timestamp} ${entry.levelName.padEnd(5)} [${entry.package}] ${entry.message}${ctxStr}\n`,
    );
  }
}

/**
 * Keeps entries in memory.
 */
export class MemoryTransport implements LogTransport {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

export class Logger {
  readonly #pkg: string;
  readonly #config: LoggerConfig | undefined;

  constructor(pkg: string, config?: LoggerConfig) {
    this.#pkg = pkg;
    this.#config = config;
  }

  public debug(message: string, context?: Record<string, unknown>): void {
    this.#log(LogLevel.DEBUG, message, context);
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.#log(LogLevel.INFO, message, context);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.#log(LogLevel.WARN, message, context);
  }

  public error(message: string, context?: Record<string, unknown>): void {
    this.#log(LogLevel.ERROR, message, context);
  }

  /** True when entries at the given level would be written. */
  public isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level >= this.#level();
  }

  #level(): LogLevel {
    return this.#config?.level ?? globalConfig.level ?? logLevelFromEnv();
  }

  #log(
    level: LogLevel,
    message: string,
    context: Record<string, unknown> = {},
  ): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      levelName: LOG_LEVEL_NAMES[level],
      message,
      context,
      package: this.#pkg,
    };
    const transports = this.#config?.transports ?? globalConfig.transports ??
      [new ConsoleTransport()];
    for (const transport of transports) {
      transport.write(entry);
    }
  }
}

export function createLogger(pkg: string, config?: LoggerConfig): Logger {
  return new Logger(pkg, config);
}
