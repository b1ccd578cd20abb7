/**
 * Structured logging for the bot
 *
 * Entries are JSON lines in production and single coloured lines otherwise.
 * Request handlers bind `userId` and `walletAddress` once through `child`,
 * so every entry of one analysis carries them.
 *
 * Set LOG_LEVEL to trace|debug|info|warn|error|fatal and LOG_PRETTY=false to
 * force JSON outside production.
 */

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Severity order (pino numbering) */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

export interface LogContext {
  service?: string;
  userId?: string | number;
  walletAddress?: string;
  [key: string]: unknown;
}

/** Receives each formatted line with the level it was logged at */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  bindings?: LogContext;
  sink?: LogSink;
}

const PRETTY_COLORS: Record<LogLevel, string> = {
  trace: "\x1b[90m",
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  fatal: "\x1b[1;31m",
};

const RESET = "\x1b[0m";

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * LOG_LEVEL, else info in production and debug elsewhere
 */
export function levelFromEnv(source: NodeJS.ProcessEnv = process.env): LogLevel {
  const level = source.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return source.NODE_ENV === "production" ? "info" : "debug";
}

export function prettyFromEnv(source: NodeJS.ProcessEnv = process.env): boolean {
  return source.LOG_PRETTY !== "false" && source.NODE_ENV !== "production";
}

/**
 * Route lines to the console method of matching severity
 */
export const consoleSink: LogSink = (level, line) => {
  if (level === "trace" || level === "debug") {
    console.debug(line);
  } else if (level === "info") {
    console.info(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.error(line);
  }
};

function formatValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

export class Logger {
  readonly level: LogLevel;

  private readonly pretty: boolean;
  private readonly bindings: LogContext;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? levelFromEnv();
    this.pretty = options.pretty ?? prettyFromEnv();
    this.bindings = options.bindings ?? {};
    this.sink = options.sink ?? consoleSink;
  }

  /**
   * Logger that adds `bindings` to every entry; a later `service` wins
   */
  child(bindings: LogContext): Logger {
    return new Logger({
      level: this.level,
      pretty: this.pretty,
      bindings: { ...this.bindings, ...bindings },
      sink: this.sink,
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  trace(msg: string, context?: LogContext): void {
    this.write("trace", msg, context);
  }

  debug(msg: string, context?: LogContext): void {
    this.write("debug", msg, context);
  }

  info(msg: string, context?: LogContext): void {
    this.write("info", msg, context);
  }

  warn(msg: string, context?: LogContext): void {
    this.write("warn", msg, context);
  }

  error(msg: string, context?: LogContext): void {
    this.write("error", msg, context);
  }

  fatal(msg: string, context?: LogContext): void {
    this.write("fatal", msg, context);
  }

  private write(level: LogLevel, msg: string, context: LogContext = {}): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const time = new Date().toISOString();
    const fields: LogContext = { ...this.bindings, ...context };
    const line = this.pretty
      ? this.formatPretty(level, time, msg, fields)
      : JSON.stringify({ level, time, msg, ...fields });
    this.sink(level, line);
  }

  /**
   * `12:00:00.000 INFO  [Telegram] Analysis sent userId=42 cached=false`
   */
  private formatPretty(level: LogLevel, time: string, msg: string, fields: LogContext): string {
    const { service, ...rest } = fields;
    const clock = time.slice(11, 23);
    const tag = typeof service === "string" ? `[${service}] ` : "";
    const pairs = Object.entries(rest)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => `${key}=${formatValue(value)}`);
    const suffix = pairs.length > 0 ? ` ${pairs.join(" ")}` : "";
    const label = level.toUpperCase().padEnd(5);
    return `${clock} ${PRETTY_COLORS[level]}${label}${RESET} ${tag}${msg}${suffix}`;
  }
}

/** Root logger */
export const logger = new Logger({ bindings: { service: "WalletInsightBot" } });

/** One logger per component, created on first use */
export type ServiceName = "chainApi" | "cache" | "analyzer" | "telegram";

const SERVICE_TAGS: Record<ServiceName, string> = {
  chainApi: "ChainAPI",
  cache: "Cache",
  analyzer: "Analyzer",
  telegram: "Telegram",
};

const serviceCache = new Map<ServiceName, Logger>();

function serviceLogger(name: ServiceName): Logger {
  let log = serviceCache.get(name);
  if (!log) {
    log = logger.child({ service: SERVICE_TAGS[name] });
    serviceCache.set(name, log);
  }
  return log;
}

export const serviceLoggers: Readonly<Record<ServiceName, Logger>> = {
  get chainApi() {
    return serviceLogger("chainApi");
  },
  get cache() {
    return serviceLogger("cache");
  },
  get analyzer() {
    return serviceLogger("analyzer");
  },
  get telegram() {
    return serviceLogger("telegram");
  },
};
