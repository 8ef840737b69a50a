export enum LogLevel {
  TRACE = "trace",
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

type LogFormatter = (message: LogMessage) => string;

export interface Logger {
  trace: (message: string) => void;
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;

  getLevel: () => LogLevel;
  with: () => LoggerContext;

  isTraceEnabled: () => boolean;
  isDebugEnabled: () => boolean;
}

export interface LogMessage {
  level: LogLevel;
  message: string;
  ts?: string;
  [key: string]: unknown;
}

export interface LoggerContext {
  str: (key: string, value?: string) => LoggerContext;
  num: (key: string, value?: number) => LoggerContext;
  bool: (key: string, value?: boolean) => LoggerContext;
  any: (key: string, value?: unknown, stringify?: boolean) => LoggerContext;
  array: (key: string, value?: unknown[]) => LoggerContext;
  error: (e: unknown) => LoggerContext;
  logger: () => Logger;
}

type LogContextValues = Record<string, unknown>;

export interface LoggerSettings {
  format: "json" | "simple";
  timestamp: boolean;
  contextLevels: LogLevel[];
}

const ALL_LEVELS = [
  LogLevel.TRACE,
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
];

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const lower = value.trim().toLowerCase();
  return ALL_LEVELS.find((l) => l === lower);
}

export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerSettings {
  let contextLevels = ALL_LEVELS;
  const contextLevelsEnv = env.GLOBAL_LOG_CONTEXT_FOR_LEVELS;
  if (contextLevelsEnv) {
    contextLevels = contextLevelsEnv
      .split(",")
      .map((l) => parseLogLevel(l))
      .filter((l): l is LogLevel => l !== undefined);
  }
  return {
    format: env.GLOBAL_LOG_FORMAT === "simple" ? "simple" : "json",
    timestamp: Boolean(env.GLOBAL_LOG_TIMESTAMP),
    contextLevels,
  };
}

export class SensorLogger implements Logger {
  protected _loglevel: LogLevel;
  protected _ctx: LogContextValues;
  private readonly settings: LoggerSettings;
  private formatter: LogFormatter;

  private emptyMethod(_message: string): void {}

  public trace: (message: string) => void;
  public debug: (message: string) => void;
  public info: (message: string) => void;
  public warn: (message: string) => void;
  public error: (message: string) => void;

  constructor(level?: LogLevel, ctx?: LogContextValues, settings?: LoggerSettings) {
    this.settings = settings ?? settingsFromEnv();
    this.formatter =
      this.settings.format === "simple"
        ? this.formatSimple.bind(this)
        : this.formatJson.bind(this);

    this._loglevel = level ?? LogLevel.INFO;
    this._ctx = ctx ?? {};

    this.trace = (message: string) =>
      console.log(this.render(message, LogLevel.TRACE));
    this.debug = (message: string) =>
      console.debug(this.render(message, LogLevel.DEBUG));
    this.info = (message: string) =>
      console.info(this.render(message, LogLevel.INFO));
    this.warn = (message: string) =>
      console.warn(this.render(message, LogLevel.WARN));
    this.error = (message: string) =>
      console.error(this.render(message, LogLevel.ERROR));

    switch (this._loglevel) {
      case LogLevel.DEBUG:
        this.trace = this.emptyMethod;
        break;

      case LogLevel.INFO:
        this.trace = this.debug = this.emptyMethod;
        break;

      case LogLevel.WARN:
        this.trace = this.debug = this.info = this.emptyMethod;
        break;

      case LogLevel.ERROR:
        this.trace = this.debug = this.info = this.warn = this.emptyMethod;
        break;
    }
  }

  isTraceEnabled() {
    return this._loglevel === LogLevel.TRACE;
  }

  isDebugEnabled() {
    return this._loglevel === LogLevel.DEBUG || this.isTraceEnabled();
  }

  getLevel() {
    return this._loglevel;
  }

  // console.trace is not used on purpose: it prints a stack for every line
  private render(message: string, level: LogLevel): string {
    if (this.settings.contextLevels.includes(level)) {
      return this.formatter({ ...this._ctx, message, level });
    }
    return this.formatter({ message, level });
  }

  setCtx(key: string, value?: unknown) {
    this._ctx[key] = value;
  }

  with(): SensorLogContext {
    const logger = new SensorLogger(this._loglevel, { ...this._ctx }, this.settings);
    return new SensorLogContext(logger);
  }

  formatJson(message: LogMessage): string {
    if (this.settings.timestamp) {
      message.ts = new Date().toISOString();
    }
    return safeStringify(message);
  }

  formatSimple(message: LogMessage): string {
    const { message: text, level, error, ...rest } = message;

    let ts = "";
    if (this.settings.timestamp) {
      ts = ` [${new Date().toISOString()}] `;
    }

    const stack = errorStack(error);
    if (!stack && error !== undefined) rest.error = error;
    const ctx = Object.keys(rest).length > 0 ? "\n" + safeStringify(rest) + "\n" : "";

    switch (level) {
      case LogLevel.TRACE:
        return `\x1b[37m ${level.toUpperCase()} \x1b[0m ${ts} ${text}${ctx}`;
      case LogLevel.DEBUG:
        return `\x1b[36m ${level.toUpperCase()} \x1b[0m ${ts} ${text}${ctx}`;
      case LogLevel.INFO:
        return `\x1b[32m ${level.toUpperCase()} \x1b[0m  ${ts} ${text}${ctx}`;
      case LogLevel.WARN:
        return `\x1b[33m ${level.toUpperCase()} \x1b[0m  ${ts} ${text}${ctx}`;
      case LogLevel.ERROR:
        return `\x1b[31m ${level.toUpperCase()} \x1b[0m ${ts} ${text}${ctx}${
          stack ? "\n" + prettyFormatStack(stack) : ""
        }`;
      default:
        return `UNKNOWN: ${text}`;
    }
  }
}

export class SensorLogContext implements LoggerContext {
  private _logger: SensorLogger;

  constructor(logger: SensorLogger) {
    this._logger = logger;
  }

  str(key: string, value?: string) {
    return this.any(key, value);
  }

  num(key: string, value?: number) {
    return this.any(key, value);
  }

  bool(key: string, value?: boolean) {
    return this.any(key, value);
  }

  array(key: string, value?: unknown[]) {
    return this.any(key, value);
  }

  error(e: unknown) {
    if (e instanceof Error) {
      const details: Record<string, unknown> = {
        message: e.message,
        stack: e.stack,
      };
      if ("code" in e && typeof e.code === "string") {
        details.code = e.code;
      }
      return this.any("error", details);
    } else if (typeof e === "string") {
      return this.str("error", e);
    } else {
      return this.any("error", e);
    }
  }

  any(key: string, value?: unknown, stringify?: boolean) {
    if (stringify) {
      this._logger.setCtx(key, safeStringify(value));
    } else {
      this._logger.setCtx(key, value);
    }

    return this;
  }

  logger() {
    return this._logger;
  }
}

export function getLogger(env: NodeJS.ProcessEnv = process.env): SensorLogger {
  return new SensorLogger(
    parseLogLevel(env.GLOBAL_LOG_LEVEL) ?? LogLevel.INFO,
    {},
    settingsFromEnv(env)
  );
}

function errorStack(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "stack" in error) {
    return typeof error.stack === "string" ? error.stack : undefined;
  }
  return undefined;
}

function prettyFormatStack(stack: string) {
  return stack
    .split("\n")
    .map((line) => line.replace(/\s+at\s+/, "  at "))
    .join("\n");
}

function safeStringify(obj: unknown): string {
  return JSON.stringify(obj, (_k, v: unknown) =>
    typeof v === "bigint" ? Number(v) : v
  );
}
