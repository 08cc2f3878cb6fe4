import { LOG_LEVELS, loadSettings, type LogLevel } from "../config/settings.js";

export type { LogLevel };
export type LogFields = Record<string, unknown>;

export interface LogRecord {
  level: LogLevel;
  logger: string;
  message: string;
  fields?: LogFields;
  at: Date;
}

export interface LogSink {
  write(record: LogRecord): void;
}

export interface Logger {
  readonly name: string;
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** Progress lines (step started / finished); `info` unless LOG_STEPS=0. */
  step(message: string, fields?: LogFields): void;
}

export const COLOR = {
  reset: "\x1b[0m",
  gray: (s: string) => `\x1b[90m${s}${COLOR.reset}`,
  red: (s: string) => `\x1b[31m${s}${COLOR.reset}`,
  cyan: (s: string) => `\x1b[36m${s}${COLOR.reset}`,
  green: (s: string) => `\x1b[32m${s}${COLOR.reset}`,
  yellow: (s: string) => `\x1b[33m${s}${COLOR.reset}`,
  magenta: (s: string) => `\x1b[35m${s}${COLOR.reset}`,
};

export const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

const LEVEL_LABEL: Record<LogLevel, string> = {
  debug: COLOR.gray("debug"),
  info: COLOR.cyan("info "),
  warn: COLOR.yellow("warn "),
  error: COLOR.red("error"),
};

export function consoleSink(): LogSink {
  return {
    write(record) {
      const fields = record.fields && Object.keys(record.fields).length ? ` ${COLOR.gray(safeJson(record.fields))}` : "";
      const line = `${COLOR.gray(record.at.toISOString())} ${LEVEL_LABEL[record.level]} ${COLOR.magenta(`[${record.logger}]`)} ${record.message}${fields}`;
      if (record.level === "error") console.error(line);
      else if (record.level === "warn") console.warn(line);
      else console.log(line);
    },
  };
}

/** Keeps records in memory; used by tests and by callers that ship logs elsewhere. */
export function memorySink(): LogSink & { records: LogRecord[] } {
  const records: LogRecord[] = [];
  return {
    records,
    write(record) {
      records.push(record);
    },
  };
}

interface LoggingState {
  level: LogLevel;
  quiet: boolean;
  logSteps: boolean;
  sink: LogSink;
}

const boot = loadSettings();
const state: LoggingState = {
  level: boot.logLevel,
  quiet: boot.quiet,
  logSteps: boot.logSteps,
  sink: consoleSink(),
};

export function configureLogging(options: Partial<LoggingState>): void {
  Object.assign(state, options);
}

const loggers = new Map<string, Logger>();

/** Idempotent: the same name always yields the same logger instance. */
export function getLogger(name: string): Logger {
  const existing = loggers.get(name);
  if (existing) return existing;

  const emit = (level: LogLevel, message: string, fields?: LogFields) => {
    if (state.quiet || LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(state.level)) return;
    state.sink.write({ level, logger: name, message, fields, at: new Date() });
  };
  const logger: Logger = {
    name,
    debug: (message, fields) => emit("debug", message, fields),
    info: (message, fields) => emit("info", message, fields),
    warn: (message, fields) => emit("warn", message, fields),
    error: (message, fields) => emit("error", message, fields),
    step: (message, fields) => emit(state.logSteps ? "info" : "debug", message, fields),
  };
  loggers.set(name, logger);
  return logger;
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}
