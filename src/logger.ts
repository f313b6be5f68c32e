import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { inspect } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export type LogMeta = Record<string, unknown>;

export interface LogEntry {
  ts: number;
  level: LogLevel;
  scope?: string;
  message: string;
  meta?: LogMeta;
}

export interface Logger {
  child(scope: string): Logger;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export type Sink = (entry: LogEntry) => void;

export interface LoggerOptions {
  scope?: string;
  sink?: Sink;
  /** Entries at or above this level are also written by `writer` (stderr by default). */
  echo?: { minLevel: LogLevel; writer?: Sink };
  clock?: () => number;
}

export function isLogLevel(raw: string): raw is LogLevel {
  return LOG_LEVELS.some((level) => level === raw);
}

function echoDisabled(): boolean {
  const raw = (process.env.IMGLEDGER_DISABLE_LOG_ECHO ?? "").trim().toLowerCase();
  return raw !== "" && raw !== "0" && raw !== "false";
}

const MARKS: Record<LogLevel, string> = {
  debug: "·",
  info: "ℹ️",
  warn: "⚠️",
  error: "⛔",
};

function toJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return inspect(value, { depth: 4 });
  }
}

const stderrWriter: Sink = ({ level, scope, message, meta }) => {
  if (echoDisabled()) return;
  const line = `${MARKS[level]} ${scope ? `[${scope}] ` : ""}${message}`;
  if (meta) {
    console.error(line, toJson(meta));
  } else {
    console.error(line);
  }
};

/** Builds `LogEntry` values and hands them to a sink, optionally echoing them. */
export class StructuredLogger implements Logger {
  constructor(private readonly opts: LoggerOptions = {}) {}

  child(scope: string): Logger {
    const parent = this.opts.scope;
    return new StructuredLogger({
      ...this.opts,
      scope: parent ? `${parent}.${scope}` : scope,
    });
  }

  debug(message: string, meta?: LogMeta): void {
    this.emit("debug", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.emit("info", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.emit("warn", message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.emit("error", message, meta);
  }

  private emit(level: LogLevel, message: string, meta?: LogMeta): void {
    const { scope, sink, echo, clock } = this.opts;
    const entry: LogEntry = {
      ts: clock ? clock() : Date.now(),
      level,
      scope,
      message,
      meta: meta && Object.keys(meta).length ? meta : undefined,
    };
    sink?.(entry);
    if (echo && RANK[level] >= RANK[echo.minLevel]) {
      (echo.writer ?? stderrWriter)(entry);
    }
  }
}

export class NullLogger implements Logger {
  child(_scope: string): Logger {
    return this;
  }
  debug(_message: string, _meta?: LogMeta): void {}
  info(_message: string, _meta?: LogMeta): void {}
  warn(_message: string, _meta?: LogMeta): void {}
  error(_message: string, _meta?: LogMeta): void {}
}

/** Echoes to stderr at `minLevel` and above; `sink` (if any) sees every entry. */
export class ConsoleLogger extends StructuredLogger {
  constructor(minLevel: LogLevel = "info", sink?: Sink) {
    super({ sink, echo: { minLevel } });
  }
}

/**
 * Append one JSON line per entry to `file`, dropping entries below
 * `minLevel`. Writes are synchronous so a fatal error is on disk before exit.
 */
export function createFileSink(file: string, minLevel: LogLevel = "debug"): Sink {
  mkdirSync(dirname(file), { recursive: true });
  return (entry) => {
    if (RANK[entry.level] < RANK[minLevel]) return;
    appendFileSync(file, toJson(entry) + "\n", "utf8");
  };
}

export function createLogger({
  level = "info",
  file,
}: {
  level?: LogLevel;
  file?: string | null;
} = {}): Logger {
  return new ConsoleLogger(level, file ? createFileSink(file, level) : undefined);
}
