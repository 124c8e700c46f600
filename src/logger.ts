import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { inspect } from "node:util";
import { ENV_PREFIX } from "./constants.js";

export type LogLevel = "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const GLYPH: Record<LogLevel, string> = {
  debug: "·",
  info: "ℹ️",
  warn: "⚠️",
  error: "⛔",
};

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
  log(level: LogLevel, message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  isLevelEnabled(level: LogLevel): boolean;
}

/** Receives every entry at or above the logger's level. */
export type Sink = (entry: LogEntry) => void;

export interface LoggerOptions {
  scope?: string;
  sink?: Sink;
  /** stderr echo; entries below `minLevel` are kept off the terminal */
  echo?: { minLevel?: LogLevel; writer?: Sink };
  clock?: () => number;
  minLevel?: LogLevel;
}

export function levelAtOrAbove(threshold: LogLevel, level: LogLevel): boolean {
  return RANK[level] >= RANK[threshold];
}

/** Exact, case-insensitive match against LOG_LEVELS. */
export function parseLogLevel(raw: string): LogLevel | undefined {
  const wanted = raw.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === wanted);
}

function metaText(meta: LogMeta | undefined): string {
  if (!meta) return "";
  try {
    return JSON.stringify(meta);
  } catch {
    // cycles, bigint
    return inspect(meta, { depth: 4, breakLength: Infinity });
  }
}

export function formatLogLine(entry: LogEntry): string {
  const scope = entry.scope ? ` [${entry.scope}]` : "";
  const meta = metaText(entry.meta);
  return (
    `${new Date(entry.ts).toISOString()} ${entry.level.toUpperCase()}${scope} ` +
    `${entry.message}${meta ? ` ${meta}` : ""}`
  );
}

function echoDisabled(): boolean {
  const raw = process.env[`${ENV_PREFIX}DISABLE_LOG_ECHO`]?.trim().toLowerCase();
  return !!raw && raw !== "0" && raw !== "false";
}

const stderrEcho: Sink = (entry) => {
  if (echoDisabled()) return;
  const scope = entry.scope ? `[${entry.scope}] ` : "";
  const line = `${GLYPH[entry.level]} ${scope}${entry.message}`;
  const meta = metaText(entry.meta);
  if (meta) console.error(line, meta);
  else console.error(line);
};

/**
 * Appends one formatted line per entry to `file`.  After the first failed
 * write the error is printed once and later failures are dropped.
 */
export function createFileSink(file: string): Sink {
  mkdirSync(dirname(file), { recursive: true });
  let reported = false;
  return (entry) => {
    try {
      appendFileSync(file, `${formatLogLine(entry)}\n`);
    } catch (err) {
      if (reported) return;
      reported = true;
      console.error(`cannot write log file ${file}:`, err);
    }
  };
}

export class StructuredLogger implements Logger {
  private readonly opts: LoggerOptions & { clock: () => number; minLevel: LogLevel };

  constructor(opts: LoggerOptions = {}) {
    this.opts = { ...opts, clock: opts.clock ?? Date.now, minLevel: opts.minLevel ?? "debug" };
  }

  child(scope: string): Logger {
    const parent = this.opts.scope;
    return new StructuredLogger({ ...this.opts, scope: parent ? `${parent}.${scope}` : scope });
  }

  log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!this.isLevelEnabled(level)) return;
    const { sink, echo, scope, clock } = this.opts;
    const entry: LogEntry = {
      ts: clock(),
      level,
      scope,
      message,
      meta: meta && Object.keys(meta).length ? meta : undefined,
    };
    sink?.(entry);
    if (echo?.minLevel && levelAtOrAbove(echo.minLevel, level)) {
      (echo.writer ?? stderrEcho)(entry);
    }
  }

  debug(message: string, meta?: LogMeta): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.log("error", message, meta);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return levelAtOrAbove(this.opts.minLevel, level);
  }
}

export class NullLogger implements Logger {
  child(): Logger {
    return this;
  }
  log(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  isLevelEnabled(): boolean {
    return false;
  }
}

/** Echoes to stderr from `minLevel` up; `sink` also receives every entry. */
export class ConsoleLogger extends StructuredLogger {
  constructor(minLevel: LogLevel = "info", sink?: Sink) {
    super({ echo: { minLevel }, minLevel, sink });
  }
}

/** The daemon's logger: stderr echo plus an optional log file. */
export function createLogger({
  level = "info",
  logFile,
}: { level?: LogLevel; logFile?: string } = {}): Logger {
  return new ConsoleLogger(level, logFile ? createFileSink(logFile) : undefined);
}
