import { inspect } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const MARKER: Record<LogLevel, string> = {
  debug: "·",
  info: "ℹ️",
  warn: "⚠️",
  error: "⛔",
};

type Meta = Record<string, unknown>;

export interface LogEntry {
  ts: number;
  level: LogLevel;
  scope?: string;
  message: string;
  meta?: Meta;
}

export interface Logger {
  child(scope: string): Logger;
  log(level: LogLevel, message: string, meta?: Meta): void;
  debug(message: string, meta?: Meta): void;
  info(message: string, meta?: Meta): void;
  warn(message: string, meta?: Meta): void;
  error(message: string, meta?: Meta): void;
  isLevelEnabled(level: LogLevel): boolean;
}

export type Sink = (entry: LogEntry) => void;

export interface LoggerOptions {
  scope?: string;
  sink?: Sink;
  /** copy entries at or above `minLevel` to a writer (stderr by default) */
  echo?: {
    minLevel?: LogLevel;
    writer?: Sink;
  };
  clock?: () => number;
  /** entries below this level are dropped entirely */
  minLevel?: LogLevel;
}

// DUPSWEEP_DISABLE_LOG_ECHO=1 keeps stderr quiet, e.g. under a test runner
function echoDisabled(): boolean {
  const raw = (process.env.DUPSWEEP_DISABLE_LOG_ECHO ?? "").trim().toLowerCase();
  return raw !== "" && raw !== "0" && raw !== "false";
}

const stderrWriter: Sink = (entry) => {
  if (echoDisabled()) return;
  process.stderr.write(`${formatLogLine(entry)}\n`);
};

function metaText(meta: Meta): string {
  try {
    return JSON.stringify(meta);
  } catch {
    // cycles or BigInt
    return inspect(meta, { depth: 4, breakLength: Infinity });
  }
}

export function formatLogLine({ level, scope, message, meta }: LogEntry): string {
  const parts = [MARKER[level]];
  if (scope) parts.push(`[${scope}]`);
  parts.push(message);
  if (meta && Object.keys(meta).length) parts.push(metaText(meta));
  return parts.join(" ");
}

export class StructuredLogger implements Logger {
  private readonly opts: Required<Omit<LoggerOptions, "scope" | "echo">> & {
    scope?: string;
    echo?: { minLevel: LogLevel; writer: Sink };
  };

  constructor({ scope, sink, echo, clock, minLevel }: LoggerOptions = {}) {
    this.opts = {
      scope,
      sink: sink ?? (() => {}),
      clock: clock ?? Date.now,
      minLevel: minLevel ?? "debug",
      echo: echo?.minLevel
        ? { minLevel: echo.minLevel, writer: echo.writer ?? stderrWriter }
        : undefined,
    };
  }

  child(scope: string): Logger {
    const parent = this.opts.scope;
    return new StructuredLogger({
      ...this.opts,
      scope: parent ? `${parent}.${scope}` : scope,
    });
  }

  log(level: LogLevel, message: string, meta?: Meta): void {
    if (!this.isLevelEnabled(level)) return;
    const entry: LogEntry = {
      ts: this.opts.clock(),
      level,
      scope: this.opts.scope,
      message,
      meta: meta && Object.keys(meta).length ? meta : undefined,
    };
    this.opts.sink(entry);
    const { echo } = this.opts;
    if (echo && RANK[level] >= RANK[echo.minLevel]) echo.writer(entry);
  }

  debug(message: string, meta?: Meta): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Meta): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Meta): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Meta): void {
    this.log("error", message, meta);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return RANK[level] >= RANK[this.opts.minLevel];
  }
}

export class NullLogger implements Logger {
  child(_scope: string): Logger {
    return this;
  }
  log(_level: LogLevel, _message: string, _meta?: Meta): void {}
  debug(_message: string, _meta?: Meta): void {}
  info(_message: string, _meta?: Meta): void {}
  warn(_message: string, _meta?: Meta): void {}
  error(_message: string, _meta?: Meta): void {}
  isLevelEnabled(_level: LogLevel): boolean {
    return false;
  }
}

/** Logs at `minLevel` and above, echoed to stderr. */
export class ConsoleLogger extends StructuredLogger {
  constructor(minLevel: LogLevel = "info", sink?: Sink) {
    super({ echo: { minLevel }, minLevel, sink });
  }
}

export function memorySink(): Sink & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return Object.assign((entry: LogEntry) => void entries.push(entry), {
    entries,
  });
}

export function parseLogLevel(
  raw: string | undefined,
  fallback: LogLevel = "info",
): LogLevel {
  const wanted = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((lvl) => lvl === wanted) ?? fallback;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
