import { isoFromMs, nowMs } from "./util.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export type LogSink = (level: Exclude<LogLevel, "silent">, line: string) => void;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type Logger = {
  readonly level: LogLevel;
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields, err?: unknown): void;
};

const consoleSink: LogSink = (level, line) => {
  if (level === "warn" || level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
};

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const value = (raw ?? "").trim().toLowerCase();
  if (value === "debug" || value === "info" || value === "warn" || value === "error" || value === "silent") {
    return value;
  }
  return fallback;
}

export function createLogger(options: { level?: LogLevel; sink?: LogSink; clock?: () => number } = {}): Logger {
  const level = options.level ?? parseLogLevel(process.env.FOCUSLINE_LOG_LEVEL);
  const sink = options.sink ?? consoleSink;
  const clock = options.clock ?? nowMs;

  const write = (lineLevel: Exclude<LogLevel, "silent">, message: string, fields?: LogFields) => {
    if (LEVEL_RANK[lineLevel] < LEVEL_RANK[level]) return;
    const suffix = formatFields(fields);
    sink(lineLevel, `[${isoFromMs(clock())}] [${lineLevel.toUpperCase()}] ${message}${suffix}`);
  };

  return {
    level,
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields, err) => {
      const detail = err instanceof Error ? err.message : err === undefined ? undefined : String(err);
      write("error", detail ? `${message} | ${detail}` : message, fields);
    },
  };
}

function formatFields(fields?: LogFields): string {
  if (!fields) return "";
  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    parts.push(`${key}=${value}`);
  }
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

export const silentLogger: Logger = createLogger({ level: "silent" });
