import { type ThemeColor, isRich, paint } from "../terminal/theme.js";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

const LEVEL_LABEL: Partial<Record<LogLevel, { label: string; color: ThemeColor }>> = {
  error: { label: "error", color: "error" },
  warn: { label: "warn", color: "warn" },
  debug: { label: "debug", color: "muted" },
  trace: { label: "trace", color: "muted" },
};

export type LogSink = {
  write(chunk: string): unknown;
  isTTY?: boolean;
};

export type Logger = {
  readonly level: LogLevel;
  isEnabled(level: LogLevel): boolean;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
  trace(message: string): void;
};

/**
 * Map a `-v` count to a level: none = warn, -v = info, -vv = debug, -vvv = trace.
 */
export function levelFromVerbosity(verbosity: number): LogLevel {
  if (verbosity <= 0) {
    return "warn";
  }
  if (verbosity === 1) {
    return "info";
  }
  if (verbosity === 2) {
    return "debug";
  }
  return "trace";
}

export function createLogger(
  opts: {
    level?: LogLevel;
    stream?: LogSink;
    rich?: boolean;
    env?: NodeJS.ProcessEnv;
  } = {},
): Logger {
  const level = opts.level ?? "warn";
  const stream = opts.stream ?? process.stderr;
  const rich = opts.rich ?? isRich(stream, opts.env);
  const threshold = LEVEL_WEIGHT[level];

  const isEnabled = (candidate: LogLevel) => LEVEL_WEIGHT[candidate] <= threshold;

  const log = (candidate: LogLevel, message: string) => {
    if (!isEnabled(candidate)) {
      return;
    }
    const tag = LEVEL_LABEL[candidate];
    const line = tag
      ? `${paint(rich, tag.color, `${tag.label}:`)} ${candidate === "error" ? message : paint(rich, tag.color, message)}`
      : message;
    stream.write(`${line}\n`);
  };

  return {
    level,
    isEnabled,
    error: (message) => log("error", message),
    warn: (message) => log("warn", message),
    info: (message) => log("info", message),
    debug: (message) => log("debug", message),
    trace: (message) => log("trace", message),
  };
}
