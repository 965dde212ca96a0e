/**
 * Tagged stderr logging, e.g. `[render] frame 12 in 84.1ms`.
 */

export type LogLevel = "debug" | "info" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, error: 2 };

export interface LogSink {
  write(chunk: string): unknown;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  error(message: string): void;
}

let threshold: LogLevel = parseLevel(process.env.LOG_LEVEL) ?? "info";

function parseLevel(value: string | undefined): LogLevel | null {
  if (value === "debug" || value === "info" || value === "error") return value;
  return null;
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function createLogger(tag: string, sink: LogSink = process.stderr): Logger {
  const emit = (level: LogLevel, message: string) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    const prefix = level === "error" ? `[${tag}] error: ` : `[${tag}] `;
    sink.write(`${prefix}${message}\n`);
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    error: (message) => emit("error", message),
  };
}
