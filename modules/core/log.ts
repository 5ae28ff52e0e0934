export type LogLevel = "debug" | "info" | "warn" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  silent: 100,
};

let activeLevel: LogLevel = "info";

export const setLogLevel = (level: LogLevel): void => {
  activeLevel = level;
};

const timestamp = (): string =>
  new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

// stderr, so report output on stdout stays machine-readable.
const emit = (level: LogLevel, message: string, source: string): void => {
  if (LEVEL_RANK[level] < LEVEL_RANK[activeLevel]) return;
  console.error(`${timestamp()} [${source}] ${message}`);
};

export function log(message: string, source = "bicycle-calc"): void {
  emit("info", message, source);
}

export function logWarn(message: string, source = "bicycle-calc"): void {
  emit("warn", message, source);
}

export function logDebug(message: string, source = "bicycle-calc"): void {
  emit("debug", message, source);
}
