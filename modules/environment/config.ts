import type { LogLevel } from "../core/log";

export type CalculatorConfig = {
  /** Decimal places for reported values; null reports full precision. */
  digits: number | null;
  ambidextrous: boolean;
  logLevel: LogLevel;
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "silent"];

const parseDigits = (raw: string | undefined): number | null => {
  if (!raw?.trim()) return null;
  const parsed = Number(raw.trim());
  if (!Number.isInteger(parsed) || parsed < 0) return null;
  return parsed;
};

const parseBooleanFlag = (raw: string | undefined, defaultValue: boolean): boolean => {
  if (!raw?.trim()) return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (normalized === "1" || normalized === "true") return true;
  if (normalized === "0" || normalized === "false") return false;
  return defaultValue;
};

const parseLogLevel = (raw: string | undefined): LogLevel => {
  const normalized = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? "info";
};

export const readCalculatorConfig = (
  env: Record<string, string | undefined> = typeof process !== "undefined" ? process.env : {},
): CalculatorConfig => ({
  digits: parseDigits(env.BICYCLE_DIGITS),
  ambidextrous: parseBooleanFlag(env.BICYCLE_AMBIDEXTROUS, false),
  logLevel: parseLogLevel(env.BICYCLE_LOG_LEVEL),
});
