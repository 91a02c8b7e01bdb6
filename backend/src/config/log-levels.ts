import type { LogLevel } from "@nestjs/common";

// Most to least severe; a threshold enables itself and everything before it.
const SEVERITY_ORDER: readonly LogLevel[] = ["fatal", "error", "warn", "log", "debug", "verbose"];

const ALIASES: Readonly<Record<string, LogLevel>> = {
  info: "log",
  warning: "warn",
};

const DEFAULT_THRESHOLD: LogLevel = "log";

export interface ResolvedLogLevels {
  levels: LogLevel[];
  threshold: LogLevel;
  /** False when a non-empty `logging.level` matched nothing and the default applied. */
  recognised: boolean;
}

function enabledUpTo(threshold: LogLevel): LogLevel[] {
  return SEVERITY_ORDER.slice(0, SEVERITY_ORDER.indexOf(threshold) + 1);
}

export function resolveLogLevels(level: unknown): ResolvedLogLevels {
  const name = typeof level === "string" ? level.trim().toLowerCase() : "";
  const threshold = ALIASES[name] ?? SEVERITY_ORDER.find((candidate) => candidate === name);
  if (!threshold) {
    return {levels: enabledUpTo(DEFAULT_THRESHOLD), threshold: DEFAULT_THRESHOLD, recognised: name.length === 0};
  }
  return {levels: enabledUpTo(threshold), threshold, recognised: true};
}
