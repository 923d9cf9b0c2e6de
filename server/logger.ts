import type { RelatednessWarning } from "@shared/relatedness-types";
import { config, type LogLevel } from "./config";

const LEVEL_RANK: Record<LogLevel, number> = { silent: 0, warn: 1, info: 2 };

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_RANK[config.logLevel] >= LEVEL_RANK[level];
}

function timestamp(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
}

export function log(message: string, source = "RELATEDNESS"): void {
  if (!enabled("info")) return;
  console.log(`${timestamp()} [${source}] ${message}`);
}

export function logWarning(message: string, source = "RELATEDNESS"): void {
  if (!enabled("warn")) return;
  console.warn(`${timestamp()} [${source}] ${message}`);
}

export function logWarnings(warnings: RelatednessWarning[], source: string): void {
  for (const warning of warnings) {
    logWarning(`${warning.code}: ${warning.message}`, source);
  }
}
