/**
 * Environment configuration, read once at load time.
 *
 * RELATEDNESS_WORKERS    bootstrap worker pool size (default: cpus - 2, at least 1)
 * RELATEDNESS_LOG_LEVEL  silent | warn | info (default: info, silent under NODE_ENV=test)
 */

import { z } from "zod";

export type LogLevel = "silent" | "warn" | "info";

export interface RelatednessConfig {
  workers: number | undefined;
  logLevel: LogLevel;
}

const logLevelSchema = z.enum(["silent", "warn", "info"]);
const workersSchema = z.coerce.number().int().positive();

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelatednessConfig {
  const defaultLevel: LogLevel = env.NODE_ENV === "test" ? "silent" : "info";

  let workers: number | undefined;
  if (env.RELATEDNESS_WORKERS) {
    const parsed = workersSchema.safeParse(env.RELATEDNESS_WORKERS);
    if (parsed.success) {
      workers = parsed.data;
    } else {
      console.warn(`[CONFIG] Invalid RELATEDNESS_WORKERS="${env.RELATEDNESS_WORKERS}" (must be positive integer), using default`);
    }
  }

  let logLevel: LogLevel = defaultLevel;
  if (env.RELATEDNESS_LOG_LEVEL) {
    const parsed = logLevelSchema.safeParse(env.RELATEDNESS_LOG_LEVEL.toLowerCase());
    if (parsed.success) {
      logLevel = parsed.data;
    } else {
      console.warn(`[CONFIG] Invalid RELATEDNESS_LOG_LEVEL="${env.RELATEDNESS_LOG_LEVEL}", using ${defaultLevel}`);
    }
  }

  return { workers, logLevel };
}

export const config: RelatednessConfig = loadConfig();
