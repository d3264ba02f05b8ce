import "dotenv/config";
import type { ScraperConfig } from "./scrapers/interface.js";
import { isLogLevel, type LogLevel } from "./log.js";

export interface GlobalConfig {
  headless: boolean;
  slowMo: number;
  locale: string;
  navigationTimeoutMs: number;
  popupWaitMs: number;
  maxRetries: number;
  retryDelayMs: number;
  maxItems: number;
  dataDir: string;
  logLevel: LogLevel;
  logRetentionDays: number; // 0 keeps every run log
}

export type Env = Record<string, string | undefined>;

function intFromEnv(value: string | undefined, fallback: number, min = 0): number {
  if (value === undefined || !/^\s*\d+\s*$/.test(value)) return fallback;
  const parsed = parseInt(value, 10);
  return parsed >= min ? parsed : fallback;
}

export function loadGlobalConfig(env: Env = process.env): GlobalConfig {
  const logLevel = (env.LOG_LEVEL || "info").toLowerCase();

  return {
    headless: env.HEADLESS !== "false",
    slowMo: intFromEnv(env.SLOW_MO, 0),
    locale: env.LOCALE || "en-US",
    navigationTimeoutMs: intFromEnv(env.NAV_TIMEOUT_MS, 30_000),
    popupWaitMs: intFromEnv(env.POPUP_WAIT_MS, 2_000),
    maxRetries: intFromEnv(env.MAX_RETRIES, 1, 1),
    retryDelayMs: intFromEnv(env.RETRY_DELAY_MS, 5_000),
    maxItems: intFromEnv(env.MAX_ITEMS, 20),
    dataDir: env.DATA_DIR || "data",
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
    logRetentionDays: intFromEnv(env.LOG_RETENTION_DAYS, 7),
  };
}

export function loadScraperConfig(
  scraperName: string,
  global: GlobalConfig,
  env: Env = process.env
): ScraperConfig {
  const override = env[`${scraperName.toUpperCase()}_URL`]?.trim();

  return {
    ...global,
    ...(override ? { urlOverride: override } : {}),
  };
}
