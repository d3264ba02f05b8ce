import * as fs from "node:fs";
import * as path from "node:path";
import { formatLogTime } from "./scrapers/utils.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LoggerOptions {
  /** Minimum level written to the console and the log file. Default: info */
  level?: LogLevel;
  /** Append every line to this file as well (directory is created on demand) */
  file?: string;
  now?: () => Date;
}

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  child(scope: string): Logger;
}

class ScopedLogger implements Logger {
  private readonly threshold: number;

  constructor(
    private readonly scope: string,
    private readonly options: LoggerOptions
  ) {
    this.threshold = LOG_LEVELS.indexOf(options.level ?? "info");
  }

  debug(msg: string): void {
    this.write("debug", msg);
  }

  info(msg: string): void {
    this.write("info", msg);
  }

  warn(msg: string): void {
    this.write("warn", msg);
  }

  error(msg: string): void {
    this.write("error", msg);
  }

  child(scope: string): Logger {
    return new ScopedLogger(`${this.scope}:${scope}`, this.options);
  }

  private write(level: LogLevel, msg: string): void {
    if (LOG_LEVELS.indexOf(level) < this.threshold) return;

    const line = `[${this.scope}] ${msg}`;
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);

    if (this.options.file) {
      const now = this.options.now?.() ?? new Date();
      const dir = path.dirname(this.options.file);
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
      fs.appendFileSync(
        this.options.file,
        `${formatLogTime(now)} | ${level.toUpperCase()} | ${line}\n`,
        "utf-8"
      );
    }
  }
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  return new ScopedLogger(scope, options);
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Delete `*.log` files in `dir` last modified more than `maxAgeDays` ago.
 * A `maxAgeDays` of 0 keeps everything. Returns the removed paths.
 */
export function pruneLogs(dir: string, maxAgeDays: number, now: Date = new Date()): string[] {
  if (maxAgeDays <= 0 || !fs.existsSync(dir)) return [];

  const cutoff = now.getTime() - maxAgeDays * DAY_MS;
  const removed: string[] = [];
  for (const entry of fs.readdirSync(dir)) {
    if (!entry.endsWith(".log")) continue;
    const file = path.join(dir, entry);
    const stats = fs.statSync(file);
    if (stats.isFile() && stats.mtimeMs < cutoff) {
      fs.unlinkSync(file);
      removed.push(file);
    }
  }
  return removed;
}
