import { appendFileSync, closeSync, openSync } from "node:fs";
import { join } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  seq: number;
  ts: number;
  level: LogLevel;
  msg: string;
  [field: string]: unknown;
}

/**
 * Diagnostic logger. Writes one JSON object per line to `path`.
 *
 * Writes are synchronous so the last entries survive an abrupt exit.
 * Without a path every call is a no-op; nothing ever goes to the terminal,
 * which belongs to the pager.
 *
 * Usage:
 *   strainer --log < app.log
 *   cat /tmp/strainer-20260101-120000.log | jq .
 */
export class Logger {
  private seq = 0;
  private enabled: boolean;

  constructor(private readonly path: string | undefined) {
    this.enabled = !!path;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  get file(): string | undefined {
    return this.path;
  }

  debug(msg: string, fields?: Record<string, unknown>): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: Record<string, unknown>): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: Record<string, unknown>): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: Record<string, unknown>): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: Record<string, unknown>): void {
    if (!this.enabled || !this.path) return;
    const entry: LogEntry = { ...fields, seq: ++this.seq, ts: Date.now(), level, msg };
    try {
      appendFileSync(this.path, `${JSON.stringify(entry, serializeErrors)}\n`);
    } catch {
      // Logging must never take the pager down; stop trying after the first failure
      this.enabled = false;
    }
  }
}

/** A logger that drops everything */
export const silentLogger = new Logger(undefined);

function serializeErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `strainer-YYYYMMDD-HHMMSS` in local time */
export function logFileStem(now: Date): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `strainer-${date}-${time}`;
}

/**
 * Create a fresh, uniquely named log file in `dir` and return its path.
 * An existing name gets `-1`, `-2`, … appended before the extension.
 */
export function createLogFile(dir: string, now: Date = new Date()): string {
  const stem = logFileStem(now);
  for (let attempt = 0; ; attempt++) {
    const path = join(dir, attempt === 0 ? `${stem}.log` : `${stem}-${attempt}.log`);
    try {
      closeSync(openSync(path, "wx"));
      return path;
    } catch (err) {
      if (!hasErrorCode(err, "EEXIST")) throw err;
    }
  }
}

function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
