import fs from 'node:fs/promises';
import path from 'node:path';
import { isoNow } from '../utils/time.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerStatus {
  failedWrites: number;
  lastError: string | null;
}

/**
 * Append-only NDJSON event log. One line per event:
 * `{"ts":"...","level":"info","event":"vote.cast",...fields}`.
 *
 * Logging runs after state has been committed, so `log` never rejects: a
 * failed append is counted and surfaced through `status()`.
 */
export class EventLogger {
  private failedWrites = 0;
  private lastError: string | null = null;

  constructor(private readonly logFilePath: string) {}

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.logFilePath), { recursive: true });
  }

  async log(level: LogLevel, event: string, fields: Record<string, unknown> = {}): Promise<void> {
    const line = JSON.stringify({ ts: isoNow(), level, event, ...fields });
    try {
      await fs.appendFile(this.logFilePath, `${line}\n`);
    } catch (error) {
      this.failedWrites += 1;
      this.lastError = error instanceof Error ? error.message : String(error);
    }
  }

  status(): LoggerStatus {
    return {
      failedWrites: this.failedWrites,
      lastError: this.lastError,
    };
  }
}
