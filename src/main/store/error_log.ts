/**
 * Bounded log of recent errors, shown by the display.
 *
 * `record()` is synchronous, so appends from concurrent tasks are applied
 * one at a time in call order. Once {@link ERROR_LOG_CAPACITY} is exceeded
 * the oldest entry is dropped.
 *
 * @module store/error_log
 */

import { create_logger, type Logger } from '../log/logger';

/** Default number of entries kept. */
export const ERROR_LOG_CAPACITY = 5;

export interface ErrorEntry {
  timestamp: Date;
  /** Component or telemetry category that raised the error. */
  source: string;
  message: string;
}

export class ErrorLog {
  private entries: ErrorEntry[] = [];
  private readonly log: Logger;

  constructor(
    private readonly capacity: number = ERROR_LOG_CAPACITY,
    private readonly now: () => Date = () => new Date(),
    logger?: Logger
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`ErrorLog: capacity must be a positive integer, got ${capacity}`);
    }
    this.log = logger ?? create_logger('errors');
  }

  /** Append an entry stamped with the current time. */
  record(source: string, message: string): ErrorEntry {
    const entry: ErrorEntry = { timestamp: this.now(), source, message };
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.shift();
    }
    this.log.warn(`${source}: ${message}`);
    return entry;
  }

  /** Up to `n` most recent entries, most recent last. */
  recent(n: number = this.capacity): ErrorEntry[] {
    if (n <= 0) {
      return [];
    }
    return this.entries.slice(-n);
  }
}

function two_digits(n: number): string {
  return String(n).padStart(2, '0');
}

/** `[HH:MM:SS] message`, local time. */
export function format_entry(entry: ErrorEntry): string {
  const t = entry.timestamp;
  return `[${two_digits(t.getHours())}:${two_digits(t.getMinutes())}:${two_digits(t.getSeconds())}] ${entry.message}`;
}
