/**
 * Append-only CSV flight log.
 *
 * Once per tick the store snapshot is flattened into one row: an ISO-8601
 * timestamp, every scalar field, then the seven health checks as
 * `health_<snake_case_name>` columns. Unavailable values are written as `0`
 * in the row only; the store keeps its unavailable markers.
 *
 * The header is written whenever the file does not exist yet, so appending
 * to a file that already has one never repeats it. A failed tick is
 * recorded and the next tick tries again.
 *
 * @module consumers/persistence
 */

import { promises as fs } from 'fs';
import { dirname, join } from 'path';
import type { SessionContext, SessionTask } from '../session/session_types';
import { HEALTH_CHECK_NAMES, SCALAR_FIELDS, type HealthCheckName, type TelemetryRecord } from '../store/store_types';
import { delay } from '../util/delay';
import { describe_error } from '../util/errors';

/** Written in place of an unavailable value. */
const UNAVAILABLE_CELL = '0';

/** `Armable` → `health_armable`, `Home position` → `health_home_position`. */
export function health_column(name: HealthCheckName): string {
  return `health_${name.toLowerCase().replace(/ /g, '_')}`;
}

export const CSV_HEADER: readonly string[] = [
  'timestamp',
  ...SCALAR_FIELDS,
  ...HEALTH_CHECK_NAMES.map(health_column)
];

/**
 * Flatten a snapshot into cells in {@link CSV_HEADER} order.
 *
 * @param snap - Store snapshot.
 * @param timestamp - Row time.
 */
export function flatten_snapshot(snap: Readonly<TelemetryRecord>, timestamp: Date): string[] {
  const cells: string[] = [timestamp.toISOString()];
  for (const field of SCALAR_FIELDS) {
    cells.push(snap[field] ?? UNAVAILABLE_CELL);
  }
  for (const name of HEALTH_CHECK_NAMES) {
    cells.push(snap.health[name] ?? UNAVAILABLE_CELL);
  }
  return cells;
}

function escape_cell(cell: string): string {
  return /[",\r\n]/.test(cell) ? `"${cell.replace(/"/g, '""')}"` : cell;
}

/** One CSV line (RFC 4180 quoting) including the trailing newline. */
export function to_csv_line(cells: readonly string[]): string {
  return `${cells.map(escape_cell).join(',')}\n`;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** `telemetry_log_YYYYMMDD_HHMMSS.csv` from the local session start time. */
export function log_file_name(started_at: Date): string {
  const d = started_at;
  const date = `${d.getFullYear()}${pad2(d.getMonth() + 1)}${pad2(d.getDate())}`;
  const time = `${pad2(d.getHours())}${pad2(d.getMinutes())}${pad2(d.getSeconds())}`;
  return `telemetry_log_${date}_${time}.csv`;
}

async function file_exists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return false;
    }
    throw err;
  }
}

/** Appends rows to one CSV file, writing the header first if the file is new. */
export class CsvLogWriter {
  constructor(readonly path: string) {}

  async append(cells: readonly string[]): Promise<void> {
    if (await file_exists(this.path)) {
      await fs.appendFile(this.path, to_csv_line(cells));
      return;
    }
    await fs.mkdir(dirname(this.path), { recursive: true });
    await fs.appendFile(this.path, to_csv_line(CSV_HEADER) + to_csv_line(cells));
  }
}

export interface PersistenceOptions {
  /** Directory holding the per-session log files. */
  log_dir: string;
  tick_ms?: number;
  now?: () => Date;
}

export class PersistenceConsumer implements SessionTask {
  readonly name = 'persistence';
  private readonly tick_ms: number;
  private readonly now: () => Date;

  constructor(private readonly options: PersistenceOptions) {
    this.tick_ms = options.tick_ms ?? 1000;
    this.now = options.now ?? (() => new Date());
  }

  /** Path of the log file for a session started at `started_at`. */
  file_for(started_at: Date): string {
    return join(this.options.log_dir, log_file_name(started_at));
  }

  /** Append one row per tick until the session ends. Never rejects. */
  async run(ctx: SessionContext): Promise<void> {
    const writer = new CsvLogWriter(this.file_for(ctx.started_at));

    while (!ctx.signal.aborted) {
      try {
        await writer.append(flatten_snapshot(ctx.store.snapshot(), this.now()));
      } catch (err) {
        ctx.errors.record('persistence', `CSV write error: ${describe_error(err)}`);
      }

      try {
        await delay(this.tick_ms, ctx.signal);
      } catch {
        break; // session ended
      }
    }
  }
}
