/**
 * Live terminal view of the telemetry store and recent errors.
 *
 * Every tick the screen is cleared and the full view is redrawn from a
 * fresh snapshot. A failed redraw is recorded and the next tick tries again;
 * display problems never reach the fetchers or the session. That includes
 * failures a stream reports later, through the write callback or an
 * `'error'` event (EPIPE once stdout's reader is gone).
 *
 * @module consumers/display
 */

import type { SessionContext, SessionTask } from '../session/session_types';
import { HEALTH_CHECK_NAMES, UNAVAILABLE_TEXT, type TelemetryRecord } from '../store/store_types';
import { format_entry, type ErrorEntry, ERROR_LOG_CAPACITY } from '../store/error_log';
import { delay } from '../util/delay';
import { describe_error } from '../util/errors';

/** ANSI: clear screen, cursor home. */
const CLEAR_SCREEN = '\x1b[2J\x1b[H';

/** Width of the label column for summary fields. */
const LABEL_WIDTH = 15;

/** Width of the label column for health checks. */
const HEALTH_LABEL_WIDTH = 30;

/**
 * Where rendered frames go; `process.stdout` in production. `callback` runs
 * once the frame is flushed, with the error if the write failed.
 */
export interface DisplaySink {
  write(text: string, callback: (err?: Error | null) => void): unknown;
  on?(event: 'error', listener: (err: Error) => void): unknown;
  off?(event: 'error', listener: (err: Error) => void): unknown;
}

export interface DisplayOptions {
  tick_ms?: number;
  title?: string;
}

function value(v: string | null, unit: string = ''): string {
  return v === null ? UNAVAILABLE_TEXT : `${v}${unit}`;
}

function row(label: string, text: string): string {
  return `${label.padEnd(LABEL_WIDTH)}: ${text}`;
}

/**
 * Render the full view as lines, without the screen-clear prefix.
 *
 * @param snap - Store snapshot.
 * @param errors - Entries to list, oldest first.
 */
export function render_view(
  snap: Readonly<TelemetryRecord>,
  errors: readonly ErrorEntry[],
  title: string = 'Vehicle Telemetry'
): string[] {
  const lines: string[] = [
    `========= ${title} =========`,
    row('GPS Fix', value(snap.gps_fix)),
    row('Satellites', value(snap.satellites)),
    row('Latitude', value(snap.lat)),
    row('Longitude', value(snap.lon)),
    row('Rel Alt (m)', value(snap.alt)),
    row('Abs Alt (m)', value(snap.abs_alt)),
    row('Roll', value(snap.roll, '°')),
    row('Pitch', value(snap.pitch, '°')),
    row('Yaw', value(snap.yaw, '°')),
    row('Voltage', value(snap.voltage, ' V')),
    row('Battery', value(snap.battery, ' %')),
    row('Flight Mode', value(snap.flight_mode)),
    row('Armed', value(snap.armed)),
    row('RC Signal', value(snap.rc_signal, ' %')),
    '',
    '---------- Pre-Arm Health Check ---------'
  ];

  for (const name of HEALTH_CHECK_NAMES) {
    lines.push(`${name.padEnd(HEALTH_LABEL_WIDTH)}: ${value(snap.health[name])}`);
  }

  lines.push('', '=========== Recent Errors ===========');
  if (errors.length === 0) {
    lines.push('No errors recorded');
  } else {
    for (const entry of errors) {
      lines.push(format_entry(entry));
    }
  }
  lines.push('=====================================');

  return lines;
}

export class DisplayConsumer implements SessionTask {
  readonly name = 'display';
  private readonly tick_ms: number;
  private readonly title: string;

  constructor(
    private readonly sink: DisplaySink,
    options: DisplayOptions = {}
  ) {
    this.tick_ms = options.tick_ms ?? 1000;
    this.title = options.title ?? 'Vehicle Telemetry';
  }

  /** Redraw once per tick until the session ends. Never rejects. */
  async run(ctx: SessionContext): Promise<void> {
    // A stream reports one failure through both the callback and 'error'.
    const reported = new WeakSet<Error>();
    const report = (err: unknown): void => {
      if (err instanceof Error) {
        if (reported.has(err)) {
          return;
        }
        reported.add(err);
      }
      ctx.errors.record('display', `Display loop error: ${describe_error(err)}`);
    };
    const on_sink_error = (err: Error): void => report(err);
    this.sink.on?.('error', on_sink_error);

    let last_write: Promise<void> = Promise.resolve();
    try {
      while (!ctx.signal.aborted) {
        try {
          const lines = render_view(ctx.store.snapshot(), ctx.errors.recent(ERROR_LOG_CAPACITY), this.title);
          last_write = this.write_frame(`${CLEAR_SCREEN}${lines.join('\n')}\n`, report);
        } catch (err) {
          report(err);
        }

        try {
          await delay(this.tick_ms, ctx.signal);
        } catch {
          break; // session ended
        }
      }
      await this.settle(last_write);
    } finally {
      this.sink.off?.('error', on_sink_error);
    }
  }

  // --- Private helpers ---

  /** Start a write; the result resolves once the sink has called back. */
  private write_frame(text: string, report: (err: unknown) => void): Promise<void> {
    let finish: () => void = () => undefined;
    const written = new Promise<void>((resolve) => {
      finish = resolve;
    });
    this.sink.write(text, (err) => {
      if (err) {
        report(err);
      }
      finish();
    });
    return written;
  }

  /** Wait for the last frame, at most one tick, so its failure is still caught. */
  private async settle(last_write: Promise<void>): Promise<void> {
    const bound = new AbortController();
    try {
      await Promise.race([last_write, delay(this.tick_ms, bound.signal)]);
    } finally {
      bound.abort();
    }
  }
}
