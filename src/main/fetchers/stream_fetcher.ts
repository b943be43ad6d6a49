/**
 * Stream fetcher: owns one telemetry subscription for one category.
 *
 * State transitions:
 *   SUBSCRIBING --> CONSUMING     subscription opened
 *   CONSUMING   --> CONSUMING     on each item (fields written to the store)
 *   CONSUMING   --> FAULTED       stream threw, or ended (streams are infinite)
 *   FAULTED     --> SUBSCRIBING   after the retry delay
 *   any         --> STOPPED       session signal aborted
 *
 * A failure is recorded once in the error log, tagged with the category, and
 * never leaves the fetcher: one broken category cannot take down the others
 * or the session.
 *
 * @module fetchers/stream_fetcher
 */

import type { TelemetrySource } from '../source/source_types';
import type { TelemetryUpdate } from '../store/store_types';
import type { SessionContext, SessionTask } from '../session/session_types';
import { delay } from '../util/delay';
import { describe_error } from '../util/errors';

/** Default wait between a failure and the next subscribe. */
export const FETCH_RETRY_DELAY_MS = 1000;

export type TelemetryCategory =
  | 'position'
  | 'attitude'
  | 'battery'
  | 'gps'
  | 'flight_mode'
  | 'armed'
  | 'rc_signal'
  | 'health';

export type FetcherPhase = 'idle' | 'subscribing' | 'consuming' | 'faulted' | 'stopped';

/** What distinguishes one category's fetcher from another. */
export interface FetcherDefinition<T> {
  category: TelemetryCategory;
  /** Human-readable name used in error messages, e.g. "Position". */
  label: string;
  subscribe(source: TelemetrySource, signal: AbortSignal): AsyncIterable<T>;
  /** Fields to write for one item. May throw; that counts as a stream failure. */
  transform(item: T): TelemetryUpdate;
}

export interface StreamFetcherOptions {
  retry_delay_ms?: number;
  /** Called on every phase transition. */
  on_phase_change?: (category: TelemetryCategory, phase: FetcherPhase) => void;
}

export class StreamFetcher<T> implements SessionTask {
  readonly name: string;
  private phase: FetcherPhase = 'idle';
  private subscribe_count = 0;
  private failure_count = 0;
  private item_count = 0;
  private readonly retry_delay_ms: number;
  private readonly on_phase_change?: (category: TelemetryCategory, phase: FetcherPhase) => void;

  constructor(
    private readonly definition: FetcherDefinition<T>,
    options: StreamFetcherOptions = {}
  ) {
    this.name = `fetch:${definition.category}`;
    this.retry_delay_ms = options.retry_delay_ms ?? FETCH_RETRY_DELAY_MS;
    this.on_phase_change = options.on_phase_change;
  }

  get category(): TelemetryCategory {
    return this.definition.category;
  }

  get_phase(): FetcherPhase {
    return this.phase;
  }

  /** Subscribe attempts, failures and items consumed so far. */
  get_counters(): { subscribes: number; failures: number; items: number } {
    return { subscribes: this.subscribe_count, failures: this.failure_count, items: this.item_count };
  }

  /**
   * Run until the session signal aborts. Never rejects.
   */
  async run(ctx: SessionContext): Promise<void> {
    const { source, store, errors, signal } = ctx;
    const { category, label } = this.definition;

    while (!signal.aborted) {
      this.set_phase('subscribing');
      try {
        this.subscribe_count++;
        const stream = this.definition.subscribe(source, signal);
        this.set_phase('consuming');
        for await (const item of stream) {
          store.update(this.definition.transform(item));
          this.item_count++;
        }
        throw new Error('stream ended unexpectedly');
      } catch (err) {
        if (signal.aborted) {
          break;
        }
        this.failure_count++;
        this.set_phase('faulted');
        errors.record(category, `${label} fetch error: ${describe_error(err)}`);
      }

      try {
        await delay(this.retry_delay_ms, signal);
      } catch {
        break; // aborted during the retry wait
      }
    }

    this.set_phase('stopped');
  }

  private set_phase(phase: FetcherPhase): void {
    if (this.phase === phase) {
      return;
    }
    this.phase = phase;
    this.on_phase_change?.(this.definition.category, phase);
  }
}
