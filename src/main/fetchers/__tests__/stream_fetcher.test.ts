import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { StreamFetcher, type FetcherDefinition, type FetcherPhase } from '../stream_fetcher';
import { TelemetryChannel } from '../../source/telemetry_channel';
import { TelemetryStore } from '../../store/telemetry_store';
import { ErrorLog } from '../../store/error_log';
import type { SessionContext } from '../../session/session_types';
import type { Logger } from '../../log/logger';
import { FakeTelemetrySource } from '../../../../test/fixtures/fake_source';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function quiet_logger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Let pending promise continuations run. */
const flush = (): Promise<unknown> => vi.advanceTimersByTimeAsync(0);

function make_context(signal: AbortSignal): SessionContext {
  return {
    id: 1,
    started_at: new Date(2024, 0, 1, 10, 0, 0),
    source: new FakeTelemetrySource(),
    store: new TelemetryStore(),
    errors: new ErrorLog(5, () => new Date(2024, 0, 1, 10, 0, 0), quiet_logger()),
    signal
  };
}

/** Battery-like definition over a channel of voltages. */
function voltage_definition(subscribe: FetcherDefinition<number>['subscribe']): FetcherDefinition<number> {
  return {
    category: 'battery',
    label: 'Battery',
    subscribe,
    transform: (v) => ({ voltage: v.toFixed(2) })
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('StreamFetcher', () => {
  let controller: AbortController;
  let ctx: SessionContext;

  beforeEach(() => {
    vi.useFakeTimers();
    controller = new AbortController();
    ctx = make_context(controller.signal);
  });

  afterEach(() => {
    controller.abort();
    vi.useRealTimers();
  });

  it('writes each item into the store', async () => {
    const channel = new TelemetryChannel<number>('battery');
    const fetcher = new StreamFetcher(voltage_definition((_source, signal) => channel.subscribe(signal)));

    const done = fetcher.run(ctx);
    channel.publish(12.15);
    await flush();
    expect(ctx.store.snapshot().voltage).toBe('12.15');

    channel.publish(11.9);
    await flush();
    expect(ctx.store.snapshot().voltage).toBe('11.90');
    expect(fetcher.get_counters()).toEqual({ subscribes: 1, failures: 0, items: 2 });

    controller.abort();
    await done;
  });

  it('records N failures as N entries and subscribes N+1 times', async () => {
    const channel = new TelemetryChannel<number>('battery');
    let calls = 0;
    const fetcher = new StreamFetcher(
      voltage_definition((_source, signal) => {
        calls++;
        if (calls <= 3) {
          throw new Error(`refused ${calls}`);
        }
        return channel.subscribe(signal);
      }),
      { retry_delay_ms: 1000 }
    );

    const done = fetcher.run(ctx);
    for (let i = 0; i < 3; i++) {
      await vi.advanceTimersByTimeAsync(1000);
    }

    expect(calls).toBe(4);
    expect(ctx.errors.recent().map((e) => e.message)).toEqual([
      'Battery fetch error: refused 1',
      'Battery fetch error: refused 2',
      'Battery fetch error: refused 3'
    ]);
    expect(ctx.errors.recent().every((e) => e.source === 'battery')).toBe(true);
    expect(fetcher.get_phase()).toBe('consuming');

    channel.publish(12.5);
    await flush();
    expect(ctx.store.snapshot().voltage).toBe('12.50');

    controller.abort();
    await done;
    expect(ctx.errors.recent()).toHaveLength(3);
  });

  it('waits the retry delay before re-subscribing', async () => {
    let calls = 0;
    const fetcher = new StreamFetcher(
      voltage_definition(() => {
        calls++;
        throw new Error('refused');
      }),
      { retry_delay_ms: 1000 }
    );

    const done = fetcher.run(ctx);
    expect(calls).toBe(1);

    await vi.advanceTimersByTimeAsync(999);
    expect(calls).toBe(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(calls).toBe(2);

    controller.abort();
    await done;
  });

  it('treats a stream that ends as a failure', async () => {
    const fetcher = new StreamFetcher(
      voltage_definition(() =>
        (async function* () {
          yield 12;
        })()
      )
    );

    const done = fetcher.run(ctx);
    await flush();

    expect(ctx.store.snapshot().voltage).toBe('12.00');
    expect(ctx.errors.recent().map((e) => e.message)).toEqual(['Battery fetch error: stream ended unexpectedly']);
    expect(fetcher.get_phase()).toBe('faulted');

    controller.abort();
    await done;
  });

  it('records a failing stream and keeps other fields intact', async () => {
    const channel = new TelemetryChannel<number>('battery');
    ctx.store.update({ lat: '47.397742' });
    const fetcher = new StreamFetcher(voltage_definition((_source, signal) => channel.subscribe(signal)));

    const done = fetcher.run(ctx);
    channel.publish(12.15);
    channel.fail(new Error('link error: EIO'));
    await flush();

    expect(ctx.errors.recent().map((e) => e.message)).toEqual(['Battery fetch error: link error: EIO']);
    expect(ctx.store.snapshot().voltage).toBe('12.15');
    expect(ctx.store.snapshot().lat).toBe('47.397742');

    controller.abort();
    await done;
  });

  it('records a throwing transform as a failure', async () => {
    const channel = new TelemetryChannel<number>('battery');
    const fetcher = new StreamFetcher<number>({
      category: 'rc_signal',
      label: 'RC signal',
      subscribe: (_source, signal) => channel.subscribe(signal),
      transform: () => {
        throw new Error('bad item');
      }
    });

    const done = fetcher.run(ctx);
    channel.publish(1);
    await flush();

    expect(ctx.errors.recent().map((e) => [e.source, e.message])).toEqual([['rc_signal', 'RC signal fetch error: bad item']]);

    controller.abort();
    await done;
  });

  it('stops quietly when the session aborts', async () => {
    const channel = new TelemetryChannel<number>('battery');
    const phases: FetcherPhase[] = [];
    const fetcher = new StreamFetcher(voltage_definition((_source, signal) => channel.subscribe(signal)), {
      on_phase_change: (_category, phase) => phases.push(phase)
    });

    const done = fetcher.run(ctx);
    await flush();
    controller.abort(new Error('session ended'));
    await done;

    expect(phases).toEqual(['subscribing', 'consuming', 'stopped']);
    expect(ctx.errors.recent()).toHaveLength(0);
    expect(channel.subscriber_count).toBe(0);
  });

  it('stops during the retry wait without re-subscribing', async () => {
    let calls = 0;
    const fetcher = new StreamFetcher(
      voltage_definition(() => {
        calls++;
        throw new Error('refused');
      })
    );

    const done = fetcher.run(ctx);
    controller.abort();
    await done;

    expect(calls).toBe(1);
    expect(fetcher.get_phase()).toBe('stopped');
  });

  it('is named after its category', () => {
    const fetcher = new StreamFetcher(voltage_definition(() => new TelemetryChannel<number>('x').subscribe()));

    expect(fetcher.name).toBe('fetch:battery');
    expect(fetcher.category).toBe('battery');
    expect(fetcher.get_phase()).toBe('idle');
  });
});
