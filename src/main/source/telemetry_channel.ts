/**
 * Fan-out channel turning pushed updates into independent async streams.
 *
 * Every call to {@link TelemetryChannel.subscribe} registers a subscriber
 * immediately and returns its own stream. Subscribers buffer up to
 * {@link MAX_QUEUED} items; older items are dropped first since only the
 * latest telemetry value matters. `fail()` makes every current stream throw
 * and `close()` also makes the channel refuse new subscriptions. Ending a
 * stream early, even before its first read, unregisters its subscriber.
 *
 * @module source/telemetry_channel
 */

/** Per-subscriber queue bound. */
const MAX_QUEUED = 32;

interface Subscriber<T> {
  queue: T[];
  error: Error | null;
  wake: (() => void) | null;
}

export class TelemetryChannel<T> {
  private subscribers: Set<Subscriber<T>> = new Set();
  private closed_reason: Error | null = null;

  constructor(private readonly name: string) {}

  /** Number of live subscriptions. */
  get subscriber_count(): number {
    return this.subscribers.size;
  }

  /** Deliver an item to every current subscriber. */
  publish(item: T): void {
    for (const sub of this.subscribers) {
      sub.queue.push(item);
      if (sub.queue.length > MAX_QUEUED) {
        sub.queue.shift();
      }
      this.wake(sub);
    }
  }

  /**
   * Fail every current subscription. Each stream throws `err` once its
   * already-queued items are drained; later subscriptions are unaffected.
   */
  fail(err: Error): void {
    for (const sub of this.subscribers) {
      sub.error = err;
      this.wake(sub);
    }
    this.subscribers.clear();
  }

  /** Fail every subscription and refuse new ones. */
  close(reason: Error = new Error(`${this.name} stream closed`)): void {
    this.closed_reason = reason;
    this.fail(reason);
  }

  /**
   * Open a subscription.
   *
   * @param signal - Aborting ends the stream by throwing the signal's reason.
   * @param initial - Items delivered before anything published from now on.
   * @returns An unbounded stream of updates published from now on.
   */
  subscribe(signal?: AbortSignal, initial: readonly T[] = []): ChannelStream<T> {
    const sub: Subscriber<T> = { queue: [...initial], error: this.closed_reason, wake: null };
    if (!sub.error) {
      this.subscribers.add(sub);
    }
    return new ChannelStream(this.stream(sub, signal), () => this.subscribers.delete(sub));
  }

  // --- Private helpers ---

  private wake(sub: Subscriber<T>): void {
    const wake = sub.wake;
    sub.wake = null;
    if (wake) wake();
  }

  private async *stream(sub: Subscriber<T>, signal?: AbortSignal): AsyncGenerator<T, void, undefined> {
    const on_abort = (): void => this.wake(sub);
    signal?.addEventListener('abort', on_abort);

    try {
      while (true) {
        signal?.throwIfAborted();

        const next = sub.queue.shift();
        if (next !== undefined) {
          yield next;
          continue;
        }
        if (sub.error) {
          throw sub.error;
        }

        await new Promise<void>((resolve) => {
          sub.wake = resolve;
        });
      }
    } finally {
      signal?.removeEventListener('abort', on_abort);
      this.subscribers.delete(sub);
    }
  }
}

/**
 * One subscriber's stream. `return()` releases the subscription even when the
 * underlying generator never started, which a bare generator would not do.
 */
export class ChannelStream<T> implements AsyncIterableIterator<T> {
  constructor(
    private readonly inner: AsyncGenerator<T, void, undefined>,
    private readonly release: () => void
  ) {}

  next(): Promise<IteratorResult<T, void>> {
    return this.inner.next();
  }

  return(): Promise<IteratorResult<T, void>> {
    this.release();
    return this.inner.return(undefined);
  }

  [Symbol.asyncIterator](): this {
    return this;
  }
}
