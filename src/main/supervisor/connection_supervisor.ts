/**
 * Connection supervisor: owns the session lifecycle.
 *
 * State transitions:
 *   IDLE       --> CONNECTING   run() called
 *   CONNECTING --> RUNNING      source opened and vehicle reported connected
 *   RUNNING    --> CONNECTING   session-fatal error, after the restart delay
 *   CONNECTING --> CONNECTING   open failed, after the restart delay
 *   any        --> STOPPED      stop() or the outer signal aborted
 *
 * Each session gets a fresh store and its own abort signal. Tearing a session
 * down aborts that signal, waits for every task to settle and only then
 * closes the source, so no task outlives the store it writes to.
 *
 * @module supervisor/connection_supervisor
 */

import type { TelemetrySource } from '../source/source_types';
import type { SessionContext, SessionTask } from '../session/session_types';
import { TelemetryStore } from '../store/telemetry_store';
import type { ErrorLog } from '../store/error_log';
import { create_logger, type Logger } from '../log/logger';
import { delay } from '../util/delay';
import { describe_error } from '../util/errors';

/** Wait between a failed session and the next attempt. */
export const RESTART_DELAY_MS = 5000;

export type SupervisorPhase = 'idle' | 'connecting' | 'running' | 'stopped';

export interface SupervisorOptions {
  /** Open the link and return a started source. */
  connect(signal: AbortSignal): Promise<TelemetrySource>;
  /** Fresh tasks for one session: fetchers and consumers. */
  create_tasks(): SessionTask[];
  /** Kept across sessions so earlier failures stay visible. */
  errors: ErrorLog;
  restart_delay_ms?: number;
  now?: () => Date;
  logger?: Logger;
  on_phase_change?: (phase: SupervisorPhase) => void;
  /** Called once the vehicle is connected, before any task starts. */
  on_session_start?: (ctx: SessionContext) => void;
}

/** Resolve once the source reports a connected vehicle. */
async function wait_for_connection(source: TelemetrySource, signal: AbortSignal): Promise<void> {
  for await (const state of source.connection_state(signal)) {
    if (state.is_connected) {
      return;
    }
  }
  throw new Error('connection state stream ended');
}

/** Reject when the source's link is lost, or with the signal's reason on abort. */
async function watch_link(source: TelemetrySource, signal: AbortSignal): Promise<void> {
  const reason = await source.until_closed(signal);
  throw reason;
}

export class ConnectionSupervisor {
  private phase: SupervisorPhase = 'idle';
  private session_count = 0;
  private readonly stopper = new AbortController();
  private readonly restart_delay_ms: number;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(private readonly options: SupervisorOptions) {
    this.restart_delay_ms = options.restart_delay_ms ?? RESTART_DELAY_MS;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? create_logger('supervisor');
  }

  get_phase(): SupervisorPhase {
    return this.phase;
  }

  /**
   * Run sessions until stopped. Resolves after the last session is torn
   * down; session failures are recorded and never reach the caller.
   */
  async run(signal?: AbortSignal): Promise<void> {
    const stop = this.stopper.signal;
    const on_outer_abort = (): void => this.stop();
    if (signal?.aborted) {
      this.stop();
    }
    signal?.addEventListener('abort', on_outer_abort, { once: true });

    try {
      while (!stop.aborted) {
        try {
          await this.run_session(stop);
        } catch (err) {
          if (stop.aborted) {
            break;
          }
          this.options.errors.record('supervisor', `Main connection error: ${describe_error(err)}`);
        }

        try {
          await delay(this.restart_delay_ms, stop);
        } catch {
          break; // stopped during the restart wait
        }
      }
    } finally {
      signal?.removeEventListener('abort', on_outer_abort);
      this.set_phase('stopped');
    }
  }

  /** End the loop and tear down the current session. */
  stop(): void {
    if (!this.stopper.signal.aborted) {
      this.stopper.abort(new Error('supervisor stopped'));
    }
  }

  // --- Private helpers ---

  private async run_session(stop: AbortSignal): Promise<void> {
    const session = new AbortController();
    const on_stop = (): void => session.abort(stop.reason);
    stop.addEventListener('abort', on_stop, { once: true });

    const id = ++this.session_count;
    const running: Array<Promise<void>> = [];
    let source: TelemetrySource | null = null;

    try {
      this.set_phase('connecting');
      this.log.info(`session ${id}: connecting`);
      source = await this.options.connect(session.signal);
      await wait_for_connection(source, session.signal);

      const ctx: SessionContext = {
        id,
        started_at: this.now(),
        source,
        store: new TelemetryStore(),
        errors: this.options.errors,
        signal: session.signal
      };
      this.set_phase('running');
      this.log.info(`session ${id}: vehicle connected`);
      this.options.on_session_start?.(ctx);

      for (const task of this.options.create_tasks()) {
        running.push(task.run(ctx));
      }
      running.push(watch_link(source, session.signal));

      await Promise.all(running);
      if (!session.signal.aborted) {
        throw new Error('session tasks ended unexpectedly');
      }
    } finally {
      stop.removeEventListener('abort', on_stop);
      session.abort(new Error(`session ${id} ended`));
      await Promise.allSettled(running);
      if (source) {
        await source.close().catch((err: unknown) => {
          this.log.warn(`session ${id}: close failed: ${describe_error(err)}`);
        });
      }
      this.log.info(`session ${id}: torn down`);
    }
  }

  private set_phase(phase: SupervisorPhase): void {
    if (this.phase === phase) {
      return;
    }
    this.phase = phase;
    this.options.on_phase_change?.(phase);
  }
}
