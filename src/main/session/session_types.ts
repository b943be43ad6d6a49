/**
 * Types shared by everything that runs inside one supervisor session.
 *
 * @module session/session_types
 */

import type { TelemetrySource } from '../source/source_types';
import type { TelemetryStore } from '../store/telemetry_store';
import type { ErrorLog } from '../store/error_log';

/**
 * Handles passed to every task of one session. The store is created fresh
 * for the session; `signal` aborts when the session is torn down, after
 * which no task may touch `store` again.
 */
export interface SessionContext {
  /** 1-based session counter. */
  id: number;
  started_at: Date;
  source: TelemetrySource;
  store: TelemetryStore;
  errors: ErrorLog;
  signal: AbortSignal;
}

/**
 * A long-running session task. `run` loops until `ctx.signal` aborts and
 * then resolves; it rejects only for a failure that should restart the
 * whole session.
 */
export interface SessionTask {
  readonly name: string;
  run(ctx: SessionContext): Promise<void>;
}
