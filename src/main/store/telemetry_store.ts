/**
 * Shared telemetry store.
 *
 * Holds the latest known value of every field for one session. Writers are
 * the stream fetchers, each owning a disjoint set of fields; readers are the
 * consumers, which take frozen snapshots.
 *
 * `update()` and `snapshot()` are synchronous. On Node's single-threaded
 * event loop no other task can run while either executes, so a reader never
 * sees a half-written field. Nothing makes a multi-field update atomic across
 * separate `update()` calls: a snapshot may hold fields from different,
 * racing updates.
 *
 * @module store/telemetry_store
 */

import {
  empty_record,
  SCALAR_FIELDS,
  type TelemetryRecord,
  type TelemetryUpdate,
  type HealthChecklist
} from './store_types';

type ScalarField = (typeof SCALAR_FIELDS)[number];

function copy_field<K extends ScalarField>(target: TelemetryRecord, source: TelemetryUpdate, key: K): void {
  const value = source[key];
  if (value !== undefined) {
    target[key] = value;
  }
}

export class TelemetryStore {
  private record: TelemetryRecord = empty_record();

  /**
   * Apply a partial set of fields. Fields absent from `fields` keep their
   * value; `health`, when present, replaces the whole checklist.
   */
  update(fields: TelemetryUpdate): void {
    const next: TelemetryRecord = { ...this.record };
    for (const key of SCALAR_FIELDS) {
      copy_field(next, fields, key);
    }
    if (fields.health !== undefined) {
      next.health = { ...fields.health };
    }
    this.record = next;
  }

  /** Frozen point-in-time copy of the full record. */
  snapshot(): Readonly<TelemetryRecord> {
    const health: HealthChecklist = Object.freeze({ ...this.record.health });
    return Object.freeze({ ...this.record, health });
  }
}
