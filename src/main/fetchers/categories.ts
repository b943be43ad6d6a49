/**
 * The eight telemetry categories and how each one maps onto store fields.
 *
 * Each definition writes a disjoint subset of the record, so no field is
 * ever written by more than one fetcher.
 *
 * @module fetchers/categories
 */

import type {
  Position,
  EulerAngle,
  Battery,
  GpsInfo,
  FlightModeUpdate,
  ArmedUpdate,
  RcStatus,
  Health
} from '../source/source_types';
import type { HealthChecklist } from '../store/store_types';
import type { SessionTask } from '../session/session_types';
import { StreamFetcher, type FetcherDefinition, type StreamFetcherOptions } from './stream_fetcher';

// ---------------------------------------------------------------------------
// Formatting helpers
// ---------------------------------------------------------------------------

/** `value.toFixed(digits)`, or null for a missing or non-finite value. */
export function fixed(value: number | null | undefined, digits: number): string | null {
  if (value === null || value === undefined || !Number.isFinite(value)) {
    return null;
  }
  return value.toFixed(digits);
}

/** Drop a categorical prefix such as `FIX_TYPE_` from an enum label. */
export function strip_prefix(label: string, prefix: string): string {
  return label.startsWith(prefix) ? label.slice(prefix.length) : label;
}

function check(ok: boolean): 'OK' | 'FAIL' {
  return ok ? 'OK' : 'FAIL';
}

/** Build the full seven-entry checklist from one health update. */
export function to_checklist(health: Health): HealthChecklist {
  return {
    'Accelerometer calibration': check(health.is_accelerometer_calibration_ok),
    'Armable': check(health.is_armable),
    'Global position': check(health.is_global_position_ok),
    'Gyrometer calibration': check(health.is_gyrometer_calibration_ok),
    'Home position': check(health.is_home_position_ok),
    'Local position': check(health.is_local_position_ok),
    'Magnetometer calibration': check(health.is_magnetometer_calibration_ok)
  };
}

/**
 * RC strength as stored. Some links never report it, and on some items the
 * field cannot be read at all; both store unavailable instead of failing.
 */
export function read_rc_signal(rc: RcStatus): string | null {
  try {
    return fixed(rc.signal_strength_percent, 1);
  } catch {
    return null;
  }
}

// ---------------------------------------------------------------------------
// Definitions
// ---------------------------------------------------------------------------

export const POSITION: FetcherDefinition<Position> = {
  category: 'position',
  label: 'Position',
  subscribe: (source, signal) => source.position(signal),
  transform: (pos) => ({
    lat: fixed(pos.latitude_deg, 6),
    lon: fixed(pos.longitude_deg, 6),
    alt: fixed(pos.relative_altitude_m, 2),
    abs_alt: fixed(pos.absolute_altitude_m, 2)
  })
};

export const ATTITUDE: FetcherDefinition<EulerAngle> = {
  category: 'attitude',
  label: 'Attitude',
  subscribe: (source, signal) => source.attitude_euler(signal),
  transform: (att) => ({
    roll: fixed(att.roll_deg, 2),
    pitch: fixed(att.pitch_deg, 2),
    yaw: fixed(att.yaw_deg, 2)
  })
};

export const BATTERY: FetcherDefinition<Battery> = {
  category: 'battery',
  label: 'Battery',
  subscribe: (source, signal) => source.battery(signal),
  transform: (batt) => ({
    voltage: fixed(batt.voltage_v, 2),
    battery: fixed(batt.remaining_percent, 1)
  })
};

export const GPS: FetcherDefinition<GpsInfo> = {
  category: 'gps',
  label: 'GPS',
  subscribe: (source, signal) => source.gps_info(signal),
  transform: (gps) => ({
    gps_fix: strip_prefix(gps.fix_type, 'FIX_TYPE_'),
    satellites: fixed(gps.num_satellites, 0)
  })
};

export const FLIGHT_MODE: FetcherDefinition<FlightModeUpdate> = {
  category: 'flight_mode',
  label: 'Flight mode',
  subscribe: (source, signal) => source.flight_mode(signal),
  transform: (mode) => ({
    flight_mode: strip_prefix(mode.flight_mode, 'FLIGHT_MODE_')
  })
};

export const ARMED: FetcherDefinition<ArmedUpdate> = {
  category: 'armed',
  label: 'Armed status',
  subscribe: (source, signal) => source.armed(signal),
  transform: (update) => ({
    armed: update.is_armed ? 'Yes' : 'No'
  })
};

export const RC_SIGNAL: FetcherDefinition<RcStatus> = {
  category: 'rc_signal',
  label: 'RC signal',
  subscribe: (source, signal) => source.rc_status(signal),
  transform: (rc) => ({
    rc_signal: read_rc_signal(rc)
  })
};

export const HEALTH: FetcherDefinition<Health> = {
  category: 'health',
  label: 'Health check',
  subscribe: (source, signal) => source.health(signal),
  transform: (health) => ({
    health: to_checklist(health)
  })
};

/** One fresh fetcher per category, in a fixed order. */
export function create_fetchers(options: StreamFetcherOptions = {}): SessionTask[] {
  return [
    new StreamFetcher(POSITION, options),
    new StreamFetcher(ATTITUDE, options),
    new StreamFetcher(BATTERY, options),
    new StreamFetcher(GPS, options),
    new StreamFetcher(FLIGHT_MODE, options),
    new StreamFetcher(ARMED, options),
    new StreamFetcher(RC_SIGNAL, options),
    new StreamFetcher(HEALTH, options)
  ];
}
