/**
 * Contract between the aggregation core and whatever provides telemetry.
 *
 * A source exposes one independent, unbounded update stream per category and
 * a connection-state stream. Each call opens a fresh subscription; a stream
 * may fail (throw) or end at any time, and the caller decides how to recover.
 *
 * @module source/source_types
 */

import type { FixTypeLabel, FlightModeLabel } from '../protocol/px4_modes';

/** Vehicle link state. */
export interface ConnectionState {
  is_connected: boolean;
}

export interface Position {
  latitude_deg: number;
  longitude_deg: number;
  /** Altitude above home, metres. */
  relative_altitude_m: number;
  /** Altitude above mean sea level, metres. */
  absolute_altitude_m: number;
}

export interface EulerAngle {
  roll_deg: number;
  pitch_deg: number;
  yaw_deg: number;
}

export interface Battery {
  /** Volts, or null when the autopilot does not report it. */
  voltage_v: number | null;
  /** Percent, or null when the autopilot does not report it. */
  remaining_percent: number | null;
}

export interface GpsInfo {
  num_satellites: number;
  fix_type: FixTypeLabel;
}

export interface FlightModeUpdate {
  flight_mode: FlightModeLabel;
}

export interface ArmedUpdate {
  is_armed: boolean;
}

export interface RcStatus {
  was_available_once: boolean;
  is_available: boolean;
  /** Percent; null (or absent on some links) when the receiver does not report it. */
  signal_strength_percent?: number | null;
}

/** Pre-arm health flags. */
export interface Health {
  is_accelerometer_calibration_ok: boolean;
  is_armable: boolean;
  is_global_position_ok: boolean;
  is_gyrometer_calibration_ok: boolean;
  is_home_position_ok: boolean;
  is_local_position_ok: boolean;
  is_magnetometer_calibration_ok: boolean;
}

/** Provider of per-category telemetry streams for one connected vehicle. */
export interface TelemetrySource {
  connection_state(signal?: AbortSignal): AsyncIterable<ConnectionState>;
  position(signal?: AbortSignal): AsyncIterable<Position>;
  attitude_euler(signal?: AbortSignal): AsyncIterable<EulerAngle>;
  battery(signal?: AbortSignal): AsyncIterable<Battery>;
  gps_info(signal?: AbortSignal): AsyncIterable<GpsInfo>;
  flight_mode(signal?: AbortSignal): AsyncIterable<FlightModeUpdate>;
  armed(signal?: AbortSignal): AsyncIterable<ArmedUpdate>;
  rc_status(signal?: AbortSignal): AsyncIterable<RcStatus>;
  health(signal?: AbortSignal): AsyncIterable<Health>;

  /**
   * Resolve with the reason once the underlying link is lost. Rejects with
   * the signal's reason if `signal` aborts first.
   */
  until_closed(signal: AbortSignal): Promise<Error>;

  /** Release the link and end every open subscription. Idempotent. */
  close(): Promise<void>;
}
