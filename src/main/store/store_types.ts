/**
 * Shape of the aggregated telemetry record.
 *
 * Every field always exists. `null` is the "unavailable" marker and is
 * distinct from any real reading, zero included. Readings are kept as the
 * formatted strings the display and the CSV log print.
 *
 * @module store/store_types
 */

// ---------------------------------------------------------------------------
// Health checklist
// ---------------------------------------------------------------------------

export type CheckStatus = 'OK' | 'FAIL';

/** Health check names, in display and log order. */
export const HEALTH_CHECK_NAMES = [
  'Accelerometer calibration',
  'Armable',
  'Global position',
  'Gyrometer calibration',
  'Home position',
  'Local position',
  'Magnetometer calibration'
] as const;

export type HealthCheckName = (typeof HEALTH_CHECK_NAMES)[number];

/** Exactly the seven named checks; replaced as a unit. */
export type HealthChecklist = Readonly<Record<HealthCheckName, CheckStatus | null>>;

// ---------------------------------------------------------------------------
// Telemetry record
// ---------------------------------------------------------------------------

export type ArmedLabel = 'Yes' | 'No';

export interface TelemetryRecord {
  /** Latitude, degrees, 6 fraction digits. */
  lat: string | null;
  /** Longitude, degrees, 6 fraction digits. */
  lon: string | null;
  /** Altitude above home, metres, 2 fraction digits. */
  alt: string | null;
  /** Altitude above mean sea level, metres, 2 fraction digits. */
  abs_alt: string | null;
  /** Ground speed. No stream populates it; always unavailable. */
  speed: string | null;
  roll: string | null;
  pitch: string | null;
  yaw: string | null;
  /** Battery voltage, volts, 2 fraction digits. */
  voltage: string | null;
  /** Battery remaining, percent, 1 fraction digit. */
  battery: string | null;
  /** GPS fix label without its category prefix, e.g. `FIX_3D`. */
  gps_fix: string | null;
  satellites: string | null;
  /** Flight mode label without its category prefix, e.g. `HOLD`. */
  flight_mode: string | null;
  armed: ArmedLabel | null;
  /** RC signal strength, percent, 1 fraction digit. */
  rc_signal: string | null;
  health: HealthChecklist;
}

export type TelemetryField = keyof TelemetryRecord;

/** A partial set of fields written by one update. */
export type TelemetryUpdate = Partial<TelemetryRecord>;

/** Scalar (non-health) fields, in CSV column order. */
export const SCALAR_FIELDS = [
  'lat',
  'lon',
  'alt',
  'abs_alt',
  'speed',
  'roll',
  'pitch',
  'yaw',
  'voltage',
  'battery',
  'gps_fix',
  'satellites',
  'flight_mode',
  'armed',
  'rc_signal'
] as const satisfies readonly Exclude<TelemetryField, 'health'>[];

export const UNAVAILABLE_HEALTH: HealthChecklist = {
  'Accelerometer calibration': null,
  'Armable': null,
  'Global position': null,
  'Gyrometer calibration': null,
  'Home position': null,
  'Local position': null,
  'Magnetometer calibration': null
};

/** Fresh record with every field unavailable. */
export function empty_record(): TelemetryRecord {
  return {
    lat: null,
    lon: null,
    alt: null,
    abs_alt: null,
    speed: null,
    roll: null,
    pitch: null,
    yaw: null,
    voltage: null,
    battery: null,
    gps_fix: null,
    satellites: null,
    flight_mode: null,
    armed: null,
    rc_signal: null,
    health: { ...UNAVAILABLE_HEALTH }
  };
}

/** Display text for the unavailable marker. */
export const UNAVAILABLE_TEXT = 'N/A';
