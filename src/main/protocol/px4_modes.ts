/**
 * Enumerated labels for flight mode and GPS fix type.
 *
 * Labels carry their category prefix (`FLIGHT_MODE_`, `FIX_TYPE_`) the way
 * the telemetry source publishes them; the fetchers strip the prefix before
 * storing.
 *
 * @module protocol/px4_modes
 */

import type { Heartbeat } from './types';
import { MAV_AUTOPILOT_PX4, MAV_MODE_FLAG_CUSTOM_MODE_ENABLED } from './constants';

export type FlightModeLabel =
  | 'FLIGHT_MODE_UNKNOWN'
  | 'FLIGHT_MODE_READY'
  | 'FLIGHT_MODE_TAKEOFF'
  | 'FLIGHT_MODE_HOLD'
  | 'FLIGHT_MODE_MISSION'
  | 'FLIGHT_MODE_RETURN_TO_LAUNCH'
  | 'FLIGHT_MODE_LAND'
  | 'FLIGHT_MODE_OFFBOARD'
  | 'FLIGHT_MODE_FOLLOW_ME'
  | 'FLIGHT_MODE_MANUAL'
  | 'FLIGHT_MODE_ALTCTL'
  | 'FLIGHT_MODE_POSCTL'
  | 'FLIGHT_MODE_ACRO'
  | 'FLIGHT_MODE_STABILIZED'
  | 'FLIGHT_MODE_RATTITUDE';

export type FixTypeLabel =
  | 'FIX_TYPE_NO_GPS'
  | 'FIX_TYPE_NO_FIX'
  | 'FIX_TYPE_FIX_2D'
  | 'FIX_TYPE_FIX_3D'
  | 'FIX_TYPE_FIX_DGPS'
  | 'FIX_TYPE_RTK_FLOAT'
  | 'FIX_TYPE_RTK_FIXED';

// PX4 custom_mode layout: main mode in bits 16-23, sub mode in bits 24-31.
const PX4_MAIN_MANUAL = 1;
const PX4_MAIN_ALTCTL = 2;
const PX4_MAIN_POSCTL = 3;
const PX4_MAIN_AUTO = 4;
const PX4_MAIN_ACRO = 5;
const PX4_MAIN_OFFBOARD = 6;
const PX4_MAIN_STABILIZED = 7;
const PX4_MAIN_RATTITUDE = 8;

const PX4_AUTO_SUB_MODES: Readonly<Record<number, FlightModeLabel>> = {
  1: 'FLIGHT_MODE_READY',
  2: 'FLIGHT_MODE_TAKEOFF',
  3: 'FLIGHT_MODE_HOLD',
  4: 'FLIGHT_MODE_MISSION',
  5: 'FLIGHT_MODE_RETURN_TO_LAUNCH',
  6: 'FLIGHT_MODE_LAND',
  8: 'FLIGHT_MODE_FOLLOW_ME'
};

const PX4_MAIN_MODES: Readonly<Record<number, FlightModeLabel>> = {
  [PX4_MAIN_MANUAL]: 'FLIGHT_MODE_MANUAL',
  [PX4_MAIN_ALTCTL]: 'FLIGHT_MODE_ALTCTL',
  [PX4_MAIN_POSCTL]: 'FLIGHT_MODE_POSCTL',
  [PX4_MAIN_ACRO]: 'FLIGHT_MODE_ACRO',
  [PX4_MAIN_OFFBOARD]: 'FLIGHT_MODE_OFFBOARD',
  [PX4_MAIN_STABILIZED]: 'FLIGHT_MODE_STABILIZED',
  [PX4_MAIN_RATTITUDE]: 'FLIGHT_MODE_RATTITUDE'
};

/** GPS_FIX_TYPE values 0-6; STATIC (7) and PPP (8) count as a 3D fix. */
const FIX_TYPES: readonly FixTypeLabel[] = [
  'FIX_TYPE_NO_GPS',
  'FIX_TYPE_NO_FIX',
  'FIX_TYPE_FIX_2D',
  'FIX_TYPE_FIX_3D',
  'FIX_TYPE_FIX_DGPS',
  'FIX_TYPE_RTK_FLOAT',
  'FIX_TYPE_RTK_FIXED'
];

/**
 * Flight mode label from a PX4 HEARTBEAT. Non-PX4 autopilots and heartbeats
 * without custom mode report `FLIGHT_MODE_UNKNOWN`.
 */
export function flight_mode_label(hb: Heartbeat): FlightModeLabel {
  if (hb.autopilot !== MAV_AUTOPILOT_PX4 || (hb.base_mode & MAV_MODE_FLAG_CUSTOM_MODE_ENABLED) === 0) {
    return 'FLIGHT_MODE_UNKNOWN';
  }

  const main_mode = (hb.custom_mode >>> 16) & 0xFF;
  const sub_mode = (hb.custom_mode >>> 24) & 0xFF;

  if (main_mode === PX4_MAIN_AUTO) {
    return PX4_AUTO_SUB_MODES[sub_mode] ?? 'FLIGHT_MODE_UNKNOWN';
  }
  return PX4_MAIN_MODES[main_mode] ?? 'FLIGHT_MODE_UNKNOWN';
}

/** Fix type label from a GPS_RAW_INT fix_type value. */
export function gps_fix_label(fix_type: number): FixTypeLabel {
  if (fix_type >= FIX_TYPES.length) {
    return 'FIX_TYPE_FIX_3D';
  }
  return FIX_TYPES[fix_type];
}
