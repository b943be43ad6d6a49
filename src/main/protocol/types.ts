/**
 * Type definitions for decoded MAVLink frames and messages.
 *
 * Field names follow the MAVLink common dialect; raw integer units are
 * converted to SI units by the parser where noted.
 *
 * @module protocol/types
 */

// ---------------------------------------------------------------------------
// Frames
// ---------------------------------------------------------------------------

/** A checksum-validated MAVLink frame, before payload decoding. */
export interface MavlinkFrame {
  /** Wire protocol version. */
  version: 1 | 2;
  /** Rolling sequence number set by the sender. */
  seq: number;
  /** Sender system ID. */
  system_id: number;
  /** Sender component ID. */
  component_id: number;
  /** Message ID. */
  msg_id: number;
  /** Payload bytes as received (v2 payloads may be truncated). */
  payload: Uint8Array;
}

/** Counters kept by the frame splitter. */
export interface SplitterStats {
  /** Frames emitted. */
  frames: number;
  /** Candidate frames dropped for a checksum mismatch. */
  crc_errors: number;
  /** Well-formed frames skipped because the message ID is not decoded here. */
  unknown: number;
  /** Bytes discarded while searching for a start marker. */
  discarded_bytes: number;
}

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

/** HEARTBEAT (#0). */
export interface Heartbeat {
  custom_mode: number;
  type: number;
  autopilot: number;
  base_mode: number;
  system_status: number;
  mavlink_version: number;
}

/** SYS_STATUS (#1). */
export interface SysStatus {
  sensors_present: number;
  sensors_enabled: number;
  sensors_health: number;
  /** Main loop load, percent. */
  load_percent: number;
  /** Battery voltage in volts, or null if not reported. */
  voltage_v: number | null;
  /** Battery current in amps, or null if not reported. */
  current_a: number | null;
  /** Remaining battery, percent, or null if not reported. */
  battery_remaining_percent: number | null;
  drop_rate_comm: number;
  errors_comm: number;
}

/** GPS_RAW_INT (#24). */
export interface GpsRawInt {
  lat_deg: number;
  lon_deg: number;
  /** Altitude (MSL) in metres. */
  alt_m: number;
  eph: number;
  epv: number;
  /** Ground speed in m/s. */
  vel_mps: number;
  fix_type: number;
  satellites_visible: number;
}

/** ATTITUDE (#30), angles in radians. */
export interface Attitude {
  time_boot_ms: number;
  roll_rad: number;
  pitch_rad: number;
  yaw_rad: number;
}

/** LOCAL_POSITION_NED (#32). */
export interface LocalPositionNed {
  time_boot_ms: number;
  x_m: number;
  y_m: number;
  z_m: number;
}

/** GLOBAL_POSITION_INT (#33). */
export interface GlobalPositionInt {
  time_boot_ms: number;
  lat_deg: number;
  lon_deg: number;
  /** Altitude (MSL) in metres. */
  alt_m: number;
  /** Altitude above home in metres. */
  relative_alt_m: number;
  /** Heading in degrees, or null if unknown. */
  heading_deg: number | null;
}

/** RC_CHANNELS (#65). */
export interface RcChannels {
  time_boot_ms: number;
  channel_count: number;
  /** Raw receiver RSSI (0-254, 255 = unknown). */
  rssi: number;
}

/** HOME_POSITION (#242). */
export interface HomePosition {
  lat_deg: number;
  lon_deg: number;
  alt_m: number;
}

/** Discriminated union of every message the parser decodes. */
export type ParsedMessage =
  | { type: 'heartbeat'; data: Heartbeat }
  | { type: 'sys_status'; data: SysStatus }
  | { type: 'gps_raw_int'; data: GpsRawInt }
  | { type: 'attitude'; data: Attitude }
  | { type: 'local_position_ned'; data: LocalPositionNed }
  | { type: 'global_position_int'; data: GlobalPositionInt }
  | { type: 'rc_channels'; data: RcChannels }
  | { type: 'home_position'; data: HomePosition };

/** Result of decoding one frame. */
export type ParseResult =
  | { ok: true; message: ParsedMessage }
  | { ok: false; error: string; msg_id?: number };
