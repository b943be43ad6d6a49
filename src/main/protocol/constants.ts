/**
 * MAVLink protocol constants for the telemetry aggregator.
 *
 * Start-of-frame markers, header sizes, message IDs, per-message CRC_EXTRA
 * seeds and wire lengths, and the enum/bitmask values the telemetry source
 * interprets. Only the messages the aggregator decodes are listed.
 *
 * @module protocol/constants
 */

// ---------------------------------------------------------------------------
// Framing
// ---------------------------------------------------------------------------

/** Start-of-frame marker for MAVLink v1. */
export const STX_V1 = 0xFE;

/** Start-of-frame marker for MAVLink v2. */
export const STX_V2 = 0xFD;

/** v1 header: STX, LEN, SEQ, SYSID, COMPID, MSGID. */
export const HEADER_LEN_V1 = 6;

/** v2 header: STX, LEN, INCOMPAT, COMPAT, SEQ, SYSID, COMPID, MSGID (3 bytes). */
export const HEADER_LEN_V2 = 10;

/** Checksum trailer length (both versions). */
export const CHECKSUM_LEN = 2;

/** Signature block appended to signed v2 frames. */
export const SIGNATURE_LEN = 13;

/** v2 incompatibility flag: frame carries a signature. */
export const INCOMPAT_FLAG_SIGNED = 0x01;

/** Largest payload either version can carry. */
export const MAX_PAYLOAD_LEN = 255;

// ---------------------------------------------------------------------------
// Message IDs
// ---------------------------------------------------------------------------

export const MSG_ID_HEARTBEAT = 0;
export const MSG_ID_SYS_STATUS = 1;
export const MSG_ID_GPS_RAW_INT = 24;
export const MSG_ID_ATTITUDE = 30;
export const MSG_ID_LOCAL_POSITION_NED = 32;
export const MSG_ID_GLOBAL_POSITION_INT = 33;
export const MSG_ID_RC_CHANNELS = 65;
export const MSG_ID_HOME_POSITION = 242;

/** Per-message CRC seed and base (non-extension) payload length. */
export interface MessageInfo {
  crc_extra: number;
  length: number;
}

/** Message table keyed by message ID. Frames for IDs not listed are skipped. */
export const MESSAGE_INFO: ReadonlyMap<number, MessageInfo> = new Map([
  [MSG_ID_HEARTBEAT, { crc_extra: 50, length: 9 }],
  [MSG_ID_SYS_STATUS, { crc_extra: 124, length: 31 }],
  [MSG_ID_GPS_RAW_INT, { crc_extra: 24, length: 30 }],
  [MSG_ID_ATTITUDE, { crc_extra: 39, length: 28 }],
  [MSG_ID_LOCAL_POSITION_NED, { crc_extra: 185, length: 28 }],
  [MSG_ID_GLOBAL_POSITION_INT, { crc_extra: 104, length: 28 }],
  [MSG_ID_RC_CHANNELS, { crc_extra: 118, length: 42 }],
  [MSG_ID_HOME_POSITION, { crc_extra: 104, length: 52 }]
]);

// ---------------------------------------------------------------------------
// CRC (X.25 / CRC-16/MCRF4XX)
// ---------------------------------------------------------------------------

/** Initial accumulator value. */
export const X25_INIT = 0xFFFF;

// ---------------------------------------------------------------------------
// HEARTBEAT enums
// ---------------------------------------------------------------------------

/** MAV_TYPE_GCS: heartbeats of this type come from ground stations. */
export const MAV_TYPE_GCS = 6;

/** MAV_AUTOPILOT_INVALID: sent by components that are not flight controllers. */
export const MAV_AUTOPILOT_INVALID = 8;

/** MAV_AUTOPILOT_PX4. */
export const MAV_AUTOPILOT_PX4 = 12;

/** MAV_MODE_FLAG_CUSTOM_MODE_ENABLED. */
export const MAV_MODE_FLAG_CUSTOM_MODE_ENABLED = 0x01;

/** MAV_MODE_FLAG_SAFETY_ARMED. */
export const MAV_MODE_FLAG_SAFETY_ARMED = 0x80;

/** MAV_STATE_ACTIVE, reported in our own GCS heartbeat. */
export const MAV_STATE_ACTIVE = 4;

/** MAVLink protocol version byte carried in HEARTBEAT. */
export const MAVLINK_VERSION = 3;

// ---------------------------------------------------------------------------
// SYS_STATUS sensor bits
// ---------------------------------------------------------------------------

export const SENSOR_3D_GYRO = 0x01;
export const SENSOR_3D_ACCEL = 0x02;
export const SENSOR_3D_MAG = 0x04;
export const SENSOR_PREARM_CHECK = 0x10000000;

/** voltage_battery value meaning "not sent by autopilot". */
export const VOLTAGE_UNKNOWN = 0xFFFF;

/** battery_remaining value meaning "not sent by autopilot". */
export const BATTERY_REMAINING_UNKNOWN = -1;

// ---------------------------------------------------------------------------
// GPS / RC
// ---------------------------------------------------------------------------

/** GPS_FIX_TYPE_3D_FIX: lowest fix type counted as a usable global position. */
export const GPS_FIX_TYPE_3D = 3;

/** RC_CHANNELS rssi value meaning "invalid/unknown". */
export const RSSI_UNKNOWN = 255;

/** Full-scale RC rssi value (maps to 100 %). */
export const RSSI_MAX = 254;

// ---------------------------------------------------------------------------
// Ground-station identity and link timing
// ---------------------------------------------------------------------------

/** System ID used for our own outgoing heartbeat. */
export const GCS_SYSTEM_ID = 255;

/** Component ID used for our own outgoing heartbeat (MAV_COMP_ID_MISSIONPLANNER). */
export const GCS_COMPONENT_ID = 190;

/** Interval between outgoing GCS heartbeats. */
export const GCS_HEARTBEAT_INTERVAL_MS = 1000;

/** Vehicle is considered disconnected after this long without a heartbeat. */
export const HEARTBEAT_TIMEOUT_MS = 3000;
