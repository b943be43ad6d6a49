/**
 * MAVLink message decoder.
 *
 * Dispatches on the frame's message ID and returns a typed ParseResult.
 * MAVLink v2 strips trailing zero bytes from payloads, so every payload is
 * zero-extended to the message's base length before fields are read.
 *
 * All multi-byte fields are little-endian. Raw integer units (degE7, mm, mV,
 * cA) are converted to degrees, metres, volts and amps here.
 * This module never throws; errors are returned as typed results.
 *
 * @module protocol/parser
 */

import type { MavlinkFrame, ParseResult } from './types';
import {
  MESSAGE_INFO,
  MSG_ID_HEARTBEAT,
  MSG_ID_SYS_STATUS,
  MSG_ID_GPS_RAW_INT,
  MSG_ID_ATTITUDE,
  MSG_ID_LOCAL_POSITION_NED,
  MSG_ID_GLOBAL_POSITION_INT,
  MSG_ID_RC_CHANNELS,
  MSG_ID_HOME_POSITION,
  VOLTAGE_UNKNOWN,
  BATTERY_REMAINING_UNKNOWN
} from './constants';

/** degE7 → degrees. */
const DEG_E7 = 1e7;

/** Sentinel for "heading unknown" in GLOBAL_POSITION_INT. */
const HEADING_UNKNOWN = 0xFFFF;

/** Sentinel for "current not measured" in SYS_STATUS. */
const CURRENT_UNKNOWN = -1;

/**
 * Return a little-endian view over the payload, zero-extended to `length`.
 */
function payload_view(payload: Uint8Array, length: number): DataView {
  const padded = new Uint8Array(Math.max(length, payload.length));
  padded.set(payload, 0);
  return new DataView(padded.buffer);
}

function parse_heartbeat(v: DataView): ParseResult {
  return {
    ok: true,
    message: {
      type: 'heartbeat',
      data: {
        custom_mode: v.getUint32(0, true),
        type: v.getUint8(4),
        autopilot: v.getUint8(5),
        base_mode: v.getUint8(6),
        system_status: v.getUint8(7),
        mavlink_version: v.getUint8(8)
      }
    }
  };
}

function parse_sys_status(v: DataView): ParseResult {
  const voltage_mv = v.getUint16(14, true);
  const current_ca = v.getInt16(16, true);
  const remaining = v.getInt8(30);
  return {
    ok: true,
    message: {
      type: 'sys_status',
      data: {
        sensors_present: v.getUint32(0, true),
        sensors_enabled: v.getUint32(4, true),
        sensors_health: v.getUint32(8, true),
        load_percent: v.getUint16(12, true) / 10,
        voltage_v: voltage_mv === VOLTAGE_UNKNOWN ? null : voltage_mv / 1000,
        current_a: current_ca === CURRENT_UNKNOWN ? null : current_ca / 100,
        battery_remaining_percent: remaining === BATTERY_REMAINING_UNKNOWN ? null : remaining,
        drop_rate_comm: v.getUint16(18, true),
        errors_comm: v.getUint16(20, true)
      }
    }
  };
}

function parse_gps_raw_int(v: DataView): ParseResult {
  return {
    ok: true,
    message: {
      type: 'gps_raw_int',
      data: {
        lat_deg: v.getInt32(8, true) / DEG_E7,
        lon_deg: v.getInt32(12, true) / DEG_E7,
        alt_m: v.getInt32(16, true) / 1000,
        eph: v.getUint16(20, true),
        epv: v.getUint16(22, true),
        vel_mps: v.getUint16(24, true) / 100,
        fix_type: v.getUint8(28),
        satellites_visible: v.getUint8(29)
      }
    }
  };
}

function parse_attitude(v: DataView): ParseResult {
  return {
    ok: true,
    message: {
      type: 'attitude',
      data: {
        time_boot_ms: v.getUint32(0, true),
        roll_rad: v.getFloat32(4, true),
        pitch_rad: v.getFloat32(8, true),
        yaw_rad: v.getFloat32(12, true)
      }
    }
  };
}

function parse_local_position_ned(v: DataView): ParseResult {
  return {
    ok: true,
    message: {
      type: 'local_position_ned',
      data: {
        time_boot_ms: v.getUint32(0, true),
        x_m: v.getFloat32(4, true),
        y_m: v.getFloat32(8, true),
        z_m: v.getFloat32(12, true)
      }
    }
  };
}

function parse_global_position_int(v: DataView): ParseResult {
  const hdg = v.getUint16(26, true);
  return {
    ok: true,
    message: {
      type: 'global_position_int',
      data: {
        time_boot_ms: v.getUint32(0, true),
        lat_deg: v.getInt32(4, true) / DEG_E7,
        lon_deg: v.getInt32(8, true) / DEG_E7,
        alt_m: v.getInt32(12, true) / 1000,
        relative_alt_m: v.getInt32(16, true) / 1000,
        heading_deg: hdg === HEADING_UNKNOWN ? null : hdg / 100
      }
    }
  };
}

function parse_rc_channels(v: DataView): ParseResult {
  return {
    ok: true,
    message: {
      type: 'rc_channels',
      data: {
        time_boot_ms: v.getUint32(0, true),
        channel_count: v.getUint8(40),
        rssi: v.getUint8(41)
      }
    }
  };
}

function parse_home_position(v: DataView): ParseResult {
  return {
    ok: true,
    message: {
      type: 'home_position',
      data: {
        lat_deg: v.getInt32(0, true) / DEG_E7,
        lon_deg: v.getInt32(4, true) / DEG_E7,
        alt_m: v.getInt32(8, true) / 1000
      }
    }
  };
}

/**
 * Decode a validated frame into a typed message.
 *
 * @param frame - Frame produced by {@link MavlinkFrameSplitter}.
 * @returns Typed parse result (ok + message, or error description).
 */
export function parse_message(frame: MavlinkFrame): ParseResult {
  const info = MESSAGE_INFO.get(frame.msg_id);
  if (!info) {
    return { ok: false, error: `Unsupported message id ${frame.msg_id}`, msg_id: frame.msg_id };
  }

  const v = payload_view(frame.payload, info.length);

  switch (frame.msg_id) {
    case MSG_ID_HEARTBEAT:
      return parse_heartbeat(v);
    case MSG_ID_SYS_STATUS:
      return parse_sys_status(v);
    case MSG_ID_GPS_RAW_INT:
      return parse_gps_raw_int(v);
    case MSG_ID_ATTITUDE:
      return parse_attitude(v);
    case MSG_ID_LOCAL_POSITION_NED:
      return parse_local_position_ned(v);
    case MSG_ID_GLOBAL_POSITION_INT:
      return parse_global_position_int(v);
    case MSG_ID_RC_CHANNELS:
      return parse_rc_channels(v);
    case MSG_ID_HOME_POSITION:
      return parse_home_position(v);
    default:
      return { ok: false, error: `Unsupported message id ${frame.msg_id}`, msg_id: frame.msg_id };
  }
}
