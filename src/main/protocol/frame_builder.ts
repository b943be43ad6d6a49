/**
 * MAVLink frame encoder and outgoing message builders.
 *
 * The aggregator only transmits its own GCS HEARTBEAT, but the encoder is
 * general so test fixtures can produce any decoded message in either wire
 * version.
 *
 * @module protocol/frame_builder
 */

import {
  STX_V1,
  STX_V2,
  HEADER_LEN_V1,
  HEADER_LEN_V2,
  CHECKSUM_LEN,
  MAX_PAYLOAD_LEN,
  MESSAGE_INFO,
  MSG_ID_HEARTBEAT,
  MAV_TYPE_GCS,
  MAV_AUTOPILOT_INVALID,
  MAV_STATE_ACTIVE,
  MAVLINK_VERSION,
  GCS_SYSTEM_ID,
  GCS_COMPONENT_ID
} from './constants';
import { mavlink_checksum } from './crc_x25';

/** Addressing for an outgoing frame. */
export interface FrameHeader {
  version: 1 | 2;
  seq: number;
  system_id: number;
  component_id: number;
}

/**
 * Encode a payload into a complete, unsigned MAVLink frame.
 *
 * @param msg_id - Message ID; must be listed in {@link MESSAGE_INFO}.
 * @param payload - Payload bytes in wire order.
 * @param header - Version, sequence and sender IDs.
 * @throws If the message ID is unknown, does not fit v1, or the payload is too long.
 */
export function encode_frame(msg_id: number, payload: Uint8Array, header: FrameHeader): Uint8Array {
  const info = MESSAGE_INFO.get(msg_id);
  if (!info) {
    throw new Error(`encode_frame: no CRC_EXTRA for message id ${msg_id}`);
  }
  if (payload.length > MAX_PAYLOAD_LEN) {
    throw new Error(`encode_frame: payload of ${payload.length} bytes exceeds ${MAX_PAYLOAD_LEN}`);
  }
  if (header.version === 1 && msg_id > 0xFF) {
    throw new Error(`encode_frame: message id ${msg_id} cannot be sent as MAVLink v1`);
  }

  const header_len = header.version === 2 ? HEADER_LEN_V2 : HEADER_LEN_V1;
  const frame = new Uint8Array(header_len + payload.length + CHECKSUM_LEN);

  if (header.version === 2) {
    frame[0] = STX_V2;
    frame[1] = payload.length;
    frame[2] = 0; // incompat flags
    frame[3] = 0; // compat flags
    frame[4] = header.seq & 0xFF;
    frame[5] = header.system_id;
    frame[6] = header.component_id;
    frame[7] = msg_id & 0xFF;
    frame[8] = (msg_id >> 8) & 0xFF;
    frame[9] = (msg_id >> 16) & 0xFF;
  } else {
    frame[0] = STX_V1;
    frame[1] = payload.length;
    frame[2] = header.seq & 0xFF;
    frame[3] = header.system_id;
    frame[4] = header.component_id;
    frame[5] = msg_id;
  }

  frame.set(payload, header_len);

  const payload_end = header_len + payload.length;
  const crc = mavlink_checksum(frame.subarray(1, payload_end), info.crc_extra);
  frame[payload_end] = crc & 0xFF;
  frame[payload_end + 1] = (crc >> 8) & 0xFF;

  return frame;
}

/**
 * Build the ground-station HEARTBEAT the aggregator sends once per second.
 *
 * @param seq - Outgoing sequence number (wraps at 256).
 */
export function build_gcs_heartbeat(seq: number): Uint8Array {
  const payload = new Uint8Array(9);
  // custom_mode (u32) stays 0
  payload[4] = MAV_TYPE_GCS;
  payload[5] = MAV_AUTOPILOT_INVALID;
  payload[6] = 0; // base_mode
  payload[7] = MAV_STATE_ACTIVE;
  payload[8] = MAVLINK_VERSION;

  return encode_frame(MSG_ID_HEARTBEAT, payload, {
    version: 2,
    seq,
    system_id: GCS_SYSTEM_ID,
    component_id: GCS_COMPONENT_ID
  });
}
