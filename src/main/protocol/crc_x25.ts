/**
 * CRC-16/MCRF4XX ("X.25") as used by MAVLink frame checksums.
 *
 * The checksum covers every frame byte after the start marker up to the end
 * of the payload, followed by the message's CRC_EXTRA seed byte.
 *
 * @module protocol/crc_x25
 */

import { X25_INIT } from './constants';

/**
 * Fold one byte into a running X.25 accumulator.
 *
 * @param crc - Current 16-bit accumulator.
 * @param byte - Byte to accumulate.
 * @returns Updated accumulator.
 */
export function x25_accumulate(crc: number, byte: number): number {
  let tmp = (byte ^ (crc & 0xFF)) & 0xFF;
  tmp = (tmp ^ (tmp << 4)) & 0xFF;
  return ((crc >> 8) ^ (tmp << 8) ^ (tmp << 3) ^ (tmp >> 4)) & 0xFFFF;
}

/**
 * Compute the X.25 checksum of a byte range.
 *
 * @param data - Bytes to checksum.
 * @param crc - Starting accumulator; defaults to 0xFFFF.
 */
export function x25_compute(data: Uint8Array, crc: number = X25_INIT): number {
  let acc = crc;
  for (let i = 0; i < data.length; i++) {
    acc = x25_accumulate(acc, data[i]);
  }
  return acc;
}

/**
 * Compute a MAVLink frame checksum: header-after-STX plus payload, then the
 * message-specific CRC_EXTRA byte.
 *
 * @param covered - Frame bytes from LEN through the last payload byte.
 * @param crc_extra - Seed byte for the message ID.
 */
export function mavlink_checksum(covered: Uint8Array, crc_extra: number): number {
  return x25_accumulate(x25_compute(covered), crc_extra);
}
