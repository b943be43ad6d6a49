/**
 * MAVLink v1/v2 frame splitter.
 *
 * Accumulates raw link bytes and extracts checksum-validated frames. Bytes
 * before a start marker are discarded. A candidate frame whose checksum does
 * not match is treated as a false start: one byte is dropped and the search
 * resumes, so a stray 0xFD/0xFE inside garbage cannot swallow a real frame.
 * Frames for message IDs outside {@link MESSAGE_INFO} cannot be validated;
 * they are skipped whole and counted.
 *
 * @module protocol/frame_splitter
 */

import {
  STX_V1,
  STX_V2,
  HEADER_LEN_V1,
  HEADER_LEN_V2,
  CHECKSUM_LEN,
  SIGNATURE_LEN,
  INCOMPAT_FLAG_SIGNED,
  MESSAGE_INFO
} from './constants';
import { mavlink_checksum } from './crc_x25';
import type { MavlinkFrame, SplitterStats } from './types';

/** Upper bound on bytes kept between pushes; a full v2 signed frame is 280 bytes. */
const MAX_BUFFER_SIZE = 4096;

export class MavlinkFrameSplitter {
  private buffer: Uint8Array = new Uint8Array(0);
  private stats: SplitterStats = { frames: 0, crc_errors: 0, unknown: 0, discarded_bytes: 0 };

  /**
   * Feed a chunk of link bytes.
   *
   * @param chunk - Bytes as read from the link; may hold partial or several frames.
   * @returns Every complete, valid frame now available, in wire order.
   */
  push(chunk: Uint8Array): MavlinkFrame[] {
    this.append(chunk);

    const frames: MavlinkFrame[] = [];
    let offset = 0;

    while (offset < this.buffer.length) {
      const stx = this.buffer[offset];
      if (stx !== STX_V1 && stx !== STX_V2) {
        offset++;
        this.stats.discarded_bytes++;
        continue;
      }

      const outcome = this.try_frame(offset);
      if (outcome.kind === 'incomplete') {
        break;
      }
      if (outcome.kind === 'bad') {
        this.stats.crc_errors++;
        this.stats.discarded_bytes++;
        offset++;
        continue;
      }
      if (outcome.kind === 'unknown') {
        this.stats.unknown++;
      } else {
        this.stats.frames++;
        frames.push(outcome.frame);
      }
      offset += outcome.length;
    }

    this.keep_residue(offset);
    return frames;
  }

  /** Drop any partial frame (e.g. after a link reconnect). */
  reset(): void {
    this.buffer = new Uint8Array(0);
  }

  /** Copy of the running counters. */
  get_stats(): SplitterStats {
    return { ...this.stats };
  }

  // --- Private helpers ---

  private append(chunk: Uint8Array): void {
    const merged = new Uint8Array(this.buffer.length + chunk.length);
    merged.set(this.buffer, 0);
    merged.set(chunk, this.buffer.length);
    this.buffer = merged;
  }

  /** Keep the unparsed bytes from `offset` on, capped to the newest MAX_BUFFER_SIZE. */
  private keep_residue(offset: number): void {
    const start = Math.max(offset, this.buffer.length - MAX_BUFFER_SIZE);
    this.stats.discarded_bytes += start - offset;
    this.buffer = this.buffer.slice(start);
  }

  private try_frame(
    offset: number
  ):
    | { kind: 'incomplete' }
    | { kind: 'bad' }
    | { kind: 'unknown'; length: number }
    | { kind: 'frame'; length: number; frame: MavlinkFrame } {
    const buf = this.buffer;
    const available = buf.length - offset;
    const is_v2 = buf[offset] === STX_V2;
    const header_len = is_v2 ? HEADER_LEN_V2 : HEADER_LEN_V1;

    if (available < header_len) {
      return { kind: 'incomplete' };
    }

    const payload_len = buf[offset + 1];
    let total = header_len + payload_len + CHECKSUM_LEN;
    let seq: number;
    let system_id: number;
    let component_id: number;
    let msg_id: number;

    if (is_v2) {
      const incompat = buf[offset + 2];
      if ((incompat & ~INCOMPAT_FLAG_SIGNED) !== 0) {
        return { kind: 'bad' };
      }
      if (incompat & INCOMPAT_FLAG_SIGNED) {
        total += SIGNATURE_LEN;
      }
      seq = buf[offset + 4];
      system_id = buf[offset + 5];
      component_id = buf[offset + 6];
      msg_id = buf[offset + 7] | (buf[offset + 8] << 8) | (buf[offset + 9] << 16);
    } else {
      seq = buf[offset + 2];
      system_id = buf[offset + 3];
      component_id = buf[offset + 4];
      msg_id = buf[offset + 5];
    }

    if (available < total) {
      return { kind: 'incomplete' };
    }

    const info = MESSAGE_INFO.get(msg_id);
    if (!info) {
      return { kind: 'unknown', length: total };
    }

    const payload_end = offset + header_len + payload_len;
    const expected = buf[payload_end] | (buf[payload_end + 1] << 8);
    const computed = mavlink_checksum(buf.subarray(offset + 1, payload_end), info.crc_extra);
    if (computed !== expected) {
      return { kind: 'bad' };
    }

    return {
      kind: 'frame',
      length: total,
      frame: {
        version: is_v2 ? 2 : 1,
        seq,
        system_id,
        component_id,
        msg_id,
        payload: buf.slice(offset + header_len, payload_end)
      }
    };
  }
}
