/**
 * Shared link contract and connection URL parsing.
 *
 * A link carries raw MAVLink bytes in both directions; framing happens in
 * the protocol layer. Supported URLs:
 *
 *   serial://<device>[:<baud>]   e.g. serial:///dev/ttyUSB0:57600, serial://COM11:57600
 *   udp://[<host>]:<port>        listen for the vehicle on a local UDP port
 *
 * @module transport/link_types
 */

import type { EventEmitter } from 'events';

/** Default baud rate for telemetry radios. */
export const DEFAULT_SERIAL_BAUD = 57600;

/** Bind address used when a udp:// URL omits the host. */
export const DEFAULT_UDP_HOST = '0.0.0.0';

export type LinkAddress =
  | { kind: 'serial'; path: string; baud: number }
  | { kind: 'udp'; host: string; port: number };

/**
 * Events emitted by a link:
 *
 * - `'data'`: Raw bytes received (Uint8Array).
 * - `'error'`: Transport error; the link may still be open.
 * - `'close'`: The link is gone and will not deliver more data.
 */
export interface TelemetryLink extends EventEmitter {
  /** Open the link; aborting `signal` abandons the attempt. */
  connect(signal?: AbortSignal): Promise<void>;
  disconnect(): void;
  send(data: Uint8Array): void;
  is_connected(): boolean;
  describe(): string;
}

/**
 * Parse a connection URL.
 *
 * @throws If the scheme is unsupported or the address is malformed.
 */
export function parse_link_address(url: string): LinkAddress {
  const match = /^([a-z]+):\/\/(.*)$/i.exec(url.trim());
  if (!match) {
    throw new Error(`Invalid connection URL "${url}": expected serial://<device>[:<baud>] or udp://[<host>]:<port>`);
  }

  const scheme = match[1].toLowerCase();
  const rest = match[2];

  if (scheme === 'serial') {
    const baud_match = /^(.+):(\d+)$/.exec(rest);
    const path = baud_match ? baud_match[1] : rest;
    const baud = baud_match ? Number(baud_match[2]) : DEFAULT_SERIAL_BAUD;
    if (path.length === 0) {
      throw new Error(`Invalid connection URL "${url}": missing serial device`);
    }
    if (!Number.isInteger(baud) || baud <= 0) {
      throw new Error(`Invalid connection URL "${url}": bad baud rate`);
    }
    return { kind: 'serial', path, baud };
  }

  if (scheme === 'udp' || scheme === 'udpin') {
    const udp_match = /^([^:]*):(\d+)$/.exec(rest);
    if (!udp_match) {
      throw new Error(`Invalid connection URL "${url}": expected udp://[<host>]:<port>`);
    }
    const port = Number(udp_match[2]);
    if (port <= 0 || port > 65535) {
      throw new Error(`Invalid connection URL "${url}": port out of range`);
    }
    return { kind: 'udp', host: udp_match[1] || DEFAULT_UDP_HOST, port };
  }

  throw new Error(`Unsupported connection scheme "${scheme}" in "${url}"`);
}
