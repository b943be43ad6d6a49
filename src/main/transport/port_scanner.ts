/**
 * Serial port scanner.
 *
 * Enumerates available serial ports using the `serialport` package so an
 * operator can pick the telemetry radio's device path.
 */

import { SerialPort } from 'serialport';

/** Metadata for a single serial port. */
export interface PortInfo {
  /** OS device path (e.g., COM3 on Windows, /dev/ttyUSB0 on Linux). */
  path: string;
  vid?: string;
  pid?: string;
  manufacturer?: string;
  /** Human-readable label combining manufacturer and path. */
  label: string;
}

/**
 * List available serial ports.
 *
 * @throws If the platform enumeration fails.
 */
export async function scan_ports(): Promise<PortInfo[]> {
  const raw_ports = await SerialPort.list();

  return raw_ports.map((p) => {
    const manufacturer = p.manufacturer ?? undefined;
    const label = manufacturer ? `${manufacturer} - ${p.path}` : p.path;

    return {
      path: p.path,
      vid: p.vendorId ?? undefined,
      pid: p.productId ?? undefined,
      manufacturer,
      label
    };
  });
}

/** Render ports one per line, with a connection URL ready to copy. */
export function format_port_list(ports: PortInfo[], baud: number): string[] {
  if (ports.length === 0) {
    return ['No serial ports found'];
  }
  return ports.map((p) => `serial://${p.path}:${baud}  (${p.label})`);
}
