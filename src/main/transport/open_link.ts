import { parse_link_address, type TelemetryLink } from './link_types';
import { SerialLink } from './serial_link';
import { UdpLink } from './udp_link';

/**
 * Create (but do not open) the link a connection URL names.
 *
 * @throws If the URL is invalid.
 */
export function create_link(url: string): TelemetryLink {
  const address = parse_link_address(url);
  switch (address.kind) {
    case 'serial':
      return new SerialLink(address.path, address.baud);
    case 'udp':
      return new UdpLink(address.host, address.port);
  }
}
