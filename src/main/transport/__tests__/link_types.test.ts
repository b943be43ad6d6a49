import { describe, it, expect } from 'vitest';
import { parse_link_address, DEFAULT_SERIAL_BAUD } from '../link_types';

describe('parse_link_address', () => {
  it('parses a serial URL with an absolute device path and baud', () => {
    expect(parse_link_address('serial:///dev/ttyUSB0:57600')).toEqual({
      kind: 'serial',
      path: '/dev/ttyUSB0',
      baud: 57600
    });
  });

  it('parses a Windows COM port', () => {
    expect(parse_link_address('serial://COM11:115200')).toEqual({ kind: 'serial', path: 'COM11', baud: 115200 });
  });

  it('defaults the baud rate', () => {
    expect(parse_link_address('serial:///dev/ttyACM0')).toEqual({
      kind: 'serial',
      path: '/dev/ttyACM0',
      baud: DEFAULT_SERIAL_BAUD
    });
  });

  it('parses a UDP URL without a host', () => {
    expect(parse_link_address('udp://:14540')).toEqual({ kind: 'udp', host: '0.0.0.0', port: 14540 });
  });

  it('parses a UDP URL with a host and the udpin alias', () => {
    expect(parse_link_address('udpin://127.0.0.1:14550')).toEqual({ kind: 'udp', host: '127.0.0.1', port: 14550 });
  });

  it('ignores surrounding whitespace and scheme case', () => {
    expect(parse_link_address('  UDP://:14540 ')).toEqual({ kind: 'udp', host: '0.0.0.0', port: 14540 });
  });

  it('rejects a string without a scheme', () => {
    expect(() => parse_link_address('/dev/ttyUSB0')).toThrow(/Invalid connection URL/);
  });

  it('rejects an unsupported scheme', () => {
    expect(() => parse_link_address('tcp://localhost:5760')).toThrow('Unsupported connection scheme "tcp" in "tcp://localhost:5760"');
  });

  it('rejects a serial URL without a device', () => {
    expect(() => parse_link_address('serial://')).toThrow(/missing serial device/);
  });

  it('rejects a UDP URL without a port', () => {
    expect(() => parse_link_address('udp://localhost')).toThrow(/expected udp:\/\/\[<host>\]:<port>/);
  });

  it('rejects an out-of-range UDP port', () => {
    expect(() => parse_link_address('udp://:70000')).toThrow(/port out of range/);
  });
});
