import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// ---------------------------------------------------------------------------
// Mock serialport. The vi.mock factory is hoisted, so the shared state it
// records into must come from vi.hoisted.
// ---------------------------------------------------------------------------

interface FakePort {
  path: string;
  baudRate: number;
  isOpen: boolean;
  written: Buffer[];
  close_calls: number;
  emit(event: string, ...args: unknown[]): boolean;
}

const mock_state = vi.hoisted(() => {
  const ports: FakePort[] = [];
  const state: {
    ports: FakePort[];
    open_error: string | null;
    hold_open: boolean;
    held_opens: Array<() => void>;
  } = { ports, open_error: null, hold_open: false, held_opens: [] };
  return state;
});

vi.mock('serialport', async () => {
  const { EventEmitter } = await import('events');

  class MockSerialPort extends EventEmitter {
    path: string;
    baudRate: number;
    isOpen = false;
    written: Buffer[] = [];
    close_calls = 0;

    constructor(opts: { path: string; baudRate: number; autoOpen: boolean }) {
      super();
      this.path = opts.path;
      this.baudRate = opts.baudRate;
      mock_state.ports.push(this);
    }

    open(cb: (err: Error | null) => void): void {
      if (mock_state.hold_open) {
        mock_state.held_opens.push(() => {
          this.isOpen = true;
          cb(null);
        });
        return;
      }
      if (mock_state.open_error) {
        cb(new Error(mock_state.open_error));
        return;
      }
      this.isOpen = true;
      cb(null);
    }

    write(data: Buffer): boolean {
      this.written.push(Buffer.from(data));
      return true;
    }

    close(cb?: (err: Error | null) => void): void {
      this.close_calls++;
      this.isOpen = false;
      process.nextTick(() => {
        cb?.(null);
        this.emit('close');
      });
    }
  }

  return { SerialPort: MockSerialPort };
});

// Import after mock is in place.
import { SerialLink } from '../serial_link';

function last_port(): FakePort {
  const port = mock_state.ports[mock_state.ports.length - 1];
  if (!port) {
    throw new Error('no serial port created');
  }
  return port;
}

describe('SerialLink', () => {
  let link: SerialLink;

  beforeEach(() => {
    mock_state.ports.length = 0;
    mock_state.open_error = null;
    mock_state.hold_open = false;
    mock_state.held_opens.length = 0;
    link = new SerialLink('/dev/ttyTEST0', 57600);
  });

  afterEach(() => {
    link.disconnect();
    link.removeAllListeners();
  });

  // --- Connection lifecycle -----------------------------------------------

  it('opens the port with the configured path and baud rate', async () => {
    await link.connect();

    expect(link.is_connected()).toBe(true);
    expect(last_port().path).toBe('/dev/ttyTEST0');
    expect(last_port().baudRate).toBe(57600);
  });

  it('reports is_connected() === false before connect', () => {
    expect(link.is_connected()).toBe(false);
  });

  it('throws when connecting twice without disconnect', async () => {
    await link.connect();
    await expect(link.connect()).rejects.toThrow(/already connected/);
  });

  it('rejects with the device path when the open fails', async () => {
    mock_state.open_error = 'Permission denied';

    await expect(link.connect()).rejects.toThrow('SerialLink: failed to open /dev/ttyTEST0: Permission denied');
    expect(link.is_connected()).toBe(false);
  });

  it('does not create a port when the attempt is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('supervisor stopped'));

    await expect(link.connect(controller.signal)).rejects.toThrow('supervisor stopped');
    expect(mock_state.ports).toHaveLength(0);
  });

  it('gives up on an aborted open and closes the port when it opens late', async () => {
    mock_state.hold_open = true;
    const controller = new AbortController();

    const pending = link.connect(controller.signal);
    controller.abort(new Error('session 1 ended'));
    await expect(pending).rejects.toThrow('session 1 ended');

    for (const finish of mock_state.held_opens) {
      finish();
    }

    expect(last_port().close_calls).toBe(1);
    expect(link.is_connected()).toBe(false);
  });

  it('can reconnect after disconnect', async () => {
    await link.connect();
    link.disconnect();
    await link.connect();

    expect(link.is_connected()).toBe(true);
    expect(mock_state.ports).toHaveLength(2);
  });

  it('disconnect is safe to call when not connected', () => {
    expect(() => link.disconnect()).not.toThrow();
  });

  it('describes itself', () => {
    expect(link.describe()).toBe('serial /dev/ttyTEST0 @ 57600 baud');
  });

  // --- Data path ------------------------------------------------------------

  it('forwards received bytes unchanged', async () => {
    await link.connect();
    const chunks: number[][] = [];
    link.on('data', (bytes: Uint8Array) => chunks.push(Array.from(bytes)));

    last_port().emit('data', Buffer.from([0xfd, 0x09, 0x00]));
    last_port().emit('data', Buffer.from([0x01]));

    expect(chunks).toEqual([[0xfd, 0x09, 0x00], [0x01]]);
  });

  it('writes outgoing bytes to the port', async () => {
    await link.connect();
    link.send(new Uint8Array([0xde, 0xad]));

    expect(last_port().written.map((b) => Array.from(b))).toEqual([[0xde, 0xad]]);
  });

  it('throws on send when not connected', () => {
    expect(() => link.send(new Uint8Array([1]))).toThrow('SerialLink: not connected');
  });

  it('re-emits port errors', async () => {
    await link.connect();
    const errors: string[] = [];
    link.on('error', (err: Error) => errors.push(err.message));

    last_port().emit('error', new Error('EIO'));

    expect(errors).toEqual(['EIO']);
  });

  // --- Close handling -------------------------------------------------------

  it('emits close when the port closes on its own', async () => {
    await link.connect();
    const on_close = vi.fn();
    link.on('close', on_close);

    last_port().emit('close');

    expect(on_close).toHaveBeenCalledTimes(1);
    expect(link.is_connected()).toBe(false);
  });

  it('does not emit close on a deliberate disconnect', async () => {
    await link.connect();
    const on_close = vi.fn();
    link.on('close', on_close);

    link.disconnect();
    await new Promise((resolve) => process.nextTick(resolve));

    expect(on_close).not.toHaveBeenCalled();
  });
});
