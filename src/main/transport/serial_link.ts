/**
 * Serial link to the vehicle's telemetry radio or USB port.
 *
 * Bytes pass through untouched in both directions; MAVLink framing belongs
 * to the consumer. Every error this link raises itself is prefixed with
 * `SerialLink:` and names the device.
 */

import { SerialPort } from 'serialport';
import { EventEmitter } from 'events';
import type { TelemetryLink } from './link_types';
import { DEFAULT_SERIAL_BAUD } from './link_types';
import { create_logger } from '../log/logger';
import { describe_error } from '../util/errors';

const log = create_logger('serial');

export class SerialLink extends EventEmitter implements TelemetryLink {
  private port: SerialPort | null = null;

  constructor(
    private readonly path: string,
    private readonly baud: number = DEFAULT_SERIAL_BAUD
  ) {
    super();
  }

  /**
   * Open the device. Aborting `signal` rejects at once with its reason; a
   * port that finishes opening after that is closed again.
   *
   * @throws If already open, if the open fails, or on abort.
   */
  async connect(signal?: AbortSignal): Promise<void> {
    if (this.port) {
      throw new Error(`SerialLink: ${this.path} already connected; call disconnect() first`);
    }
    signal?.throwIfAborted();

    const port = this.create_port();
    await this.open_port(port, signal);

    port.on('data', (buf: Buffer) => {
      this.emit('data', new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength));
    });
    port.on('error', (err: Error) => this.emit('error', err));
    port.on('close', () => {
      // A close from a port we already let go of is not ours to report.
      if (this.port === port) {
        this.port = null;
        this.emit('close');
      }
    });
    this.port = port;
  }

  /** Close the device without emitting `'close'`. No-op when not open. */
  disconnect(): void {
    const port = this.port;
    if (!port) {
      return;
    }
    this.port = null;
    port.removeAllListeners();
    this.close_port(port);
  }

  /** @throws If not connected. */
  send(data: Uint8Array): void {
    if (!this.port || !this.port.isOpen) {
      throw new Error('SerialLink: not connected');
    }
    this.port.write(Buffer.from(data));
  }

  is_connected(): boolean {
    return this.port !== null && this.port.isOpen;
  }

  describe(): string {
    return `serial ${this.path} @ ${this.baud} baud`;
  }

  // --- Private helpers ---

  private create_port(): SerialPort {
    try {
      return new SerialPort({ path: this.path, baudRate: this.baud, autoOpen: false });
    } catch (err) {
      throw new Error(`SerialLink: failed to create serial port: ${describe_error(err)}`);
    }
  }

  private open_port(port: SerialPort, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const on_abort = (): void => reject(signal?.reason);
      signal?.addEventListener('abort', on_abort, { once: true });

      port.open((err) => {
        signal?.removeEventListener('abort', on_abort);
        if (err) {
          reject(new Error(`SerialLink: failed to open ${this.path}: ${err.message}`));
          return;
        }
        if (signal?.aborted) {
          log.info(`${this.path} opened after the attempt was abandoned; closing`);
          this.close_port(port);
          return;
        }
        resolve();
      });
    });
  }

  private close_port(port: SerialPort): void {
    if (!port.isOpen) {
      return;
    }
    port.close((err) => {
      if (err) {
        log.warn(`error closing ${this.path}: ${err.message}`);
      }
    });
  }
}
