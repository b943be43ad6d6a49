/**
 * UDP link: listens on a local port (the PX4 SITL / companion-computer
 * convention) and replies to whichever peer sent the most recent datagram.
 */

import { createSocket, type Socket, type RemoteInfo } from 'dgram';
import { EventEmitter } from 'events';
import type { TelemetryLink } from './link_types';

export class UdpLink extends EventEmitter implements TelemetryLink {
  private socket: Socket | null = null;
  private peer: { address: string; port: number } | null = null;

  constructor(
    private readonly host: string,
    private readonly port: number
  ) {
    super();
  }

  /**
   * Bind the local socket.
   *
   * @throws If already bound, if binding fails, or if `signal` aborts first.
   */
  async connect(signal?: AbortSignal): Promise<void> {
    if (this.socket) {
      throw new Error('UdpLink: already connected; call disconnect() first');
    }
    signal?.throwIfAborted();

    const socket = createSocket('udp4');

    await new Promise<void>((resolve, reject) => {
      const on_bind_error = (err: Error): void => {
        socket.removeAllListeners();
        socket.close();
        reject(new Error(`UdpLink: failed to bind ${this.host}:${this.port}: ${err.message}`));
      };
      socket.once('error', on_bind_error);
      socket.bind(this.port, this.host, () => {
        socket.off('error', on_bind_error);
        resolve();
      });
    });

    if (signal?.aborted) {
      socket.close();
      throw signal.reason;
    }

    socket.on('message', (msg: Buffer, rinfo: RemoteInfo) => {
      this.peer = { address: rinfo.address, port: rinfo.port };
      this.emit('data', new Uint8Array(msg.buffer, msg.byteOffset, msg.byteLength));
    });
    socket.on('error', (err: Error) => {
      this.emit('error', err);
    });
    socket.on('close', () => {
      if (this.socket === socket) {
        this.socket = null;
        this.emit('close');
      }
    });

    this.socket = socket;
  }

  /** Close the socket. Safe to call when not connected; does not emit `'close'`. */
  disconnect(): void {
    if (!this.socket) {
      return;
    }
    const old_socket = this.socket;
    this.socket = null;
    this.peer = null;
    old_socket.removeAllListeners();
    old_socket.close();
  }

  /**
   * Send bytes to the last peer heard from. Dropped silently until the
   * vehicle has sent something, since there is no address to reply to.
   *
   * @throws If not connected.
   */
  send(data: Uint8Array): void {
    if (!this.socket) {
      throw new Error('UdpLink: not connected');
    }
    if (!this.peer) {
      return;
    }
    this.socket.send(data, this.peer.port, this.peer.address);
  }

  is_connected(): boolean {
    return this.socket !== null;
  }

  describe(): string {
    return `udp ${this.host}:${this.port}`;
  }
}
