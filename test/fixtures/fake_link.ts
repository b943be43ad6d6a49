/**
 * In-process telemetry link: tests push bytes in and inspect what was sent.
 *
 * @module test/fixtures/fake_link
 */

import { EventEmitter } from 'events';
import type { TelemetryLink } from '../../src/main/transport/link_types';

export class FakeLink extends EventEmitter implements TelemetryLink {
  sent: Uint8Array[] = [];
  connect_error: Error | null = null;
  disconnects = 0;
  private open = false;

  async connect(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    if (this.connect_error) {
      throw this.connect_error;
    }
    this.open = true;
  }

  disconnect(): void {
    this.disconnects++;
    this.open = false;
  }

  send(data: Uint8Array): void {
    this.sent.push(data);
  }

  is_connected(): boolean {
    return this.open;
  }

  describe(): string {
    return 'fake link';
  }

  feed(...frames: Uint8Array[]): void {
    for (const bytes of frames) {
      this.emit('data', bytes);
    }
  }
}
