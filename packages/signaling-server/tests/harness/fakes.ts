/**
 * In-process stand-ins for sockets and participants.
 */

import { decode } from '../../src/protocol/codec.js';
import type { SignalingMessage } from '../../src/protocol/messages.js';
import type { ChannelSocket } from '../../src/client/channel.js';
import type { Participant } from '../../src/session/types.js';

/**
 * Records what the supervisor hands to a participant.
 */
export class FakeParticipant implements Participant {
  delivered: SignalingMessage[] = [];
  closes: Array<{ code: number; reason: string }> = [];

  constructor(readonly id: string) {}

  deliver(message: SignalingMessage): boolean {
    this.delivered.push(message);
    return true;
  }

  close(code: number, reason: string): void {
    this.closes.push({ code, reason });
  }
}

// Mock WebSocket implementation
export class MockWebSocket implements ChannelSocket {
  static readonly OPEN = 1;
  static readonly CLOSING = 2;
  static readonly CLOSED = 3;

  readyState: number = MockWebSocket.OPEN;
  readonly OPEN: number = MockWebSocket.OPEN;

  /** Decoded frames sent to the client */
  sent: SignalingMessage[] = [];
  closeCalls: Array<{ code?: number; reason?: string }> = [];
  terminated = false;

  send(data: Uint8Array): void {
    if (this.readyState === MockWebSocket.OPEN) {
      this.sent.push(decode(data));
    }
  }

  close(code?: number, reason?: string): void {
    this.closeCalls.push({ code, reason });
    this.readyState = MockWebSocket.CLOSING;
  }

  terminate(): void {
    this.terminated = true;
    this.readyState = MockWebSocket.CLOSED;
  }

  getLastMessage(): SignalingMessage | undefined {
    return this.sent[this.sent.length - 1];
  }

  clearMessages(): void {
    this.sent = [];
  }
}
