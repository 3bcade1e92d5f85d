/**
 * Signaling Channel
 *
 * One WebSocket connection from one client. Owns the socket, decodes
 * inbound frames, and turns them into supervisor calls. It is also the
 * Participant handle the session table stores, so the supervisor can route
 * messages and close instructions back to it.
 *
 * Lifecycle:
 *   open -> joined (after a successful join) -> closed
 * The first frame must be a join. A channel that sends nothing decodable
 * before the join timeout is closed as a protocol violation.
 */

import { randomUUID } from 'crypto';
import type { RawData } from 'ws';
import { CLOSE_CODES } from '../constants.js';
import {
  DecodeError,
  ErrorCodes,
  ProtocolViolationError,
  SessionError,
  TransportError,
} from '../errors.js';
import { decode, encode } from '../protocol/codec.js';
import * as messages from '../protocol/messages.js';
import type { RelayableMessage, SignalingMessage } from '../protocol/messages.js';
import type { SessionId } from '../protocol/session-id.js';
import type { SessionSupervisor } from '../session/supervisor.js';
import type { Participant } from '../session/types.js';
import { logger } from '../utils/logger.js';

/**
 * The part of a ws WebSocket the channel writes to.
 */
export interface ChannelSocket {
  readonly readyState: number;
  readonly OPEN: number;
  send(data: Uint8Array): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
}

export interface SignalingChannelDeps {
  supervisor: SessionSupervisor;
  joinTimeout: number;
  maxDecodeErrors: number;
  /** Remote address, for logs only */
  ip: string;
}

function toBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return data;
}

export class SignalingChannel implements Participant {
  readonly id: string = randomUUID();

  private socket: ChannelSocket;
  private deps: SignalingChannelDeps;
  private sessionId: SessionId | null = null;
  private decodeErrors = 0;
  private joinTimer: ReturnType<typeof setTimeout> | null;
  private closing = false;
  private released = false;
  private socketClosed = false;

  constructor(socket: ChannelSocket, deps: SignalingChannelDeps) {
    this.socket = socket;
    this.deps = deps;
    this.joinTimer = setTimeout(() => {
      this.joinTimer = null;
      this.violate(`No join received within ${deps.joinTimeout}ms`);
    }, deps.joinTimeout);
  }

  get joinedSession(): SessionId | null {
    return this.sessionId;
  }

  get isClosing(): boolean {
    return this.closing;
  }

  // ---------------------------------------------------------------------------
  // Inbound
  // ---------------------------------------------------------------------------

  /**
   * Handle one WebSocket frame. Text frames count as undecodable.
   */
  handleFrame(data: RawData, isBinary: boolean): void {
    if (this.closing) return;

    let message: SignalingMessage;
    try {
      if (!isBinary) {
        throw new DecodeError('not_binary', 'Text frames are not accepted');
      }
      message = decode(toBytes(data));
    } catch (e) {
      if (e instanceof DecodeError) {
        this.handleDecodeError(e);
        return;
      }
      throw e;
    }

    this.dispatch(message);
  }

  private dispatch(message: SignalingMessage): void {
    const sessionId = this.sessionId;

    if (message.type === 'join') {
      if (sessionId !== null) {
        this.violate('Channel has already joined a session');
        return;
      }
      this.handleJoin(message.sessionId);
      return;
    }

    if (sessionId === null) {
      this.violate(`Expected join, got ${message.type}`);
      return;
    }

    if (messages.isRelayable(message)) {
      this.handleRelay(sessionId, message);
    } else if (messages.isServerOnly(message)) {
      this.violate(`Clients may not send ${message.type}`);
    } else {
      this.handleEstablished(sessionId);
    }
  }

  private handleJoin(sessionId: SessionId): void {
    try {
      const result = this.deps.supervisor.register(sessionId, this);

      this.sessionId = sessionId;
      this.clearJoinTimer();

      if (result.status === 'waiting') {
        this.deliver(messages.waiting(sessionId));
        return;
      }

      result.counterpart.deliver(messages.ready(sessionId));
      this.deliver(messages.ready(sessionId));
      for (const pending of result.pending) {
        this.deliver(pending);
      }
    } catch (e) {
      // A refused join leaves the channel open; the client may try another id
      this.reportSessionError(e);
    }
  }

  private handleRelay(sessionId: SessionId, message: RelayableMessage): void {
    try {
      const result = this.deps.supervisor.relay(sessionId, this, message);
      if (result.status === 'relayed' && !result.counterpart.deliver(message)) {
        this.deliver(messages.error(ErrorCodes.PEER_DISCONNECTED, 'Peer disconnected'));
      }
    } catch (e) {
      this.reportSessionError(e);
    }
  }

  private handleEstablished(sessionId: SessionId): void {
    try {
      this.deps.supervisor.reportEstablished(sessionId, this);
    } catch (e) {
      this.reportSessionError(e);
    }
  }

  private handleDecodeError(error: DecodeError): void {
    if (this.sessionId === null) {
      this.violate(`Undecodable frame before join (${error.reason})`);
      return;
    }

    this.decodeErrors++;
    logger.warn(`[Channel] Undecodable frame (${error.reason})`, {
      ip: logger.ip(this.deps.ip),
      count: this.decodeErrors,
    });

    if (this.decodeErrors > this.deps.maxDecodeErrors) {
      this.violate(`Too many undecodable frames (${this.decodeErrors})`);
      return;
    }
    this.deliver(messages.error(ErrorCodes.DECODE_ERROR, error.message));
  }

  private reportSessionError(e: unknown): void {
    if (!(e instanceof SessionError)) throw e;
    logger.debug(`[Channel] ${e.message}`, { code: e.code });
    this.deliver(messages.error(e.code, e.message));
  }

  private violate(detail: string): void {
    const violation = new ProtocolViolationError(detail, { ip: logger.ip(this.deps.ip) });
    logger.warn(`[Channel] Protocol violation: ${violation.message}`, violation.context);
    this.deliver(messages.error(violation.code, violation.message));
    // The slot is freed now, not when the close handshake finishes
    this.releaseSession();
    this.close(CLOSE_CODES.PROTOCOL_VIOLATION, 'Protocol violation');
  }

  /**
   * The socket reported a transport failure. ws follows up with a close
   * event, which releases the session.
   */
  handleTransportError(error: Error): TransportError {
    const failure = new TransportError(`Connection dropped: ${error.message}`, {
      ip: logger.ip(this.deps.ip),
    });
    logger.warn(`[Channel] ${failure.name} (${failure.code}): ${failure.message}`, failure.context);
    return failure;
  }

  // ---------------------------------------------------------------------------
  // Participant
  // ---------------------------------------------------------------------------

  deliver(message: SignalingMessage): boolean {
    try {
      if (this.socket.readyState === this.socket.OPEN) {
        this.socket.send(encode(message));
        return true;
      }
    } catch (e) {
      logger.error('[Channel] Failed to send message:', e);
    }
    return false;
  }

  /**
   * Send a close instruction, then close the socket. A second call while
   * the close handshake is still pending drops the socket outright.
   */
  close(code: number, reason: string): void {
    if (this.closing) {
      if (!this.socketClosed) this.socket.terminate();
      return;
    }
    this.closing = true;
    this.clearJoinTimer();

    this.deliver(messages.close(code, reason));
    this.socket.close(code, reason);
  }

  /**
   * The socket has closed. Releases the session slot exactly once.
   */
  handleClose(): void {
    this.clearJoinTimer();
    this.socketClosed = true;
    this.closing = true;
    this.releaseSession();
  }

  private releaseSession(): void {
    if (this.released) return;
    this.released = true;

    if (this.sessionId !== null) {
      this.deps.supervisor.release(this.sessionId, this);
    }
  }

  private clearJoinTimer(): void {
    if (this.joinTimer) {
      clearTimeout(this.joinTimer);
      this.joinTimer = null;
    }
  }
}
