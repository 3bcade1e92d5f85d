/**
 * Client WebSocket Handler
 *
 * Thin facade over the signaling channels: wires each accepted WebSocket
 * to a SignalingChannel, tracks the open channels, and closes them on
 * shutdown. Pairing and relay decisions live in the SessionSupervisor.
 */

import { EventEmitter } from 'events';
import type { WebSocket } from 'ws';
import { CLOSE_CODES } from '../constants.js';
import type { SessionSupervisor } from '../session/supervisor.js';
import type { ServerConfig } from '../types.js';
import { isSignalingError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { SignalingChannel } from './channel.js';

export type ClientHandlerConfig = Pick<ServerConfig['channel'], 'joinTimeout' | 'maxDecodeErrors'>;

export interface ClientHandlerEvents {
  'channel-opened': (channelId: string) => void;
  'channel-closed': (channelId: string) => void;
}

export class ClientHandler extends EventEmitter {
  private supervisor: SessionSupervisor;
  private config: ClientHandlerConfig;
  private channels: Map<WebSocket, SignalingChannel> = new Map();

  constructor(supervisor: SessionSupervisor, config: ClientHandlerConfig) {
    super();
    this.supervisor = supervisor;
    this.config = config;
  }

  /**
   * Handle a new WebSocket connection
   */
  handleConnection(ws: WebSocket, ip: string): SignalingChannel {
    const channel = new SignalingChannel(ws, {
      supervisor: this.supervisor,
      joinTimeout: this.config.joinTimeout,
      maxDecodeErrors: this.config.maxDecodeErrors,
      ip,
    });
    this.channels.set(ws, channel);

    ws.on('message', (data, isBinary) => {
      try {
        channel.handleFrame(data, isBinary);
      } catch (e) {
        if (isSignalingError(e)) {
          logger.warn(`[ClientHandler] ${e.name} (${e.code}): ${e.message}`, e.context);
        } else {
          logger.error('[ClientHandler] Unexpected error handling frame:', e);
        }
      }
    });

    ws.on('close', () => {
      this.handleDisconnect(ws);
    });

    ws.on('error', (error) => {
      channel.handleTransportError(error);
    });

    this.emit('channel-opened', channel.id);
    return channel;
  }

  /**
   * Handle a closed WebSocket. Safe to call more than once.
   */
  handleDisconnect(ws: WebSocket): void {
    const channel = this.channels.get(ws);
    if (!channel) return;
    this.channels.delete(ws);

    try {
      channel.handleClose();
    } catch (e) {
      logger.error('[ClientHandler] Unexpected error in handleDisconnect:', e);
    }
    this.emit('channel-closed', channel.id);
  }

  get channelCount(): number {
    return this.channels.size;
  }

  // ---------------------------------------------------------------------------
  // Shutdown
  // ---------------------------------------------------------------------------

  shutdown(): void {
    for (const channel of this.channels.values()) {
      if (!channel.isClosing) {
        channel.close(CLOSE_CODES.GOING_AWAY, 'Server shutting down');
      }
    }
    this.channels.clear();
  }
}
