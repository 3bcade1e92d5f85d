/**
 * Address-discovery responder.
 *
 * Listens on a UDP socket and answers STUN Binding requests with the
 * sender's reflexive address. Every datagram is handled on its own; there
 * is no state between probes and nothing is shared with the session table.
 */

import { createSocket, type RemoteInfo, type Socket } from 'dgram';
import { isIPv6 } from 'net';
import { TransportError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { handleBindingRequest, isBindingRequest, parseStunMessage } from './stun-message.js';

export interface DiscoveryResponderOptions {
  host: string;
  port: number;
  /** Use an existing socket instead of creating one for the host's family */
  socket?: Socket;
}

export interface DiscoveryStats {
  received: number;
  answered: number;
  dropped: number;
}

export interface DiscoveryResponder {
  socket: Socket;
  /** Bound port, available once `listen` resolves */
  readonly port: number;
  listen: () => Promise<void>;
  stats: () => DiscoveryStats;
  close: () => Promise<void>;
}

export function createDiscoveryResponder(options: DiscoveryResponderOptions): DiscoveryResponder {
  const socket = options.socket ?? createSocket(isIPv6(options.host) ? 'udp6' : 'udp4');
  const stats: DiscoveryStats = { received: 0, answered: 0, dropped: 0 };
  let boundPort = 0;

  socket.on('message', (buf: Buffer, rinfo: RemoteInfo) => {
    stats.received++;

    const request = parseStunMessage(buf);
    if (!request || !isBindingRequest(request)) {
      stats.dropped++;
      logger.probeEvent('dropped', rinfo.address);
      return;
    }

    let response: Buffer;
    try {
      response = handleBindingRequest(request, { address: rinfo.address, port: rinfo.port });
    } catch (e) {
      stats.dropped++;
      logger.warn('[STUN] Could not build binding response', { error: String(e) });
      return;
    }

    socket.send(response, rinfo.port, rinfo.address, (err) => {
      if (err) {
        logger.warn(`[STUN] Send failed: ${err.message}`, { ip: logger.ip(rinfo.address) });
      }
    });
    stats.answered++;
    logger.probeEvent('answered', rinfo.address);
  });

  socket.on('error', (err) => {
    logger.error('[STUN] Socket error:', err);
  });

  return {
    socket,
    get port() {
      return boundPort;
    },
    listen() {
      return new Promise<void>((resolve, reject) => {
        const onError = (err: Error) => {
          reject(new TransportError(`STUN bind failed on ${options.host}:${options.port}: ${err.message}`));
        };
        socket.once('error', onError);
        socket.bind(options.port, options.host, () => {
          socket.off('error', onError);
          boundPort = socket.address().port;
          logger.info(`[STUN] Listening on ${options.host}:${boundPort}`);
          resolve();
        });
      });
    },
    stats() {
      return { ...stats };
    },
    close() {
      return new Promise<void>((resolve) => {
        socket.close(() => resolve());
      });
    },
  };
}
