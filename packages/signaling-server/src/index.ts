/**
 * Pairlink Signaling Server
 *
 * Rendezvous point for two clients that want a direct connection: pairs
 * them by session id, relays their offer/answer/candidate messages, answers
 * STUN Binding probes so each can learn its public address, and closes both
 * channels once both report the direct link is up.
 */

import { createServer as createHttpServer, type Server as HttpServer } from 'http';
import type { IncomingMessage, ServerResponse } from 'http';
import { WebSocketServer, type WebSocket } from 'ws';
import { loadConfig, validateConfig, type ServerConfig } from './config.js';
import { CLOSE_CODES, WEBSOCKET } from './constants.js';
import { ClientHandler } from './client/handler.js';
import { createDiscoveryResponder, type DiscoveryResponder } from './discovery/stun-server.js';
import { SessionSupervisor } from './session/supervisor.js';
import { SessionTable } from './session/session-table.js';
import type { ServerMetadata } from './types.js';
import { logger } from './utils/logger.js';

export type ServerConfigOverrides = {
  [K in keyof ServerConfig]?: Partial<ServerConfig[K]>;
};

export interface SignalingServer {
  httpServer: HttpServer;
  wss: WebSocketServer;
  supervisor: SessionSupervisor;
  clientHandler: ClientHandler;
  discovery: DiscoveryResponder | null;
  config: ServerConfig;
  /** Bound ports; differ from config when it asked for port 0 */
  ports: { signaling: number; stun: number | null };
  shutdown: () => Promise<void>;
}

export function mergeConfig(base: ServerConfig, overrides: ServerConfigOverrides): ServerConfig {
  return {
    network: { ...base.network, ...overrides.network },
    stun: { ...base.stun, ...overrides.stun },
    session: { ...base.session, ...overrides.session },
    channel: { ...base.channel, ...overrides.channel },
    cleanup: { ...base.cleanup, ...overrides.cleanup },
  };
}

/**
 * Create and start the signaling server
 */
export async function createSignalingServer(
  configOverrides: ServerConfigOverrides = {}
): Promise<SignalingServer> {
  const config = validateConfig(mergeConfig(loadConfig(), configOverrides));
  const metadata: ServerMetadata = {
    version: process.env['APP_VERSION'] || 'unknown',
    startedAt: Date.now(),
  };

  logger.info('[Pairlink] Starting server...');

  const supervisor = new SessionSupervisor(new SessionTable(), config.session);
  const clientHandler = new ClientHandler(supervisor, {
    joinTimeout: config.channel.joinTimeout,
    maxDecodeErrors: config.channel.maxDecodeErrors,
  });

  let discovery: DiscoveryResponder | null = null;

  const requestHandler = (req: IncomingMessage, res: ServerResponse) => {
    if (req.url === '/health') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({
        status: 'healthy',
        version: metadata.version,
        env: process.env['NODE_ENV'] || 'development',
        uptime: process.uptime(),
        timestamp: new Date().toISOString(),
      }));
      return;
    }

    if (req.url === '/stats') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({
        uptime: process.uptime(),
        connections: clientHandler.channelCount,
        sessions: supervisor.stats(),
        stun: discovery ? discovery.stats() : null,
      }));
      return;
    }

    res.writeHead(404, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ error: 'Not found' }));
  };

  const httpServer = createHttpServer(requestHandler);
  const wss = new WebSocketServer({ noServer: true, maxPayload: WEBSOCKET.MAX_MESSAGE_SIZE });

  // Handle WebSocket upgrades
  httpServer.on('upgrade', (request: IncomingMessage, socket, head) => {
    const pathname = new URL(request.url || '/', `http://${request.headers.host || 'localhost'}`).pathname;

    if (pathname !== config.network.signalingPath) {
      socket.write('HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n');
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit('connection', ws, request);
    });
  });

  // Per-IP connection tracking for rate limiting
  const ipConnectionCounts = new Map<string, number>();

  wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
    const clientIp = req.socket.remoteAddress || 'unknown';

    if (clientHandler.channelCount >= config.channel.maxTotalConnections) {
      logger.clientConnection('rejected', clientIp);
      ws.close(CLOSE_CODES.TRY_AGAIN_LATER, 'Server at capacity');
      return;
    }

    const ipCount = ipConnectionCounts.get(clientIp) || 0;
    if (ipCount >= config.channel.maxConnectionsPerIp) {
      logger.clientConnection('rejected', clientIp);
      ws.close(CLOSE_CODES.TRY_AGAIN_LATER, 'Too many connections from this IP');
      return;
    }
    ipConnectionCounts.set(clientIp, ipCount + 1);

    logger.clientConnection('connected', clientIp);
    clientHandler.handleConnection(ws, clientIp);

    ws.on('close', () => {
      const count = ipConnectionCounts.get(clientIp) || 1;
      if (count <= 1) {
        ipConnectionCounts.delete(clientIp);
      } else {
        ipConnectionCounts.set(clientIp, count - 1);
      }
      logger.clientConnection('disconnected', clientIp);
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(config.network.port, config.network.host, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  const address = httpServer.address();
  const signalingPort = address && typeof address === 'object' ? address.port : config.network.port;
  logger.info(`[Pairlink] Signaling on ${config.network.host}:${signalingPort}${config.network.signalingPath}`);

  if (config.stun.enabled) {
    discovery = createDiscoveryResponder({ host: config.stun.host, port: config.stun.port });
    try {
      await discovery.listen();
    } catch (error) {
      await new Promise<void>((resolve) => httpServer.close(() => resolve()));
      throw error;
    }
  }

  // Reap unpaired, idle and overdue closing sessions
  const cleanupInterval = setInterval(() => {
    try {
      const reaped = supervisor.sweep();
      if (reaped > 0) {
        logger.info(`[Pairlink] Cleanup: reaped ${reaped} sessions`);
      }
    } catch (error) {
      logger.error('[Pairlink] Cleanup error:', error);
    }
  }, config.cleanup.interval);
  cleanupInterval.unref();

  supervisor.on('session-closed', (_sessionId, reason) => {
    if (reason !== 'established') {
      logger.debug(`[Pairlink] Session ended: ${reason}`);
    }
  });

  const shutdown = async () => {
    logger.info('[Pairlink] Shutting down...');

    clearInterval(cleanupInterval);

    supervisor.shutdown();
    clientHandler.shutdown();

    await new Promise<void>((resolve) => {
      wss.close(() => resolve());
    });

    if (discovery) {
      await discovery.close();
    }

    await new Promise<void>((resolve) => {
      httpServer.close(() => resolve());
    });

    logger.info('[Pairlink] Shutdown complete');
  };

  return {
    httpServer,
    wss,
    supervisor,
    clientHandler,
    discovery,
    config,
    ports: { signaling: signalingPort, stun: discovery ? discovery.port : null },
    shutdown,
  };
}

// Main entry point when run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  createSignalingServer()
    .then((server) => {
      const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

      for (const signal of signals) {
        process.on(signal, async () => {
          logger.info(`[Pairlink] Received ${signal}`);
          await server.shutdown();
          process.exit(0);
        });
      }
    })
    .catch((error) => {
      logger.error('[Pairlink] Failed to start:', error);
      process.exit(1);
    });
}
