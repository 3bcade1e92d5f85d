/**
 * Real Server Integration Tests
 *
 * Starts the server on loopback with OS-assigned ports and talks to it
 * over real WebSocket and UDP sockets.
 *
 * Tests covered:
 * - Health and stats endpoints
 * - Full pairing flow through forced teardown
 * - Third-participant rejection
 * - Peer disconnect notification
 * - Protocol violation close code
 * - STUN Binding probe
 */

import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { createSocket } from 'dgram';
import { randomBytes } from 'crypto';
import { createSignalingServer, type SignalingServer } from '../../src/index.js';
import * as messages from '../../src/protocol/messages.js';
import { ErrorCodes } from '../../src/errors.js';
import {
  buildBindingRequest,
  parseStunMessage,
  readXorMappedAddress,
  type MappedAddress,
} from '../../src/discovery/stun-message.js';
import { SignalingTestClient } from '../harness/signaling-client.js';

function probe(port: number, timeout = 5000): Promise<{ mapped: MappedAddress | null; localPort: number }> {
  return new Promise((resolve, reject) => {
    const socket = createSocket('udp4');
    const timer = setTimeout(() => {
      socket.close();
      reject(new Error('STUN probe timeout'));
    }, timeout);

    socket.on('message', (buf: Buffer) => {
      clearTimeout(timer);
      const localPort = socket.address().port;
      socket.close();
      const response = parseStunMessage(buf);
      resolve({ mapped: response ? readXorMappedAddress(response) : null, localPort });
    });

    socket.bind(0, '127.0.0.1', () => {
      socket.send(buildBindingRequest(randomBytes(12)), port, '127.0.0.1');
    });
  });
}

describe('Signaling server (real sockets)', () => {
  let server: SignalingServer;
  let clients: SignalingTestClient[] = [];

  async function connect(path = '/one-to-one'): Promise<SignalingTestClient> {
    const client = await SignalingTestClient.connect(`ws://127.0.0.1:${server.ports.signaling}${path}`);
    clients.push(client);
    return client;
  }

  beforeAll(async () => {
    server = await createSignalingServer({
      network: { host: '127.0.0.1', port: 0 },
      stun: { enabled: true, host: '127.0.0.1', port: 0 },
    });
  });

  afterEach(() => {
    for (const client of clients) {
      client.close();
    }
    clients = [];
  });

  afterAll(async () => {
    await server.shutdown();
  });

  describe('HTTP endpoints', () => {
    it('should report healthy', async () => {
      const response = await fetch(`http://127.0.0.1:${server.ports.signaling}/health`);
      const body: unknown = await response.json();

      expect(response.status).toBe(200);
      expect(body).toMatchObject({ status: 'healthy' });
    });

    it('should report session stats', async () => {
      const response = await fetch(`http://127.0.0.1:${server.ports.signaling}/stats`);
      const body: unknown = await response.json();

      expect(response.status).toBe(200);
      expect(body).toMatchObject({ sessions: { waiting: 0, paired: 0, closing: 0 } });
    });

    it('should answer 404 elsewhere', async () => {
      const response = await fetch(`http://127.0.0.1:${server.ports.signaling}/nope`);

      expect(response.status).toBe(404);
    });
  });

  describe('pairing flow', () => {
    it('should pair, relay and tear down two clients', async () => {
      const alice = await connect();
      const bob = await connect();

      alice.send(messages.join(0x1n));
      expect(await alice.next()).toEqual(messages.waiting(0x1n));

      bob.send(messages.join(0x1n));
      expect(await alice.next()).toEqual(messages.ready(0x1n));
      expect(await bob.next()).toEqual(messages.ready(0x1n));

      alice.send(messages.offer(Uint8Array.from([0x0a, 0x0b])));
      expect(await bob.next()).toEqual(messages.offer(Uint8Array.from([0x0a, 0x0b])));

      bob.send(messages.answer(Uint8Array.from([0x0c])));
      expect(await alice.next()).toEqual(messages.answer(Uint8Array.from([0x0c])));

      alice.send(messages.candidate(Uint8Array.from([1])));
      expect(await bob.next()).toEqual(messages.candidate(Uint8Array.from([1])));

      alice.send(messages.connectionEstablished());
      bob.send(messages.connectionEstablished());

      expect(await alice.next()).toEqual(messages.close(4000, 'Direct link established'));
      expect(await bob.next()).toEqual(messages.close(4000, 'Direct link established'));
      expect(await alice.closed).toEqual({ code: 4000, reason: 'Direct link established' });
      expect(await bob.closed).toEqual({ code: 4000, reason: 'Direct link established' });
    });

    it('should refuse a third client on a full session', async () => {
      const alice = await connect();
      const bob = await connect();
      const carol = await connect();

      alice.send(messages.join(0x2n));
      await alice.next();
      bob.send(messages.join(0x2n));
      await bob.next();

      carol.send(messages.join(0x2n));

      expect(await carol.next()).toEqual(
        messages.error(ErrorCodes.SESSION_FULL, 'Session already has two participants')
      );
    });

    it('should tell the remaining client when its peer disconnects', async () => {
      const alice = await connect();
      const bob = await connect();

      alice.send(messages.join(0x3n));
      await alice.next();
      bob.send(messages.join(0x3n));
      await alice.next();
      await bob.next();

      alice.close();

      expect(await bob.next()).toEqual(messages.error(ErrorCodes.PEER_DISCONNECTED, 'Peer disconnected'));
      expect(await bob.next()).toEqual(messages.close(4001, 'Peer disconnected'));
      expect((await bob.closed).code).toBe(4001);
    });
  });

  describe('protocol violations', () => {
    it('should close a client that sends text', async () => {
      const client = await connect();

      client.sendRaw('{"type":"join"}');

      expect((await client.closed).code).toBe(4002);
    });

    it('should refuse upgrades on other paths', async () => {
      await expect(connect('/elsewhere')).rejects.toThrow('Unexpected server response: 404');
    });
  });

  describe('STUN', () => {
    it('should answer a Binding request with the reflexive address', async () => {
      const stunPort = server.ports.stun;
      expect(stunPort).not.toBeNull();
      if (stunPort === null) return;

      const { mapped, localPort } = await probe(stunPort);

      expect(mapped).toEqual({ family: 'IPv4', address: '127.0.0.1', port: localPort });
    });
  });
});
