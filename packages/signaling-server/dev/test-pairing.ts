/**
 * Test Pairing Flow
 *
 * Connects two WebSocket clients to a running server, pairs them under a
 * random session id, exchanges an offer and an answer, probes the STUN
 * responder, and reports the direct link as established. Run this while
 * the server is running:
 *
 *   npx tsx dev/test-pairing.ts [signaling-port] [stun-port]
 *   npm run dev:test-pairing
 */

import { randomBytes } from 'crypto';
import { createSocket } from 'dgram';
import { WebSocket } from 'ws';
import { decode, encode, messages, type SignalingMessage } from '../src/protocol/index.js';
import { formatSessionId } from '../src/protocol/session-id.js';
import {
  buildBindingRequest,
  parseStunMessage,
  readXorMappedAddress,
} from '../src/discovery/stun-message.js';

const SIGNALING_PORT = parseInt(process.argv[2] || '9001', 10);
const STUN_PORT = parseInt(process.argv[3] || '3478', 10);

function waitFor(
  ws: WebSocket,
  type: SignalingMessage['type'],
  timeout = 10000
): Promise<SignalingMessage> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`Timeout waiting for ${type}`)), timeout);
    const handler = (data: Buffer) => {
      const msg = decode(data);
      if (msg.type === type) {
        clearTimeout(timer);
        ws.off('message', handler);
        resolve(msg);
      }
    };
    ws.on('message', handler);
  });
}

function connectWs(port: number): Promise<WebSocket> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(`ws://127.0.0.1:${port}/one-to-one`);
    const timer = setTimeout(() => { ws.close(); reject(new Error('Connection timeout')); }, 5000);
    ws.on('open', () => { clearTimeout(timer); resolve(ws); });
    ws.on('error', (err) => { clearTimeout(timer); reject(err); });
  });
}

function probeStun(port: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const socket = createSocket('udp4');
    const timer = setTimeout(() => { socket.close(); reject(new Error('STUN timeout')); }, 5000);
    socket.on('message', (buf) => {
      clearTimeout(timer);
      socket.close();
      const response = parseStunMessage(buf);
      const mapped = response ? readXorMappedAddress(response) : null;
      resolve(mapped ? `${mapped.address}:${mapped.port}` : 'unparseable response');
    });
    socket.send(buildBindingRequest(randomBytes(12)), port, '127.0.0.1');
  });
}

async function main() {
  console.log('=== Pairlink Pairing Flow Test ===');
  console.log(`Signaling: 127.0.0.1:${SIGNALING_PORT}  STUN: 127.0.0.1:${STUN_PORT}\n`);

  const sessionId = BigInt(`0x${randomBytes(16).toString('hex')}`);
  console.log(`Session: ${formatSessionId(sessionId)}`);

  const alice = await connectWs(SIGNALING_PORT);
  const bob = await connectWs(SIGNALING_PORT);

  const aliceWaiting = waitFor(alice, 'waiting');
  alice.send(encode(messages.join(sessionId)));
  await aliceWaiting;
  console.log('Alice: waiting');

  const aliceReady = waitFor(alice, 'ready');
  const bobReady = waitFor(bob, 'ready');
  bob.send(encode(messages.join(sessionId)));
  await Promise.all([aliceReady, bobReady]);
  console.log('Both: ready');

  const bobOffer = waitFor(bob, 'offer');
  alice.send(encode(messages.offer(new TextEncoder().encode('v=0 test-offer'))));
  await bobOffer;
  console.log('Bob: received offer');

  const aliceAnswer = waitFor(alice, 'answer');
  bob.send(encode(messages.answer(new TextEncoder().encode('v=0 test-answer'))));
  await aliceAnswer;
  console.log('Alice: received answer');

  console.log(`STUN reflexive address: ${await probeStun(STUN_PORT)}`);

  const aliceClose = waitFor(alice, 'close');
  const bobClose = waitFor(bob, 'close');
  alice.send(encode(messages.connectionEstablished()));
  bob.send(encode(messages.connectionEstablished()));
  const [closeA, closeB] = await Promise.all([aliceClose, bobClose]);
  if (closeA.type === 'close' && closeB.type === 'close') {
    console.log(`Both: close ${closeA.code} "${closeA.reason}"`);
  }

  alice.close();
  bob.close();
  console.log('\n=== Pairing flow complete ===');
}

main().catch((err) => {
  console.error('Pairing test failed:', err);
  process.exit(1);
});
