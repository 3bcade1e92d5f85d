/**
 * 128-bit session identifiers.
 *
 * Clients pick the id out of band (a shared link, a matchmaking step) and
 * both send it in their join frame; the server only compares ids.
 */

import { PROTOCOL } from '../constants.js';

export type SessionId = bigint;

export const MAX_SESSION_ID: SessionId = (1n << 128n) - 1n;

export function isValidSessionId(value: bigint): boolean {
  return value >= 0n && value <= MAX_SESSION_ID;
}

/**
 * Parse a session id from its text form: `0x`-prefixed hex or decimal.
 * Returns null for anything that is not a 128-bit unsigned integer.
 */
export function parseSessionId(text: string): SessionId | null {
  const trimmed = text.trim();
  if (!/^(0x[0-9a-f]{1,32}|[0-9]{1,39})$/i.test(trimmed)) return null;
  const value = BigInt(trimmed);
  return isValidSessionId(value) ? value : null;
}

/**
 * Canonical text form used in logs and stats: 32 lowercase hex digits.
 */
export function formatSessionId(id: SessionId): string {
  return id.toString(16).padStart(PROTOCOL.SESSION_ID_SIZE * 2, '0');
}

/**
 * Write a session id big-endian into `target` at `offset`.
 */
export function writeSessionId(id: SessionId, target: Uint8Array, offset: number): void {
  if (!isValidSessionId(id)) {
    throw new RangeError(`Session id out of range: ${id}`);
  }
  let rest = id;
  for (let i = PROTOCOL.SESSION_ID_SIZE - 1; i >= 0; i--) {
    target[offset + i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
}

export function readSessionId(source: Uint8Array, offset: number): SessionId {
  let value = 0n;
  for (let i = 0; i < PROTOCOL.SESSION_ID_SIZE; i++) {
    value = (value << 8n) | BigInt(source[offset + i] ?? 0);
  }
  return value;
}
