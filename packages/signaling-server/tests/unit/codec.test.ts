/**
 * Signaling Codec Tests
 *
 * Tests for the binary frame format:
 * - Exact byte layout of each message kind
 * - Payload bytes pass through untouched
 * - Every malformed-input class is reported as a DecodeError with its reason
 * - Size limits on encode and decode
 */

import { describe, it, expect } from 'vitest';
import { decode, encode } from '../../src/protocol/codec.js';
import * as messages from '../../src/protocol/messages.js';
import { DecodeError, ErrorCodes } from '../../src/errors.js';
import { MAX_PAYLOAD_SIZE } from '../../src/constants.js';

function decodeFailure(bytes: number[]): DecodeError {
  try {
    decode(Uint8Array.from(bytes));
  } catch (e) {
    if (e instanceof DecodeError) return e;
    throw e;
  }
  throw new Error('expected decode to fail');
}

describe('codec', () => {
  describe('encode', () => {
    it('should lay out a join frame as version, type, 16-byte big-endian id', () => {
      const frame = encode(messages.join(0x1n));

      expect(Array.from(frame)).toEqual([1, 0x01, ...new Array<number>(15).fill(0), 1]);
    });

    it('should encode the largest session id as sixteen 0xff bytes', () => {
      const frame = encode(messages.ready((1n << 128n) - 1n));

      expect(Array.from(frame)).toEqual([1, 0x03, ...new Array<number>(16).fill(0xff)]);
    });

    it('should prefix payloads with a u32 length', () => {
      const frame = encode(messages.offer(Uint8Array.from([0xde, 0xad])));

      expect(Array.from(frame)).toEqual([1, 0x10, 0, 0, 0, 2, 0xde, 0xad]);
    });

    it('should encode connection_established as a bare header', () => {
      expect(Array.from(encode(messages.connectionEstablished()))).toEqual([1, 0x20]);
    });

    it('should encode close with code and length-prefixed reason', () => {
      const frame = encode(messages.close(4000, 'ok'));

      expect(Array.from(frame)).toEqual([1, 0x21, 0x0f, 0xa0, 0, 2, 0x6f, 0x6b]);
    });

    it('should encode error with length-prefixed code and reason', () => {
      const frame = encode(messages.error(ErrorCodes.SESSION_FULL, 'x'));

      expect(Array.from(frame)).toEqual([
        1, 0x30,
        7, ...Array.from(Buffer.from('SES_001', 'ascii')),
        0, 1, 0x78,
      ]);
    });

    it('should reject payloads over the size limit', () => {
      const payload = new Uint8Array(MAX_PAYLOAD_SIZE + 1);

      expect(() => encode(messages.candidate(payload))).toThrow(RangeError);
    });

    it('should accept a payload of exactly the size limit', () => {
      const payload = new Uint8Array(MAX_PAYLOAD_SIZE);

      expect(encode(messages.candidate(payload)).byteLength).toBe(MAX_PAYLOAD_SIZE + 6);
    });

    it('should reject reasons over 1024 bytes', () => {
      expect(() => encode(messages.close(4000, 'a'.repeat(1025)))).toThrow(RangeError);
    });

    it('should reject close codes that do not fit in 16 bits', () => {
      expect(() => encode(messages.close(70000, 'ok'))).toThrow('Close code 70000 does not fit in 16 bits');
      expect(() => encode(messages.close(-1, 'ok'))).toThrow(RangeError);
    });

    it('should accept close code 65535', () => {
      expect(Array.from(encode(messages.close(0xffff, '')))).toEqual([1, 0x21, 0xff, 0xff, 0, 0]);
    });

    it('should reject session ids wider than 128 bits', () => {
      expect(() => encode(messages.join(1n << 128n))).toThrow(RangeError);
    });
  });

  describe('decode', () => {
    it('should decode every message kind back to an equal value', () => {
      const samples = [
        messages.join(0x1234n),
        messages.waiting(0x1234n),
        messages.ready(0x1234n),
        messages.offer(Uint8Array.from([1, 2, 3])),
        messages.answer(new Uint8Array(0)),
        messages.candidate(Uint8Array.from([9])),
        messages.connectionEstablished(),
        messages.close(4001, 'Peer disconnected'),
        messages.error(ErrorCodes.NO_COUNTERPART, 'No counterpart has joined this session yet'),
      ];

      for (const message of samples) {
        expect(decode(encode(message))).toEqual(message);
      }
    });

    it('should keep 64-bit values inside payloads bit-exact', () => {
      const payload = new Uint8Array(8);
      new DataView(payload.buffer).setBigUint64(0, 0xfedcba9876543210n, false);

      const decoded = decode(encode(messages.offer(payload)));

      expect(decoded.type).toBe('offer');
      if (decoded.type === 'offer') {
        expect(new DataView(decoded.payload.buffer, decoded.payload.byteOffset, 8).getBigUint64(0, false))
          .toBe(0xfedcba9876543210n);
      }
    });

    it('should copy payload bytes out of the input buffer', () => {
      const frame = encode(messages.offer(Uint8Array.from([7, 7])));
      const decoded = decode(frame);
      frame[6] = 0;

      expect(decoded).toEqual(messages.offer(Uint8Array.from([7, 7])));
    });

    it('should decode from a Buffer view with a non-zero offset', () => {
      const frame = encode(messages.join(0x42n));
      const backing = Buffer.concat([Buffer.from([0xaa, 0xbb, 0xcc]), Buffer.from(frame)]);

      expect(decode(backing.subarray(3))).toEqual(messages.join(0x42n));
    });

    it('should report an empty frame', () => {
      const error = decodeFailure([]);

      expect(error.reason).toBe('empty');
      expect(error.code).toBe(ErrorCodes.DECODE_ERROR);
    });

    it('should report an unsupported version', () => {
      expect(decodeFailure([2, 0x01]).reason).toBe('unsupported_version');
    });

    it('should report a frame without a type byte as truncated', () => {
      expect(decodeFailure([1]).reason).toBe('truncated');
    });

    it('should report an unknown type', () => {
      const error = decodeFailure([1, 0x7f]);

      expect(error.reason).toBe('unknown_type');
      expect(error.message).toBe('Unknown message type: 0x7f');
    });

    it('should report a short session id as truncated', () => {
      expect(decodeFailure([1, 0x01, ...new Array<number>(15).fill(0)]).reason).toBe('truncated');
    });

    it('should report a payload shorter than its length prefix as truncated', () => {
      expect(decodeFailure([1, 0x10, 0, 0, 0, 3, 1, 2]).reason).toBe('truncated');
    });

    it('should report bytes after the body', () => {
      const error = decodeFailure([1, 0x20, 0]);

      expect(error.reason).toBe('trailing_bytes');
      expect(error.message).toBe('1 trailing bytes after message body');
    });

    it('should report a declared payload length over the limit', () => {
      // 65531 = MAX_PAYLOAD_SIZE + 1
      expect(decodeFailure([1, 0x10, 0, 0, 0xff, 0xfb]).reason).toBe('payload_too_large');
    });

    it('should report a declared reason length over the limit', () => {
      // 1025
      expect(decodeFailure([1, 0x21, 0x0f, 0xa0, 0x04, 0x01]).reason).toBe('payload_too_large');
    });

    it('should report invalid UTF-8 in a reason', () => {
      expect(decodeFailure([1, 0x21, 0x0f, 0xa0, 0, 1, 0xff]).reason).toBe('invalid_utf8');
    });

    it('should report an unknown error code', () => {
      const error = decodeFailure([1, 0x30, 3, 0x41, 0x42, 0x43, 0, 0]);

      expect(error.reason).toBe('unknown_error_code');
      expect(error.message).toBe('Unknown error code: ABC');
    });
  });
});
