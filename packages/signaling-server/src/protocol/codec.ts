/**
 * Signaling Codec
 *
 * Binary envelope for SignalingMessage. Every frame starts with a two-byte
 * header:
 *
 *   [version: u8][type: u8][body]
 *
 * Bodies by type:
 *   join / waiting / ready          [sessionId: 16 bytes, big-endian]
 *   offer / answer / candidate      [length: u32 BE][payload bytes]
 *   connection_established          (empty)
 *   close                           [code: u16 BE][reasonLen: u16 BE][reason UTF-8]
 *   error                           [codeLen: u8][code ASCII][reasonLen: u16 BE][reason UTF-8]
 *
 * Payload bytes pass through untouched, so numeric state inside them keeps
 * its width instead of going through a text round trip.
 */

import { MAX_PAYLOAD_SIZE, MESSAGE_TYPE, PROTOCOL } from '../constants.js';
import { DecodeError, isErrorCode } from '../errors.js';
import type { SignalingMessage } from './messages.js';
import { readSessionId, writeSessionId } from './session-id.js';

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

// -----------------------------------------------------------------------------
// Encoding
// -----------------------------------------------------------------------------

function header(type: number, bodyLength: number): { frame: Uint8Array; view: DataView } {
  const frame = new Uint8Array(PROTOCOL.HEADER_SIZE + bodyLength);
  frame[0] = PROTOCOL.VERSION;
  frame[1] = type;
  return { frame, view: new DataView(frame.buffer, frame.byteOffset, frame.byteLength) };
}

function encodeSessionFrame(type: number, sessionId: bigint): Uint8Array {
  const { frame } = header(type, PROTOCOL.SESSION_ID_SIZE);
  writeSessionId(sessionId, frame, PROTOCOL.HEADER_SIZE);
  return frame;
}

function encodePayloadFrame(type: number, payload: Uint8Array): Uint8Array {
  if (payload.byteLength > MAX_PAYLOAD_SIZE) {
    throw new RangeError(
      `Payload too large (${payload.byteLength} bytes, max ${MAX_PAYLOAD_SIZE})`
    );
  }
  const { frame, view } = header(type, PROTOCOL.PAYLOAD_LENGTH_SIZE + payload.byteLength);
  view.setUint32(PROTOCOL.HEADER_SIZE, payload.byteLength, false);
  frame.set(payload, PROTOCOL.HEADER_SIZE + PROTOCOL.PAYLOAD_LENGTH_SIZE);
  return frame;
}

function encodeReason(reason: string): Uint8Array {
  const bytes = textEncoder.encode(reason);
  if (bytes.byteLength > PROTOCOL.MAX_REASON_BYTES) {
    throw new RangeError(
      `Reason too long (${bytes.byteLength} bytes, max ${PROTOCOL.MAX_REASON_BYTES})`
    );
  }
  return bytes;
}

/**
 * Encode a message into a binary frame.
 * @throws RangeError if a payload or reason exceeds its size limit, or a
 * close code does not fit in 16 bits
 */
export function encode(message: SignalingMessage): Uint8Array {
  switch (message.type) {
    case 'join':
      return encodeSessionFrame(MESSAGE_TYPE.JOIN, message.sessionId);
    case 'waiting':
      return encodeSessionFrame(MESSAGE_TYPE.WAITING, message.sessionId);
    case 'ready':
      return encodeSessionFrame(MESSAGE_TYPE.READY, message.sessionId);
    case 'offer':
      return encodePayloadFrame(MESSAGE_TYPE.OFFER, message.payload);
    case 'answer':
      return encodePayloadFrame(MESSAGE_TYPE.ANSWER, message.payload);
    case 'candidate':
      return encodePayloadFrame(MESSAGE_TYPE.CANDIDATE, message.payload);
    case 'connection_established':
      return header(MESSAGE_TYPE.CONNECTION_ESTABLISHED, 0).frame;
    case 'close': {
      if (!Number.isInteger(message.code) || message.code < 0 || message.code > 0xffff) {
        throw new RangeError(`Close code ${message.code} does not fit in 16 bits`);
      }
      const reason = encodeReason(message.reason);
      const { frame, view } = header(MESSAGE_TYPE.CLOSE, 4 + reason.byteLength);
      view.setUint16(2, message.code, false);
      view.setUint16(4, reason.byteLength, false);
      frame.set(reason, 6);
      return frame;
    }
    case 'error': {
      const code = textEncoder.encode(message.code);
      const reason = encodeReason(message.reason);
      const { frame, view } = header(MESSAGE_TYPE.ERROR, 1 + code.byteLength + 2 + reason.byteLength);
      frame[2] = code.byteLength;
      frame.set(code, 3);
      view.setUint16(3 + code.byteLength, reason.byteLength, false);
      frame.set(reason, 5 + code.byteLength);
      return frame;
    }
  }
}

// -----------------------------------------------------------------------------
// Decoding
// -----------------------------------------------------------------------------

/**
 * Sequential reader over a frame. Every read checks bounds and throws a
 * DecodeError('truncated') instead of reading past the end.
 */
class FrameReader {
  private offset = PROTOCOL.HEADER_SIZE;
  private readonly view: DataView;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  private require(length: number, what: string): void {
    if (this.offset + length > this.bytes.byteLength) {
      throw new DecodeError(
        'truncated',
        `Truncated ${what}: need ${length} bytes at offset ${this.offset}, have ${this.bytes.byteLength - this.offset}`
      );
    }
  }

  u8(what: string): number {
    this.require(1, what);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  u16(what: string): number {
    this.require(2, what);
    const value = this.view.getUint16(this.offset, false);
    this.offset += 2;
    return value;
  }

  u32(what: string): number {
    this.require(4, what);
    const value = this.view.getUint32(this.offset, false);
    this.offset += 4;
    return value;
  }

  sessionId(): bigint {
    this.require(PROTOCOL.SESSION_ID_SIZE, 'session id');
    const id = readSessionId(this.bytes, this.offset);
    this.offset += PROTOCOL.SESSION_ID_SIZE;
    return id;
  }

  bytesOf(length: number, what: string): Uint8Array {
    this.require(length, what);
    // Copy so the decoded message does not alias the socket's receive buffer
    const slice = this.bytes.slice(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }

  text(length: number, what: string): string {
    const raw = this.bytesOf(length, what);
    try {
      return textDecoder.decode(raw);
    } catch {
      throw new DecodeError('invalid_utf8', `Invalid UTF-8 in ${what}`);
    }
  }

  end(): void {
    const remaining = this.bytes.byteLength - this.offset;
    if (remaining !== 0) {
      throw new DecodeError('trailing_bytes', `${remaining} trailing bytes after message body`);
    }
  }
}

function readPayload(reader: FrameReader): Uint8Array {
  const length = reader.u32('payload length');
  if (length > MAX_PAYLOAD_SIZE) {
    throw new DecodeError('payload_too_large', `Payload length ${length} exceeds ${MAX_PAYLOAD_SIZE}`);
  }
  return reader.bytesOf(length, 'payload');
}

function readReason(reader: FrameReader): string {
  const length = reader.u16('reason length');
  if (length > PROTOCOL.MAX_REASON_BYTES) {
    throw new DecodeError('payload_too_large', `Reason length ${length} exceeds ${PROTOCOL.MAX_REASON_BYTES}`);
  }
  return reader.text(length, 'reason');
}

function decodeBody(type: number, reader: FrameReader): SignalingMessage {
  switch (type) {
    case MESSAGE_TYPE.JOIN:
      return { type: 'join', sessionId: reader.sessionId() };
    case MESSAGE_TYPE.WAITING:
      return { type: 'waiting', sessionId: reader.sessionId() };
    case MESSAGE_TYPE.READY:
      return { type: 'ready', sessionId: reader.sessionId() };
    case MESSAGE_TYPE.OFFER:
      return { type: 'offer', payload: readPayload(reader) };
    case MESSAGE_TYPE.ANSWER:
      return { type: 'answer', payload: readPayload(reader) };
    case MESSAGE_TYPE.CANDIDATE:
      return { type: 'candidate', payload: readPayload(reader) };
    case MESSAGE_TYPE.CONNECTION_ESTABLISHED:
      return { type: 'connection_established' };
    case MESSAGE_TYPE.CLOSE: {
      const code = reader.u16('close code');
      return { type: 'close', code, reason: readReason(reader) };
    }
    case MESSAGE_TYPE.ERROR: {
      const codeLength = reader.u8('error code length');
      if (codeLength > PROTOCOL.MAX_ERROR_CODE_BYTES) {
        throw new DecodeError('unknown_error_code', `Error code length ${codeLength} is too long`);
      }
      const code = reader.text(codeLength, 'error code');
      if (!isErrorCode(code)) {
        throw new DecodeError('unknown_error_code', `Unknown error code: ${code}`);
      }
      return { type: 'error', code, reason: readReason(reader) };
    }
    default:
      throw new DecodeError('unknown_type', `Unknown message type: 0x${type.toString(16).padStart(2, '0')}`);
  }
}

/**
 * Decode a binary frame.
 * @throws DecodeError on empty, truncated, oversized or otherwise malformed input
 */
export function decode(bytes: Uint8Array): SignalingMessage {
  if (bytes.byteLength === 0) {
    throw new DecodeError('empty', 'Empty message');
  }
  if (bytes[0] !== PROTOCOL.VERSION) {
    throw new DecodeError('unsupported_version', `Unsupported protocol version: ${bytes[0]}`);
  }
  if (bytes.byteLength < PROTOCOL.HEADER_SIZE) {
    throw new DecodeError('truncated', 'Missing message type');
  }

  const reader = new FrameReader(bytes);
  const message = decodeBody(bytes[1] ?? 0, reader);
  reader.end();
  return message;
}
