/**
 * STUN Binding (RFC 5389)
 *
 * Just enough of the STUN wire format to answer Binding requests with the
 * client's server-reflexive address. No authentication, no TURN.
 *
 * Header (20 bytes):
 *   [type: u16][length: u16][magic cookie: u32][transaction id: 12 bytes]
 * followed by `length` bytes of TLV attributes, each padded to 4 bytes.
 */

import { isIPv4, isIPv6 } from 'net';
import { STUN } from '../constants.js';

export interface StunAttribute {
  type: number;
  value: Buffer;
}

export interface StunMessage {
  type: number;
  transactionId: Buffer;
  attributes: StunAttribute[];
}

export interface TransportInfo {
  address: string;
  port: number;
}

export interface MappedAddress {
  family: 'IPv4' | 'IPv6';
  address: string;
  port: number;
}

const ATTRIBUTE_HEADER_SIZE = 4;

function padded(length: number): number {
  return (length + 3) & ~3;
}

/**
 * Parse a datagram as a STUN message. Returns null for anything that is
 * not well-formed STUN; callers drop those silently.
 */
export function parseStunMessage(buf: Buffer): StunMessage | null {
  if (buf.length < STUN.HEADER_SIZE) return null;
  // The two most significant bits of every STUN message are zero
  if ((buf[0] ?? 0xff) & 0xc0) return null;
  if (buf.readUInt32BE(4) !== STUN.MAGIC_COOKIE) return null;

  const length = buf.readUInt16BE(2);
  if (length % 4 !== 0 || STUN.HEADER_SIZE + length !== buf.length) return null;

  const attributes: StunAttribute[] = [];
  let offset = STUN.HEADER_SIZE;
  while (offset < buf.length) {
    if (offset + ATTRIBUTE_HEADER_SIZE > buf.length) return null;
    const type = buf.readUInt16BE(offset);
    const valueLength = buf.readUInt16BE(offset + 2);
    const start = offset + ATTRIBUTE_HEADER_SIZE;
    if (start + padded(valueLength) > buf.length) return null;
    attributes.push({ type, value: buf.subarray(start, start + valueLength) });
    offset = start + padded(valueLength);
  }

  return {
    type: buf.readUInt16BE(0),
    transactionId: Buffer.from(buf.subarray(8, STUN.HEADER_SIZE)),
    attributes,
  };
}

export function isBindingRequest(message: StunMessage): boolean {
  return message.type === STUN.BINDING_REQUEST;
}

// -----------------------------------------------------------------------------
// Addresses
// -----------------------------------------------------------------------------

function ipv4Bytes(address: string): Buffer {
  const out = Buffer.alloc(4);
  address.split('.').forEach((part, i) => {
    out[i] = parseInt(part, 10);
  });
  return out;
}

function ipv6Bytes(address: string): Buffer {
  let zoneless = address.split('%')[0] ?? address;
  // Trailing dotted quad (64:ff9b::1.2.3.4) becomes the last two groups
  const embedded = /(\d+\.\d+\.\d+\.\d+)$/.exec(zoneless);
  if (embedded?.[1]) {
    const v4 = ipv4Bytes(embedded[1]);
    zoneless =
      zoneless.slice(0, embedded.index) + `${v4.readUInt16BE(0).toString(16)}:${v4.readUInt16BE(2).toString(16)}`;
  }
  const [head = '', tail] = zoneless.split('::');
  const headGroups = head ? head.split(':') : [];
  const tailGroups = tail ? tail.split(':') : [];
  const zeros = tail === undefined ? 0 : 8 - headGroups.length - tailGroups.length;
  const groups = [...headGroups, ...Array<string>(zeros).fill('0'), ...tailGroups];

  const out = Buffer.alloc(16);
  groups.forEach((group, i) => {
    out.writeUInt16BE(parseInt(group, 16), i * 2);
  });
  return out;
}

/**
 * Normalise an address to family and raw bytes. IPv4-mapped IPv6
 * addresses (::ffff:a.b.c.d) are reported as IPv4.
 */
function addressBytes(address: string): { family: number; bytes: Buffer } {
  const mapped = /^::ffff:(\d+\.\d+\.\d+\.\d+)$/i.exec(address);
  if (mapped?.[1]) {
    return { family: STUN.FAMILY_IPV4, bytes: ipv4Bytes(mapped[1]) };
  }
  if (isIPv4(address)) {
    return { family: STUN.FAMILY_IPV4, bytes: ipv4Bytes(address) };
  }
  if (isIPv6(address.split('%')[0] ?? address)) {
    return { family: STUN.FAMILY_IPV6, bytes: ipv6Bytes(address) };
  }
  throw new RangeError(`Not an IP address: ${address}`);
}

function formatAddress(family: number, bytes: Buffer): string {
  if (family === STUN.FAMILY_IPV4) {
    return [...bytes].join('.');
  }
  const groups: string[] = [];
  for (let i = 0; i < 16; i += 2) {
    groups.push(bytes.readUInt16BE(i).toString(16));
  }
  return groups.join(':');
}

/** Cookie followed by transaction id: the XOR key for IPv6 addresses */
function xorKey(transactionId: Buffer): Buffer {
  const key = Buffer.alloc(16);
  key.writeUInt32BE(STUN.MAGIC_COOKIE, 0);
  transactionId.copy(key, 4);
  return key;
}

function xorBytes(bytes: Buffer, key: Buffer): Buffer {
  const out = Buffer.alloc(bytes.length);
  for (let i = 0; i < bytes.length; i++) {
    out[i] = (bytes[i] ?? 0) ^ (key[i] ?? 0);
  }
  return out;
}

// -----------------------------------------------------------------------------
// Attributes
// -----------------------------------------------------------------------------

function buildAttribute(type: number, value: Buffer): Buffer {
  const out = Buffer.alloc(ATTRIBUTE_HEADER_SIZE + padded(value.length));
  out.writeUInt16BE(type, 0);
  out.writeUInt16BE(value.length, 2);
  value.copy(out, ATTRIBUTE_HEADER_SIZE);
  return out;
}

function buildMappedAddress(family: number, bytes: Buffer, port: number): Buffer {
  const value = Buffer.alloc(4 + bytes.length);
  value.writeUInt8(family, 1);
  value.writeUInt16BE(port, 2);
  bytes.copy(value, 4);
  return buildAttribute(STUN.ATTR_MAPPED_ADDRESS, value);
}

function buildXorMappedAddress(family: number, bytes: Buffer, port: number, transactionId: Buffer): Buffer {
  const value = Buffer.alloc(4 + bytes.length);
  value.writeUInt8(family, 1);
  value.writeUInt16BE(port ^ (STUN.MAGIC_COOKIE >>> 16), 2);
  xorBytes(bytes, xorKey(transactionId)).copy(value, 4);
  return buildAttribute(STUN.ATTR_XOR_MAPPED_ADDRESS, value);
}

function buildSoftware(name: string): Buffer {
  return buildAttribute(STUN.ATTR_SOFTWARE, Buffer.from(name, 'utf8'));
}

/**
 * Decode the XOR-MAPPED-ADDRESS of a parsed message, if present.
 */
export function readXorMappedAddress(message: StunMessage): MappedAddress | null {
  const attr = message.attributes.find(a => a.type === STUN.ATTR_XOR_MAPPED_ADDRESS);
  if (!attr || attr.value.length < 8) return null;

  const family = attr.value.readUInt8(1);
  const size = family === STUN.FAMILY_IPV4 ? 4 : family === STUN.FAMILY_IPV6 ? 16 : 0;
  if (size === 0 || attr.value.length !== 4 + size) return null;

  const port = attr.value.readUInt16BE(2) ^ (STUN.MAGIC_COOKIE >>> 16);
  const bytes = xorBytes(attr.value.subarray(4), xorKey(message.transactionId));
  return {
    family: family === STUN.FAMILY_IPV4 ? 'IPv4' : 'IPv6',
    address: formatAddress(family, bytes),
    port,
  };
}

// -----------------------------------------------------------------------------
// Binding
// -----------------------------------------------------------------------------

/**
 * Build a Binding success response carrying the source transport address
 * as XOR-MAPPED-ADDRESS, the same address as MAPPED-ADDRESS for older
 * clients, and SOFTWARE.
 */
export function handleBindingRequest(request: StunMessage, transport: TransportInfo): Buffer {
  const { family, bytes } = addressBytes(transport.address);
  const attributes = Buffer.concat([
    buildXorMappedAddress(family, bytes, transport.port, request.transactionId),
    buildMappedAddress(family, bytes, transport.port),
    buildSoftware(STUN.SOFTWARE_NAME),
  ]);

  const header = Buffer.alloc(STUN.HEADER_SIZE);
  header.writeUInt16BE(STUN.BINDING_SUCCESS_RESPONSE, 0);
  header.writeUInt16BE(attributes.length, 2);
  header.writeUInt32BE(STUN.MAGIC_COOKIE, 4);
  request.transactionId.copy(header, 8);

  return Buffer.concat([header, attributes]);
}

/**
 * Build a Binding request with the given transaction id. Used by probes
 * and tests.
 */
export function buildBindingRequest(transactionId: Buffer): Buffer {
  if (transactionId.length !== STUN.TRANSACTION_ID_SIZE) {
    throw new RangeError(`Transaction id must be ${STUN.TRANSACTION_ID_SIZE} bytes`);
  }
  const header = Buffer.alloc(STUN.HEADER_SIZE);
  header.writeUInt16BE(STUN.BINDING_REQUEST, 0);
  header.writeUInt16BE(0, 2);
  header.writeUInt32BE(STUN.MAGIC_COOKIE, 4);
  transactionId.copy(header, 8);
  return header;
}
