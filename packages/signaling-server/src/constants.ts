/**
 * Centralized constants for the Pairlink signaling server.
 *
 * Wire-format numbers, size limits, close codes and default timings live
 * here so the codec, the session supervisor and the bootstrap agree on them.
 */

// =============================================================================
// WEBSOCKET CONSTANTS
// =============================================================================

export const WEBSOCKET = {
  /** Maximum frame size (64KB) - matches WebSocket server maxPayload */
  MAX_MESSAGE_SIZE: 64 * 1024,

  /** Default path clients upgrade on */
  DEFAULT_PATH: '/one-to-one',
} as const;

// =============================================================================
// CLOSE CODES
// =============================================================================

export const CLOSE_CODES = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  TRY_AGAIN_LATER: 1013,

  /** Both peers reported a direct link; signaling is no longer needed */
  ESTABLISHED: 4000,

  /** The counterpart disconnected before the link was established */
  PEER_LEFT: 4001,

  /** Out-of-order or malformed traffic */
  PROTOCOL_VIOLATION: 4002,

  /** Reaped by the periodic sweep */
  SESSION_EXPIRED: 4003,
} as const;

// =============================================================================
// SIGNALING ENVELOPE
// =============================================================================

export const PROTOCOL = {
  VERSION: 1,

  /** version + type */
  HEADER_SIZE: 2,

  /** 128-bit session id */
  SESSION_ID_SIZE: 16,

  /** u32 length prefix for opaque payloads */
  PAYLOAD_LENGTH_SIZE: 4,

  /** Reason strings in close / error frames are capped to fit a u16 prefix */
  MAX_REASON_BYTES: 1024,

  /** Error codes are short ASCII identifiers like SES_001 */
  MAX_ERROR_CODE_BYTES: 32,
} as const;

/**
 * Largest opaque payload an offer / answer / candidate can carry while the
 * whole frame still fits into one WebSocket message.
 */
export const MAX_PAYLOAD_SIZE =
  WEBSOCKET.MAX_MESSAGE_SIZE - PROTOCOL.HEADER_SIZE - PROTOCOL.PAYLOAD_LENGTH_SIZE;

export const MESSAGE_TYPE = {
  JOIN: 0x01,
  WAITING: 0x02,
  READY: 0x03,
  OFFER: 0x10,
  ANSWER: 0x11,
  CANDIDATE: 0x12,
  CONNECTION_ESTABLISHED: 0x20,
  CLOSE: 0x21,
  ERROR: 0x30,
} as const;

// =============================================================================
// SESSION DEFAULTS
// =============================================================================

export const SESSION = {
  /** Messages buffered while waiting for a counterpart (0 = reject with NO_COUNTERPART) */
  DEFAULT_MAX_PENDING_MESSAGES: 0,

  /** Unpaired sessions are reaped after 5 minutes */
  DEFAULT_WAITING_TIMEOUT: 5 * 60 * 1000,

  /** Paired sessions without traffic are reaped after 10 minutes */
  DEFAULT_IDLE_TIMEOUT: 10 * 60 * 1000,

  /** Time both channels get to close after the teardown instruction */
  DEFAULT_CLOSING_GRACE_PERIOD: 5000,

  /** How long a closed id stays rejected when reuse is disabled */
  DEFAULT_CLOSED_SESSION_TTL: 10 * 60 * 1000,
} as const;

// =============================================================================
// CHANNEL DEFAULTS
// =============================================================================

export const CHANNEL = {
  /** A client must send its join frame within 10 seconds */
  DEFAULT_JOIN_TIMEOUT: 10000,

  /** Undecodable frames tolerated after join before the channel is closed */
  DEFAULT_MAX_DECODE_ERRORS: 3,
} as const;

// =============================================================================
// CONNECTION LIMITS
// =============================================================================

export const CONNECTION_LIMITS = {
  MAX_CONNECTIONS_PER_IP: 20,
  MAX_TOTAL_CONNECTIONS: 10000,
} as const;

// =============================================================================
// STUN (RFC 5389)
// =============================================================================

export const STUN = {
  DEFAULT_PORT: 3478,
  HEADER_SIZE: 20,
  MAGIC_COOKIE: 0x2112a442,
  TRANSACTION_ID_SIZE: 12,

  BINDING_REQUEST: 0x0001,
  BINDING_SUCCESS_RESPONSE: 0x0101,

  ATTR_MAPPED_ADDRESS: 0x0001,
  ATTR_XOR_MAPPED_ADDRESS: 0x0020,
  ATTR_SOFTWARE: 0x8022,

  FAMILY_IPV4: 0x01,
  FAMILY_IPV6: 0x02,

  SOFTWARE_NAME: 'pairlink',
} as const;
