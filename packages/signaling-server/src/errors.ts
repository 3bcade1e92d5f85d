/**
 * Centralized error handling for the signaling server.
 *
 * Every failure that can reach a client carries one of the codes below; the
 * codec puts the code on the wire inside an `error` frame, so clients can
 * match on it without parsing the human-readable reason.
 */

export const ErrorCodes = {
  // Protocol errors (SIG_xxx)
  PROTOCOL_VIOLATION: 'SIG_001',
  DECODE_ERROR: 'SIG_002',

  // Session errors (SES_xxx)
  SESSION_FULL: 'SES_001',
  UNKNOWN_SESSION: 'SES_002',
  NOT_A_PARTICIPANT: 'SES_003',
  NO_COUNTERPART: 'SES_004',
  SESSION_CLOSING: 'SES_005',
  SESSION_CLOSED: 'SES_006',
  ALREADY_REGISTERED: 'SES_007',
  PEER_DISCONNECTED: 'SES_008',
  SESSION_EXPIRED: 'SES_009',
  PENDING_DROPPED: 'SES_010',

  // Transport errors (NET_xxx)
  TRANSPORT_ERROR: 'NET_001',

  // Relayed from a client's own negotiation stack
  APPLICATION_ERROR: 'APP_001',

  // Server configuration
  INVALID_CONFIG: 'CFG_001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

const KNOWN_CODES: ReadonlySet<string> = new Set<string>(Object.values(ErrorCodes));

export function isErrorCode(value: string): value is ErrorCode {
  return KNOWN_CODES.has(value);
}

export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCodes.PROTOCOL_VIOLATION]: 'Protocol violation',
  [ErrorCodes.DECODE_ERROR]: 'Malformed message',
  [ErrorCodes.SESSION_FULL]: 'Session already has two participants',
  [ErrorCodes.UNKNOWN_SESSION]: 'No such session',
  [ErrorCodes.NOT_A_PARTICIPANT]: 'Not a participant of this session',
  [ErrorCodes.NO_COUNTERPART]: 'No counterpart has joined this session yet',
  [ErrorCodes.SESSION_CLOSING]: 'Session is closing',
  [ErrorCodes.SESSION_CLOSED]: 'Session id has already been used',
  [ErrorCodes.ALREADY_REGISTERED]: 'Already registered in this session',
  [ErrorCodes.PEER_DISCONNECTED]: 'Peer disconnected',
  [ErrorCodes.SESSION_EXPIRED]: 'Session expired',
  [ErrorCodes.PENDING_DROPPED]: 'Buffered messages were dropped before a peer joined',
  [ErrorCodes.TRANSPORT_ERROR]: 'Connection error',
  [ErrorCodes.APPLICATION_ERROR]: 'Peer reported an error',
  [ErrorCodes.INVALID_CONFIG]: 'Invalid configuration',
};

/**
 * Base error class for all signaling server errors.
 */
export class SignalingError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SignalingError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Traffic that breaks the channel contract: anything before join, a second
 * join, a server-only message type, or too many undecodable frames.
 * Always ends the channel.
 */
export class ProtocolViolationError extends SignalingError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCodes.PROTOCOL_VIOLATION, context);
    this.name = 'ProtocolViolationError';
  }
}

export type DecodeErrorReason =
  | 'empty'
  | 'unsupported_version'
  | 'unknown_type'
  | 'truncated'
  | 'trailing_bytes'
  | 'payload_too_large'
  | 'invalid_utf8'
  | 'unknown_error_code'
  | 'not_binary';

export class DecodeError extends SignalingError {
  constructor(
    public readonly reason: DecodeErrorReason,
    message: string
  ) {
    super(message, ErrorCodes.DECODE_ERROR, { reason });
    this.name = 'DecodeError';
  }
}

export type SessionErrorCode =
  | typeof ErrorCodes.SESSION_FULL
  | typeof ErrorCodes.UNKNOWN_SESSION
  | typeof ErrorCodes.NOT_A_PARTICIPANT
  | typeof ErrorCodes.NO_COUNTERPART
  | typeof ErrorCodes.SESSION_CLOSING
  | typeof ErrorCodes.SESSION_CLOSED
  | typeof ErrorCodes.ALREADY_REGISTERED;

/**
 * A registration or relay attempt the session table refused. Reported to
 * the requesting client only; other sessions are unaffected.
 */
export class SessionError extends SignalingError {
  constructor(code: SessionErrorCode, context?: Record<string, unknown>) {
    super(ErrorMessages[code], code, context);
    this.name = 'SessionError';
  }
}

export class TransportError extends SignalingError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCodes.TRANSPORT_ERROR, context);
    this.name = 'TransportError';
  }
}

export class ConfigError extends SignalingError {
  constructor(message: string) {
    super(message, ErrorCodes.INVALID_CONFIG);
    this.name = 'ConfigError';
  }
}

/**
 * Check if an error is a signaling server error.
 */
export function isSignalingError(error: unknown): error is SignalingError {
  return error instanceof SignalingError;
}
