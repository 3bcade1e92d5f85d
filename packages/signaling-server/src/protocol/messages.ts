/**
 * Signaling message variants.
 *
 * The set is closed on purpose: the codec, the channel and the supervisor
 * all switch over `type`, and the compiler checks the switches are total.
 * Offer, answer and candidate payloads are opaque bytes produced by the
 * clients' negotiation stacks; the server never looks inside them.
 */

import type { ErrorCode } from '../errors.js';
import type { SessionId } from './session-id.js';

/** First frame of every channel: the session to pair under */
export interface JoinMessage {
  type: 'join';
  sessionId: SessionId;
}

/** Registered, no counterpart yet */
export interface WaitingMessage {
  type: 'waiting';
  sessionId: SessionId;
}

/** Both participants registered; relay is active */
export interface ReadyMessage {
  type: 'ready';
  sessionId: SessionId;
}

export interface OfferMessage {
  type: 'offer';
  payload: Uint8Array;
}

export interface AnswerMessage {
  type: 'answer';
  payload: Uint8Array;
}

export interface CandidateMessage {
  type: 'candidate';
  payload: Uint8Array;
}

/** The sender's direct link is up */
export interface ConnectionEstablishedMessage {
  type: 'connection_established';
}

/** Teardown instruction; the server closes the socket right after */
export interface CloseMessage {
  type: 'close';
  code: number;
  reason: string;
}

export interface ErrorMessage {
  type: 'error';
  code: ErrorCode;
  reason: string;
}

export type NegotiationMessage = OfferMessage | AnswerMessage | CandidateMessage;

export type SignalingMessage =
  | JoinMessage
  | WaitingMessage
  | ReadyMessage
  | OfferMessage
  | AnswerMessage
  | CandidateMessage
  | ConnectionEstablishedMessage
  | CloseMessage
  | ErrorMessage;

export type SignalingMessageType = SignalingMessage['type'];

/** Variants that are only ever sent by the server */
export type ServerOnlyMessage = WaitingMessage | ReadyMessage | CloseMessage;

/** Variants a paired client may send that are forwarded to its counterpart */
export type RelayableMessage = NegotiationMessage | ErrorMessage;

export function isServerOnly(message: SignalingMessage): message is ServerOnlyMessage {
  return message.type === 'waiting' || message.type === 'ready' || message.type === 'close';
}

export function isRelayable(message: SignalingMessage): message is RelayableMessage {
  return (
    message.type === 'offer' ||
    message.type === 'answer' ||
    message.type === 'candidate' ||
    message.type === 'error'
  );
}

// -----------------------------------------------------------------------------
// Constructors
// -----------------------------------------------------------------------------

export const join = (sessionId: SessionId): JoinMessage => ({ type: 'join', sessionId });
export const waiting = (sessionId: SessionId): WaitingMessage => ({ type: 'waiting', sessionId });
export const ready = (sessionId: SessionId): ReadyMessage => ({ type: 'ready', sessionId });
export const offer = (payload: Uint8Array): OfferMessage => ({ type: 'offer', payload });
export const answer = (payload: Uint8Array): AnswerMessage => ({ type: 'answer', payload });
export const candidate = (payload: Uint8Array): CandidateMessage => ({ type: 'candidate', payload });
export const connectionEstablished = (): ConnectionEstablishedMessage => ({
  type: 'connection_established',
});
export const close = (code: number, reason: string): CloseMessage => ({ type: 'close', code, reason });
export const error = (code: ErrorCode, reason: string): ErrorMessage => ({ type: 'error', code, reason });
