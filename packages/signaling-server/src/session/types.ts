/**
 * Session types shared by the table, the supervisor and the channels.
 */

import type { RelayableMessage, SignalingMessage } from '../protocol/messages.js';
import type { SessionId } from '../protocol/session-id.js';
import type { ServerConfig } from '../types.js';

/**
 * Routing handle for one open signaling channel. The session table keeps
 * these references only; the channel owns its socket.
 */
export interface Participant {
  readonly id: string;
  /** Queue a message on this participant's channel. Returns false if the channel is gone. */
  deliver(message: SignalingMessage): boolean;
  /** Send a close instruction and close the channel. Safe to call more than once. */
  close(code: number, reason: string): void;
}

/**
 * `empty` is reported for ids with no entry, `closed` for ids whose session
 * was torn down recently. Entries in the table are always in one of the
 * three live phases.
 */
export type SessionPhase = 'empty' | 'waiting' | 'paired' | 'closing' | 'closed';

interface SessionBase {
  readonly id: SessionId;
  readonly createdAt: number;
  lastActivity: number;
}

export interface WaitingSession extends SessionBase {
  phase: 'waiting';
  participant: Participant;
  /** Messages from `participant` held until a counterpart registers */
  pending: RelayableMessage[];
}

export interface PairedSession extends SessionBase {
  phase: 'paired';
  participants: readonly [Participant, Participant];
  /** Participant ids that reported a direct link */
  established: Set<string>;
}

export interface ClosingSession extends SessionBase {
  phase: 'closing';
  participants: readonly [Participant, Participant];
  /** Participant ids whose channel has closed since the instruction */
  closed: Set<string>;
  closingSince: number;
}

export type Session = WaitingSession | PairedSession | ClosingSession;

export type TeardownReason = 'established' | 'abandoned' | 'expired' | 'idle' | 'shutdown';

export type RegisterResult =
  | { status: 'waiting' }
  | { status: 'paired'; counterpart: Participant; pending: RelayableMessage[] };

export type RelayResult =
  | { status: 'relayed'; counterpart: Participant }
  | { status: 'buffered'; pending: number };

export type EstablishedResult = { status: 'acknowledged' } | { status: 'closing' };

export type SessionSupervisorConfig = ServerConfig['session'];

export interface SessionStats {
  total: number;
  waiting: number;
  paired: number;
  closing: number;
  recentlyClosed: number;
}

export interface SessionSupervisorEvents {
  'session-waiting': (sessionId: SessionId) => void;
  'session-paired': (sessionId: SessionId) => void;
  'session-closing': (sessionId: SessionId) => void;
  'session-closed': (sessionId: SessionId, reason: TeardownReason) => void;
}
