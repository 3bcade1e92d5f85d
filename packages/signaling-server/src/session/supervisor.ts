/**
 * Session Supervisor
 *
 * Enforces the pairing policy (two participants per session id) and the
 * forced-teardown policy (close both channels once both report a direct
 * link), and reaps sessions that never pair or go quiet.
 *
 * Every table mutation below runs to completion before any participant is
 * handed a message or a close instruction, so a slow or failing socket
 * never observes a half-updated table.
 */

import { EventEmitter } from 'events';
import { CLOSE_CODES, SESSION } from '../constants.js';
import { ErrorCodes, SessionError } from '../errors.js';
import { error as errorMessage, type RelayableMessage } from '../protocol/messages.js';
import { formatSessionId, type SessionId } from '../protocol/session-id.js';
import { logger } from '../utils/logger.js';
import { SessionTable, counterpartOf, isParticipant } from './session-table.js';
import type {
  EstablishedResult,
  Participant,
  RegisterResult,
  RelayResult,
  Session,
  SessionPhase,
  SessionStats,
  SessionSupervisorConfig,
  TeardownReason,
} from './types.js';

export type { SessionSupervisorEvents } from './types.js';

const DEFAULT_CONFIG: SessionSupervisorConfig = {
  maxPendingMessages: SESSION.DEFAULT_MAX_PENDING_MESSAGES,
  waitingTimeout: SESSION.DEFAULT_WAITING_TIMEOUT,
  idleTimeout: SESSION.DEFAULT_IDLE_TIMEOUT,
  closingGracePeriod: SESSION.DEFAULT_CLOSING_GRACE_PERIOD,
  reuseClosedSessions: true,
  closedSessionTtl: SESSION.DEFAULT_CLOSED_SESSION_TTL,
};

const ESTABLISHED_REASON = 'Direct link established';

export class SessionSupervisor extends EventEmitter {
  private table: SessionTable;
  private config: SessionSupervisorConfig;

  // Teardown deadlines for sessions in `closing`
  private graceTimers: Map<SessionId, ReturnType<typeof setTimeout>> = new Map();

  constructor(table: SessionTable, config: Partial<SessionSupervisorConfig> = {}) {
    super();
    this.table = table;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------

  /**
   * Register a participant under a session id.
   *
   * The first participant creates the session in `waiting`. The second one
   * pairs it and receives the counterpart handle plus whatever the
   * counterpart sent while waiting.
   *
   * @throws SessionError SESSION_FULL, ALREADY_REGISTERED or SESSION_CLOSED
   */
  register(sessionId: SessionId, participant: Participant): RegisterResult {
    const now = Date.now();
    const session = this.table.get(sessionId);

    if (!session) {
      if (!this.config.reuseClosedSessions && this.table.isRecentlyClosed(sessionId, now)) {
        this.logRejected(sessionId, participant, ErrorCodes.SESSION_CLOSED);
        throw new SessionError(ErrorCodes.SESSION_CLOSED, { sessionId: formatSessionId(sessionId) });
      }
      this.table.createWaiting(sessionId, participant, now);
      logger.sessionEvent('waiting', { sessionId: formatSessionId(sessionId), participant: participant.id });
      this.emit('session-waiting', sessionId);
      return { status: 'waiting' };
    }

    if (isParticipant(session, participant)) {
      throw new SessionError(ErrorCodes.ALREADY_REGISTERED, { sessionId: formatSessionId(sessionId) });
    }

    if (session.phase !== 'waiting') {
      this.logRejected(sessionId, participant, ErrorCodes.SESSION_FULL);
      throw new SessionError(ErrorCodes.SESSION_FULL, { sessionId: formatSessionId(sessionId) });
    }

    const pending = session.pending;
    this.table.pair(session, participant, now);

    logger.sessionEvent('paired', {
      sessionId: formatSessionId(sessionId),
      participant: participant.id,
      pending: pending.length,
    });
    this.emit('session-paired', sessionId);

    return { status: 'paired', counterpart: session.participant, pending };
  }

  // ---------------------------------------------------------------------------
  // Relay
  // ---------------------------------------------------------------------------

  /**
   * Resolve where a message from `from` goes. The caller forwards it.
   *
   * While the session is waiting the message is buffered, up to
   * `maxPendingMessages`; beyond that (or with buffering disabled) the
   * sender gets NO_COUNTERPART.
   *
   * @throws SessionError UNKNOWN_SESSION, NOT_A_PARTICIPANT, NO_COUNTERPART or SESSION_CLOSING
   */
  relay(sessionId: SessionId, from: Participant, message: RelayableMessage): RelayResult {
    const session = this.requireSession(sessionId, from);
    const now = Date.now();

    switch (session.phase) {
      case 'waiting': {
        if (session.pending.length >= this.config.maxPendingMessages) {
          throw new SessionError(ErrorCodes.NO_COUNTERPART, {
            sessionId: formatSessionId(sessionId),
            pending: session.pending.length,
          });
        }
        session.pending.push(message);
        session.lastActivity = now;
        logger.sessionEvent('buffered', {
          sessionId: formatSessionId(sessionId),
          type: message.type,
          pending: session.pending.length,
        });
        return { status: 'buffered', pending: session.pending.length };
      }

      case 'paired': {
        const counterpart = counterpartOf(session.participants, from);
        if (!counterpart) {
          throw new SessionError(ErrorCodes.NOT_A_PARTICIPANT, { sessionId: formatSessionId(sessionId) });
        }
        session.lastActivity = now;
        logger.sessionEvent('relayed', { sessionId: formatSessionId(sessionId), type: message.type });
        return { status: 'relayed', counterpart };
      }

      case 'closing':
        throw new SessionError(ErrorCodes.SESSION_CLOSING, { sessionId: formatSessionId(sessionId) });
    }
  }

  // ---------------------------------------------------------------------------
  // Established / teardown
  // ---------------------------------------------------------------------------

  /**
   * Record that `participant` has a working direct link. Once both
   * participants have reported, the session enters `closing` and both
   * channels are told to close. Reporting again is a no-op.
   *
   * @throws SessionError UNKNOWN_SESSION, NOT_A_PARTICIPANT or NO_COUNTERPART
   */
  reportEstablished(sessionId: SessionId, participant: Participant): EstablishedResult {
    const session = this.requireSession(sessionId, participant);
    const now = Date.now();

    if (session.phase === 'waiting') {
      throw new SessionError(ErrorCodes.NO_COUNTERPART, { sessionId: formatSessionId(sessionId) });
    }
    if (session.phase === 'closing') {
      return { status: 'closing' };
    }

    session.established.add(participant.id);
    session.lastActivity = now;
    logger.sessionEvent('established', {
      sessionId: formatSessionId(sessionId),
      participant: participant.id,
    });

    if (session.established.size < session.participants.length) {
      return { status: 'acknowledged' };
    }

    const closing = this.table.beginClosing(session, now);
    this.graceTimers.set(
      sessionId,
      setTimeout(() => this.expireClosing(sessionId), this.config.closingGracePeriod)
    );
    logger.sessionEvent('closing', { sessionId: formatSessionId(sessionId) });
    this.emit('session-closing', sessionId);

    // Table is settled; now hand out the close instructions
    for (const p of closing.participants) {
      p.close(CLOSE_CODES.ESTABLISHED, ESTABLISHED_REASON);
    }
    return { status: 'closing' };
  }

  /**
   * A participant's channel has closed. Channels call this exactly once.
   *
   * - closing: counts the closure; the session is torn down once both are closed
   * - waiting: the session is abandoned
   * - paired:  the counterpart is told and closed, the session is abandoned
   */
  release(sessionId: SessionId, participant: Participant): void {
    const session = this.table.get(sessionId);
    if (!session || !isParticipant(session, participant)) return;

    switch (session.phase) {
      case 'closing':
        session.closed.add(participant.id);
        if (session.closed.size >= session.participants.length) {
          this.teardown(sessionId, 'established');
        }
        return;

      case 'waiting':
        this.teardown(sessionId, 'abandoned');
        return;

      case 'paired': {
        const counterpart = counterpartOf(session.participants, participant);
        this.teardown(sessionId, 'abandoned');
        if (counterpart) {
          counterpart.deliver(errorMessage(ErrorCodes.PEER_DISCONNECTED, 'Peer disconnected'));
          counterpart.close(CLOSE_CODES.PEER_LEFT, 'Peer disconnected');
        }
        return;
      }
    }
  }

  /**
   * Remove a session from the table. Buffered messages of a still-connected
   * waiting participant are reported as dropped.
   * Returns false if there was no such session.
   */
  teardown(sessionId: SessionId, reason: TeardownReason): boolean {
    const now = Date.now();
    const session = this.table.remove(sessionId, now + this.config.closedSessionTtl);
    if (!session) return false;

    this.clearGraceTimer(sessionId);

    logger.sessionEvent(reason === 'abandoned' ? 'abandoned' : 'closed', {
      sessionId: formatSessionId(sessionId),
      reason,
    });
    this.emit('session-closed', sessionId, reason);

    if (session.phase === 'waiting' && session.pending.length > 0 && reason !== 'abandoned') {
      session.participant.deliver(
        errorMessage(
          ErrorCodes.PENDING_DROPPED,
          `${session.pending.length} buffered message(s) dropped before a peer joined`
        )
      );
    }
    return true;
  }

  // ---------------------------------------------------------------------------
  // Reaping
  // ---------------------------------------------------------------------------

  /**
   * Best-effort reclamation of unpaired, idle and overdue closing sessions.
   * Returns the number of sessions removed.
   */
  sweep(now: number = Date.now()): number {
    let reaped = 0;

    for (const session of this.table.values()) {
      switch (session.phase) {
        case 'waiting':
          if (now - session.createdAt >= this.config.waitingTimeout) {
            this.expire(session, 'expired');
            reaped++;
          }
          break;
        case 'paired':
          if (now - session.lastActivity >= this.config.idleTimeout) {
            this.expire(session, 'idle');
            reaped++;
          }
          break;
        case 'closing':
          if (now - session.closingSince >= this.config.closingGracePeriod) {
            this.expireClosing(session.id);
            reaped++;
          }
          break;
      }
    }

    this.table.purgeClosed(now);
    return reaped;
  }

  private expire(session: Session, reason: 'expired' | 'idle'): void {
    const participants = session.phase === 'waiting' ? [session.participant] : [...session.participants];
    this.teardown(session.id, reason);
    logger.sessionEvent('expired', { sessionId: formatSessionId(session.id), reason });

    for (const p of participants) {
      p.deliver(errorMessage(ErrorCodes.SESSION_EXPIRED, 'Session expired'));
      p.close(CLOSE_CODES.SESSION_EXPIRED, 'Session expired');
    }
  }

  /**
   * Grace period over: drop the session and force-close channels that
   * have not closed yet.
   */
  private expireClosing(sessionId: SessionId): void {
    const session = this.table.get(sessionId);
    if (!session || session.phase !== 'closing') return;

    const lingering = session.participants.filter(p => !session.closed.has(p.id));
    this.teardown(sessionId, 'established');
    for (const p of lingering) {
      p.close(CLOSE_CODES.ESTABLISHED, ESTABLISHED_REASON);
    }
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  phaseOf(sessionId: SessionId): SessionPhase {
    return this.table.phaseOf(sessionId, Date.now());
  }

  stats(): SessionStats {
    return this.table.stats(Date.now());
  }

  get sessionCount(): number {
    return this.table.size;
  }

  // ---------------------------------------------------------------------------
  // Shutdown
  // ---------------------------------------------------------------------------

  shutdown(): void {
    for (const session of this.table.values()) {
      const participants = session.phase === 'waiting' ? [session.participant] : [...session.participants];
      this.teardown(session.id, 'shutdown');
      for (const p of participants) {
        p.close(CLOSE_CODES.GOING_AWAY, 'Server shutting down');
      }
    }

    for (const timer of this.graceTimers.values()) {
      clearTimeout(timer);
    }
    this.graceTimers.clear();
    this.table.clear();
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private requireSession(sessionId: SessionId, participant: Participant): Session {
    const session = this.table.get(sessionId);
    if (!session) {
      throw new SessionError(ErrorCodes.UNKNOWN_SESSION, { sessionId: formatSessionId(sessionId) });
    }
    if (!isParticipant(session, participant)) {
      throw new SessionError(ErrorCodes.NOT_A_PARTICIPANT, { sessionId: formatSessionId(sessionId) });
    }
    return session;
  }

  private clearGraceTimer(sessionId: SessionId): void {
    const timer = this.graceTimers.get(sessionId);
    if (timer) {
      clearTimeout(timer);
      this.graceTimers.delete(sessionId);
    }
  }

  private logRejected(sessionId: SessionId, participant: Participant, reason: string): void {
    logger.sessionEvent('rejected', {
      sessionId: formatSessionId(sessionId),
      participant: participant.id,
      reason,
    });
  }
}
