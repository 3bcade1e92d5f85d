/**
 * Session Table
 *
 * Owned map from session id to session state. Holds no timers and does no
 * I/O; the supervisor drives every transition through this narrow API.
 * Ids of torn-down sessions are remembered for a while so their phase can
 * be reported as `closed` and, when reuse is disabled, rejected.
 */

import type { SessionId } from '../protocol/session-id.js';
import type {
  ClosingSession,
  Participant,
  PairedSession,
  Session,
  SessionPhase,
  SessionStats,
  WaitingSession,
} from './types.js';

export class SessionTable {
  private sessions: Map<SessionId, Session> = new Map();
  // sessionId -> expiry of the closed marker
  private closedIds: Map<SessionId, number> = new Map();

  get size(): number {
    return this.sessions.size;
  }

  get(id: SessionId): Session | undefined {
    return this.sessions.get(id);
  }

  has(id: SessionId): boolean {
    return this.sessions.has(id);
  }

  values(): Session[] {
    return [...this.sessions.values()];
  }

  phaseOf(id: SessionId, now: number): SessionPhase {
    const session = this.sessions.get(id);
    if (session) return session.phase;
    return this.isRecentlyClosed(id, now) ? 'closed' : 'empty';
  }

  /**
   * Create a session in `waiting` with its first participant.
   * Clears any closed marker left by an earlier session with the same id.
   */
  createWaiting(id: SessionId, participant: Participant, now: number): WaitingSession {
    const session: WaitingSession = {
      id,
      phase: 'waiting',
      participant,
      pending: [],
      createdAt: now,
      lastActivity: now,
    };
    this.closedIds.delete(id);
    this.sessions.set(id, session);
    return session;
  }

  pair(session: WaitingSession, second: Participant, now: number): PairedSession {
    const paired: PairedSession = {
      id: session.id,
      phase: 'paired',
      participants: [session.participant, second],
      established: new Set(),
      createdAt: session.createdAt,
      lastActivity: now,
    };
    this.sessions.set(session.id, paired);
    return paired;
  }

  beginClosing(session: PairedSession, now: number): ClosingSession {
    const closing: ClosingSession = {
      id: session.id,
      phase: 'closing',
      participants: session.participants,
      closed: new Set(),
      closingSince: now,
      createdAt: session.createdAt,
      lastActivity: now,
    };
    this.sessions.set(session.id, closing);
    return closing;
  }

  /**
   * Remove a session and remember its id as closed until `closedUntil`.
   */
  remove(id: SessionId, closedUntil: number): Session | undefined {
    const session = this.sessions.get(id);
    if (!session) return undefined;
    this.sessions.delete(id);
    this.closedIds.set(id, closedUntil);
    return session;
  }

  isRecentlyClosed(id: SessionId, now: number): boolean {
    const until = this.closedIds.get(id);
    return until !== undefined && until > now;
  }

  /**
   * Drop expired closed markers. Returns how many were removed.
   */
  purgeClosed(now: number): number {
    let removed = 0;
    for (const [id, until] of this.closedIds) {
      if (until <= now) {
        this.closedIds.delete(id);
        removed++;
      }
    }
    return removed;
  }

  stats(now: number): SessionStats {
    const stats: SessionStats = { total: 0, waiting: 0, paired: 0, closing: 0, recentlyClosed: 0 };
    for (const session of this.sessions.values()) {
      stats.total++;
      stats[session.phase]++;
    }
    for (const until of this.closedIds.values()) {
      if (until > now) stats.recentlyClosed++;
    }
    return stats;
  }

  clear(): void {
    this.sessions.clear();
    this.closedIds.clear();
  }
}

/**
 * The other participant of a two-party session, or undefined when
 * `participant` is not one of the two.
 */
export function counterpartOf(
  participants: readonly [Participant, Participant],
  participant: Participant
): Participant | undefined {
  const [first, second] = participants;
  if (first.id === participant.id) return second;
  if (second.id === participant.id) return first;
  return undefined;
}

export function isParticipant(session: Session, participant: Participant): boolean {
  if (session.phase === 'waiting') return session.participant.id === participant.id;
  return counterpartOf(session.participants, participant) !== undefined;
}
