/**
 * Session Module Exports
 */

export { SessionTable, counterpartOf, isParticipant } from './session-table.js';
export { SessionSupervisor } from './supervisor.js';
export type {
  Participant,
  Session,
  SessionPhase,
  WaitingSession,
  PairedSession,
  ClosingSession,
  TeardownReason,
  RegisterResult,
  RelayResult,
  EstablishedResult,
  SessionStats,
  SessionSupervisorConfig,
  SessionSupervisorEvents,
} from './types.js';
