/**
 * Protocol Module Exports
 */

export { encode, decode } from './codec.js';
export * as messages from './messages.js';
export type {
  SignalingMessage,
  SignalingMessageType,
  JoinMessage,
  WaitingMessage,
  ReadyMessage,
  OfferMessage,
  AnswerMessage,
  CandidateMessage,
  ConnectionEstablishedMessage,
  CloseMessage,
  ErrorMessage,
  NegotiationMessage,
  RelayableMessage,
  ServerOnlyMessage,
} from './messages.js';
export { isRelayable, isServerOnly } from './messages.js';
export {
  type SessionId,
  MAX_SESSION_ID,
  parseSessionId,
  formatSessionId,
  isValidSessionId,
} from './session-id.js';
