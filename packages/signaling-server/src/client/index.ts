/**
 * Client Module Exports
 */

export {
  ClientHandler,
  type ClientHandlerConfig,
  type ClientHandlerEvents,
} from './handler.js';

export {
  SignalingChannel,
  type SignalingChannelDeps,
  type ChannelSocket,
} from './channel.js';
