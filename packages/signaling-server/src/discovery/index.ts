/**
 * Discovery Module Exports
 */

export {
  createDiscoveryResponder,
  type DiscoveryResponder,
  type DiscoveryResponderOptions,
  type DiscoveryStats,
} from './stun-server.js';
export {
  parseStunMessage,
  handleBindingRequest,
  buildBindingRequest,
  readXorMappedAddress,
  isBindingRequest,
  type StunMessage,
  type StunAttribute,
  type TransportInfo,
  type MappedAddress,
} from './stun-message.js';
