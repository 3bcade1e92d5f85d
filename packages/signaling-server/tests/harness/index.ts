/**
 * Test Harness Exports
 *
 * In-process fakes for unit tests and a real WebSocket client for
 * integration tests.
 */

export { FakeParticipant, MockWebSocket } from './fakes.js';
export { SignalingTestClient, type CloseEvent } from './signaling-client.js';
