/**
 * Core types for the Pairlink signaling server
 */

export interface ServerMetadata {
  version?: string;
  startedAt?: number;
}

// Configuration types
export interface ServerConfig {
  network: {
    host: string;
    port: number;              // HTTP + WebSocket listener
    signalingPath: string;     // Upgrade path for signaling channels
  };
  stun: {
    enabled: boolean;
    host: string;
    port: number;              // UDP listener for binding requests
  };
  session: {
    maxPendingMessages: number;   // Buffered while waiting (0 = reject)
    waitingTimeout: number;       // Reap unpaired sessions after (ms)
    idleTimeout: number;          // Reap paired sessions without traffic after (ms)
    closingGracePeriod: number;   // Force teardown after close instruction (ms)
    reuseClosedSessions: boolean; // false = reject ids of closed sessions
    closedSessionTtl: number;     // How long closed ids stay rejected (ms)
  };
  channel: {
    joinTimeout: number;          // Close channels that never join (ms)
    maxDecodeErrors: number;      // Tolerated undecodable frames after join
    maxConnectionsPerIp: number;
    maxTotalConnections: number;
  };
  cleanup: {
    interval: number;             // Sweep interval (ms)
  };
}
