/**
 * Configuration Tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { loadConfig, validateConfig, type ServerConfig } from '../../src/config.js';
import { ConfigError } from '../../src/errors.js';

function baseConfig(): ServerConfig {
  return {
    network: { host: '127.0.0.1', port: 9003, signalingPath: '/one-to-one' },
    stun: { enabled: true, host: '127.0.0.1', port: 9004 },
    session: {
      maxPendingMessages: 0,
      waitingTimeout: 1000,
      idleTimeout: 1000,
      closingGracePeriod: 1000,
      reuseClosedSessions: true,
      closedSessionTtl: 1000,
    },
    channel: { joinTimeout: 1000, maxDecodeErrors: 3, maxConnectionsPerIp: 20, maxTotalConnections: 100 },
    cleanup: { interval: 1000 },
  };
}

function configErrorMessage(config: ServerConfig): string {
  try {
    validateConfig(config);
  } catch (e) {
    if (e instanceof ConfigError) return e.message;
    throw e;
  }
  throw new Error('expected a ConfigError');
}

describe('config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('loadConfig', () => {
    it('should read settings from the environment', () => {
      vi.stubEnv('PAIRLINK_PORT', '9003');
      vi.stubEnv('PAIRLINK_STUN_PORT', '9004');
      vi.stubEnv('PAIRLINK_STUN_ENABLED', 'off');
      vi.stubEnv('PAIRLINK_MAX_PENDING_MESSAGES', '8');
      vi.stubEnv('PAIRLINK_REUSE_CLOSED_SESSIONS', 'false');

      const config = loadConfig();

      expect(config.network.port).toBe(9003);
      expect(config.stun.port).toBe(9004);
      expect(config.stun.enabled).toBe(false);
      expect(config.session.maxPendingMessages).toBe(8);
      expect(config.session.reuseClosedSessions).toBe(false);
    });

    it('should fall back to the default for unparseable numbers', () => {
      vi.stubEnv('PAIRLINK_PORT', 'not-a-port');

      expect(loadConfig().network.port).toBe(9001);
    });

    it('should treat any other boolean text as true', () => {
      vi.stubEnv('PAIRLINK_STUN_ENABLED', 'yes');

      expect(loadConfig().stun.enabled).toBe(true);
    });
  });

  describe('validateConfig', () => {
    it('should accept a sane configuration', () => {
      const config = baseConfig();

      expect(validateConfig(config)).toBe(config);
    });

    it('should reject a STUN port that overlaps the signaling port', () => {
      const config = baseConfig();
      config.stun.port = 9003;

      expect(configErrorMessage(config)).toBe('stun.port 9003 overlaps network.port; use distinct ports');
    });

    it('should allow the same port when STUN is disabled', () => {
      const config = baseConfig();
      config.stun = { enabled: false, host: '127.0.0.1', port: 9003 };

      expect(() => validateConfig(config)).not.toThrow();
    });

    it('should allow both ports to be 0', () => {
      const config = baseConfig();
      config.network.port = 0;
      config.stun.port = 0;

      expect(() => validateConfig(config)).not.toThrow();
    });

    it('should reject ports out of range', () => {
      const config = baseConfig();
      config.network.port = 70000;

      expect(configErrorMessage(config)).toBe('network.port must be 0-65535, got 70000');
    });

    it('should reject a signaling path without a leading slash', () => {
      const config = baseConfig();
      config.network.signalingPath = 'one-to-one';

      expect(configErrorMessage(config)).toBe('network.signalingPath must start with "/", got "one-to-one"');
    });

    it('should reject non-positive durations', () => {
      const config = baseConfig();
      config.session.waitingTimeout = 0;

      expect(configErrorMessage(config)).toBe(
        'session.waitingTimeout must be a positive number of milliseconds, got 0'
      );
    });

    it('should reject negative counts', () => {
      const config = baseConfig();
      config.session.maxPendingMessages = -1;

      expect(configErrorMessage(config)).toBe('session.maxPendingMessages must be a non-negative integer, got -1');
    });

    it('should reject connection limits below 1', () => {
      const config = baseConfig();
      config.channel.maxConnectionsPerIp = 0;

      expect(configErrorMessage(config)).toBe('channel connection limits must be at least 1');
    });
  });
});
