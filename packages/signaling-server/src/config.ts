/**
 * Configuration management for the Pairlink signaling server
 */

import { config as loadEnv } from 'dotenv';
import type { ServerConfig } from './types.js';
import { CHANNEL, CONNECTION_LIMITS, SESSION, STUN, WEBSOCKET } from './constants.js';
import { ConfigError } from './errors.js';

export type { ServerConfig };

loadEnv();

function envString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function envNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function envBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
}

export function loadConfig(): ServerConfig {
  return {
    network: {
      host: envString('PAIRLINK_HOST', '0.0.0.0'),
      port: envNumber('PAIRLINK_PORT', 9001),
      signalingPath: envString('PAIRLINK_SIGNALING_PATH', WEBSOCKET.DEFAULT_PATH),
    },

    stun: {
      enabled: envBoolean('PAIRLINK_STUN_ENABLED', true),
      host: envString('PAIRLINK_STUN_HOST', '0.0.0.0'),
      port: envNumber('PAIRLINK_STUN_PORT', STUN.DEFAULT_PORT),
    },

    session: {
      maxPendingMessages: envNumber('PAIRLINK_MAX_PENDING_MESSAGES', SESSION.DEFAULT_MAX_PENDING_MESSAGES),
      waitingTimeout: envNumber('PAIRLINK_WAITING_TIMEOUT', SESSION.DEFAULT_WAITING_TIMEOUT),
      idleTimeout: envNumber('PAIRLINK_IDLE_TIMEOUT', SESSION.DEFAULT_IDLE_TIMEOUT),
      closingGracePeriod: envNumber('PAIRLINK_CLOSING_GRACE_PERIOD', SESSION.DEFAULT_CLOSING_GRACE_PERIOD),
      reuseClosedSessions: envBoolean('PAIRLINK_REUSE_CLOSED_SESSIONS', true),
      closedSessionTtl: envNumber('PAIRLINK_CLOSED_SESSION_TTL', SESSION.DEFAULT_CLOSED_SESSION_TTL),
    },

    channel: {
      joinTimeout: envNumber('PAIRLINK_JOIN_TIMEOUT', CHANNEL.DEFAULT_JOIN_TIMEOUT),
      maxDecodeErrors: envNumber('PAIRLINK_MAX_DECODE_ERRORS', CHANNEL.DEFAULT_MAX_DECODE_ERRORS),
      maxConnectionsPerIp: envNumber('PAIRLINK_MAX_CONNECTIONS_PER_IP', CONNECTION_LIMITS.MAX_CONNECTIONS_PER_IP),
      maxTotalConnections: envNumber('PAIRLINK_MAX_TOTAL_CONNECTIONS', CONNECTION_LIMITS.MAX_TOTAL_CONNECTIONS),
    },

    cleanup: {
      interval: envNumber('PAIRLINK_CLEANUP_INTERVAL', 30000),
    },
  };
}

function isPort(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 65535;
}

/**
 * Reject configurations the server cannot run with.
 * @throws ConfigError naming the first offending setting
 */
export function validateConfig(config: ServerConfig): ServerConfig {
  if (!isPort(config.network.port)) {
    throw new ConfigError(`network.port must be 0-65535, got ${config.network.port}`);
  }
  if (!config.network.signalingPath.startsWith('/')) {
    throw new ConfigError(`network.signalingPath must start with "/", got "${config.network.signalingPath}"`);
  }
  if (config.stun.enabled) {
    if (!isPort(config.stun.port)) {
      throw new ConfigError(`stun.port must be 0-65535, got ${config.stun.port}`);
    }
    // Port 0 lets the OS pick, so two zeros never collide
    if (config.stun.port !== 0 && config.stun.port === config.network.port) {
      throw new ConfigError(`stun.port ${config.stun.port} overlaps network.port; use distinct ports`);
    }
  }

  const durations: Array<[string, number]> = [
    ['session.waitingTimeout', config.session.waitingTimeout],
    ['session.idleTimeout', config.session.idleTimeout],
    ['session.closingGracePeriod', config.session.closingGracePeriod],
    ['session.closedSessionTtl', config.session.closedSessionTtl],
    ['channel.joinTimeout', config.channel.joinTimeout],
    ['cleanup.interval', config.cleanup.interval],
  ];
  for (const [name, value] of durations) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigError(`${name} must be a positive number of milliseconds, got ${value}`);
    }
  }

  const counts: Array<[string, number]> = [
    ['session.maxPendingMessages', config.session.maxPendingMessages],
    ['channel.maxDecodeErrors', config.channel.maxDecodeErrors],
  ];
  for (const [name, value] of counts) {
    if (!Number.isInteger(value) || value < 0) {
      throw new ConfigError(`${name} must be a non-negative integer, got ${value}`);
    }
  }

  if (config.channel.maxConnectionsPerIp < 1 || config.channel.maxTotalConnections < 1) {
    throw new ConfigError('channel connection limits must be at least 1');
  }

  return config;
}
