/**
 * Secure Logger Utility
 *
 * Structured console logging with redaction of session ids and client IP
 * addresses in production environments. A session id is a shared secret
 * between two clients: anyone who learns it can try to join the session.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerConfig {
  level: LogLevel;
  redactSensitive: boolean;
  environment: 'development' | 'production';
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

/**
 * Redact a sensitive value, showing only first and last characters
 * @param showChars Number of characters to show at start and end
 */
export function redact(value: string, showChars = 2): string {
  if (!value || value.length <= showChars * 2) return '****';
  return `${value.slice(0, showChars)}****${value.slice(-showChars)}`;
}

/**
 * Redact a formatted session id (32 hex digits).
 * Shows the first and last 4 digits only.
 */
export function redactSessionId(id: string): string {
  if (!id || id.length < 12) return '****';
  return `${id.substring(0, 4)}...${id.substring(id.length - 4)}`;
}

/**
 * Redact an IP address for logging
 * For IPv4: shows first octet only
 * For IPv6: shows first segment only
 */
export function redactIp(ip: string): string {
  if (!ip) return '****';

  // IPv4 (including IPv4-mapped IPv6 such as ::ffff:1.2.3.4)
  if (ip.includes('.')) {
    const v4 = ip.slice(ip.lastIndexOf(':') + 1);
    const parts = v4.split('.');
    return `${parts[0]}.*.*.*`;
  }

  // IPv6
  if (ip.includes(':')) {
    const parts = ip.split(':');
    return `${parts[0]}:****:****`;
  }

  return '****';
}

export type SessionLogEvent =
  | 'waiting'
  | 'paired'
  | 'rejected'
  | 'relayed'
  | 'buffered'
  | 'established'
  | 'closing'
  | 'closed'
  | 'abandoned'
  | 'expired';

class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    const nodeEnv = process.env['NODE_ENV'] || 'development';
    const isProduction = nodeEnv === 'production';
    const envLevel = process.env['LOG_LEVEL'];

    this.config = {
      level: isLogLevel(envLevel) ? envLevel : isProduction ? 'info' : 'debug',
      redactSensitive: process.env['REDACT_LOGS'] !== 'false' && isProduction,
      environment: isProduction ? 'production' : 'development',
      ...config,
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.level];
  }

  get shouldRedact(): boolean {
    return this.config.redactSensitive;
  }

  /**
   * Redact a formatted session id based on environment
   */
  sessionId(id: string): string {
    return this.config.redactSensitive ? redactSessionId(id) : id;
  }

  /**
   * Redact IP address based on environment
   */
  ip(ip: string): string {
    return this.config.redactSensitive ? redactIp(ip) : ip;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      if (meta) {
        console.debug(`[DEBUG] ${message}`, meta);
      } else {
        console.debug(`[DEBUG] ${message}`);
      }
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      if (meta) {
        console.log(`[INFO] ${message}`, meta);
      } else {
        console.log(`[INFO] ${message}`);
      }
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      if (meta) {
        console.warn(`[WARN] ${message}`, meta);
      } else {
        console.warn(`[WARN] ${message}`);
      }
    }
  }

  error(message: string, error?: unknown, meta?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      if (error && meta) {
        console.error(`[ERROR] ${message}`, error, meta);
      } else if (error) {
        console.error(`[ERROR] ${message}`, error);
      } else if (meta) {
        console.error(`[ERROR] ${message}`, meta);
      } else {
        console.error(`[ERROR] ${message}`);
      }
    }
  }

  /**
   * Log a session lifecycle event with automatic session id redaction
   */
  sessionEvent(
    event: SessionLogEvent,
    fields: { sessionId: string; participant?: string; type?: string; reason?: string; pending?: number }
  ): void {
    const redacted: Record<string, unknown> = {
      sessionId: this.sessionId(fields.sessionId),
      participant: fields.participant,
      type: fields.type,
      reason: fields.reason,
      pending: fields.pending,
    };

    // Filter out undefined values
    const filtered = Object.fromEntries(
      Object.entries(redacted).filter(([, v]) => v !== undefined)
    );

    this.debug(`[Session] ${event}`, filtered);
  }

  /**
   * Log a client connection event with automatic IP redaction
   */
  clientConnection(event: 'connected' | 'disconnected' | 'rejected', ip: string): void {
    this.info(`[Client] ${event}`, { ip: this.ip(ip) });
  }

  /**
   * Log an address-discovery probe with automatic IP redaction
   */
  probeEvent(event: 'answered' | 'dropped', ip: string): void {
    this.debug(`[STUN] ${event}`, { ip: this.ip(ip) });
  }
}

// Export a singleton instance
export const logger = new Logger();

// Also export the class for testing or custom configurations
export { Logger };
