/**
 * Connection Limiter
 *
 * Caps open connections per remote IP and in total, so one host cannot fill
 * the lobby or exhaust sockets.
 */
import { logDebug } from '../logger.js';

export interface ConnectionLimiterConfig {
  maxConnectionsPerIp: number;
  maxTotalConnections: number;
}

export type LimitRejection = 'SERVER_FULL' | 'IP_LIMIT_EXCEEDED';

export type LimitCheckResult =
  | { allowed: true }
  | { allowed: false; code: LimitRejection; reason: string };

/**
 * Normalize IPv4-mapped IPv6 addresses
 * e.g., ::ffff:127.0.0.1 -> 127.0.0.1
 */
export function normalizeIp(ip: string | undefined): string {
  if (!ip) return 'unknown';
  return ip.startsWith('::ffff:') ? ip.slice(7) : ip;
}

export class ConnectionLimiter {
  private connectionsByIp = new Map<string, Set<string>>();
  private total = 0;
  private readonly config: ConnectionLimiterConfig;

  constructor(config: Partial<ConnectionLimiterConfig> = {}) {
    this.config = {
      maxConnectionsPerIp: config.maxConnectionsPerIp ?? 8,
      maxTotalConnections: config.maxTotalConnections ?? 1000,
    };
  }

  get totalConnections(): number {
    return this.total;
  }

  canConnect(ip: string): LimitCheckResult {
    if (this.total >= this.config.maxTotalConnections) {
      return {
        allowed: false,
        code: 'SERVER_FULL',
        reason: `Server at capacity (${this.config.maxTotalConnections} connections)`,
      };
    }

    const current = this.connectionsByIp.get(normalizeIp(ip))?.size ?? 0;
    if (current >= this.config.maxConnectionsPerIp) {
      return {
        allowed: false,
        code: 'IP_LIMIT_EXCEEDED',
        reason: `Too many connections from this IP (max ${this.config.maxConnectionsPerIp})`,
      };
    }

    return { allowed: true };
  }

  register(ip: string, connectionId: string): void {
    const key = normalizeIp(ip);
    let connections = this.connectionsByIp.get(key);
    if (!connections) {
      connections = new Set();
      this.connectionsByIp.set(key, connections);
    }
    if (connections.has(connectionId)) {
      return;
    }
    connections.add(connectionId);
    this.total++;
    logDebug(
      `[Limiter] Registered ${connectionId} from ${key} ` +
      `(IP: ${connections.size}/${this.config.maxConnectionsPerIp}, total: ${this.total}/${this.config.maxTotalConnections})`
    );
  }

  unregister(ip: string, connectionId: string): void {
    const key = normalizeIp(ip);
    const connections = this.connectionsByIp.get(key);
    if (!connections?.delete(connectionId)) {
      return;
    }
    this.total--;
    if (connections.size === 0) {
      this.connectionsByIp.delete(key);
    }
    logDebug(`[Limiter] Unregistered ${connectionId} from ${key} (total: ${this.total})`);
  }

  getConnectionCount(ip: string): number {
    return this.connectionsByIp.get(normalizeIp(ip))?.size ?? 0;
  }
}
