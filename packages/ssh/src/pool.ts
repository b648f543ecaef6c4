/**
 * @readycheck/ssh - SSH Connection Pool
 *
 * Owned by the caller: created once per CLI run and destroyed on exit.
 */

import { Client, type ConnectConfig } from 'ssh2';
import { readFileSync, existsSync } from 'node:fs';
import type { SSHConfig } from '@readycheck/shared';
import { ConfigError } from '@readycheck/shared';

// ============================================================================
// Configuration
// ============================================================================

export interface PoolOptions {
  maxConnections: number;
  idleTimeout: number;
  connectionTimeout: number;
}

const DEFAULT_POOL_OPTIONS: PoolOptions = {
  maxConnections: 5,
  idleTimeout: 60000,      // 1 minute
  connectionTimeout: 30000, // 30 seconds
};

// ============================================================================
// Types
// ============================================================================

interface PooledConnection {
  client: Client;
  host: string;
  createdAt: number;
  lastUsedAt: number;
  inUse: boolean;
  alive: boolean;
}

// ============================================================================
// Connection Pool
// ============================================================================

export class SSHConnectionPool {
  private connections: Map<string, PooledConnection[]> = new Map();
  private pending: Map<string, number> = new Map();
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;
  private readonly options: PoolOptions;

  constructor(
    private readonly config: Omit<SSHConfig, 'host'>,
    options: Partial<PoolOptions> = {},
  ) {
    this.options = { ...DEFAULT_POOL_OPTIONS, ...options };
    this.cleanupInterval = setInterval(() => this.cleanup(), 30000);
    this.cleanupInterval.unref();
  }

  async acquire(host: string): Promise<Client> {
    this.prune(host);
    const pool = this.hostPool(host);

    // Find available connection
    const available = pool.find(c => !c.inUse && c.alive);
    if (available) {
      available.inUse = true;
      available.lastUsedAt = Date.now();
      return available.client;
    }

    // Create new connection if under limit, counting handshakes in flight
    const pending = this.pending.get(host) ?? 0;
    if (pool.length + pending < this.options.maxConnections) {
      this.pending.set(host, pending + 1);
      try {
        const pooled = await this.createConnection(host);
        this.hostPool(host).push(pooled);
        return pooled.client;
      } finally {
        this.pending.set(host, (this.pending.get(host) ?? 1) - 1);
      }
    }

    // Wait for available connection
    return new Promise((resolve, reject) => {
      const checkInterval = setInterval(() => {
        const conn = this.hostPool(host).find(c => !c.inUse && c.alive);
        if (conn) {
          clearInterval(checkInterval);
          clearTimeout(giveUp);
          conn.inUse = true;
          conn.lastUsedAt = Date.now();
          resolve(conn.client);
        }
      }, 100);

      const giveUp = setTimeout(() => {
        clearInterval(checkInterval);
        reject(new Error('SSH connection pool exhausted'));
      }, this.options.connectionTimeout);
    });
  }

  release(host: string, client: Client): void {
    const pool = this.connections.get(host) || [];
    const connection = pool.find(c => c.client === client);
    if (connection) {
      connection.inUse = false;
      connection.lastUsedAt = Date.now();
    }
  }

  /** Drops a broken connection so the next acquire opens a fresh one */
  discard(host: string, client: Client): void {
    const pool = this.connections.get(host);
    if (pool) {
      this.connections.set(host, pool.filter(c => c.client !== client));
    }
    client.end();
  }

  private hostPool(host: string): PooledConnection[] {
    let pool = this.connections.get(host);
    if (!pool) {
      pool = [];
      this.connections.set(host, pool);
    }
    return pool;
  }

  private prune(host: string): void {
    const pool = this.connections.get(host);
    if (!pool) return;

    const dead = pool.filter(c => !c.alive && !c.inUse);
    if (dead.length === 0) return;

    for (const conn of dead) conn.client.end();
    this.connections.set(host, pool.filter(c => c.alive || c.inUse));
  }

  private createConnection(host: string): Promise<PooledConnection> {
    const { port, username, privateKeyPath } = this.config;

    if (!privateKeyPath || !existsSync(privateKeyPath)) {
      return Promise.reject(new ConfigError(`SSH private key not found: ${privateKeyPath ?? '(none)'}`));
    }

    const connectionConfig: ConnectConfig = {
      host,
      port,
      username,
      privateKey: readFileSync(privateKeyPath),
      readyTimeout: this.options.connectionTimeout,
    };

    return new Promise((resolve, reject) => {
      const client = new Client();
      const now = Date.now();
      const pooled: PooledConnection = {
        client,
        host,
        createdAt: now,
        lastUsedAt: now,
        inUse: true,
        alive: false,
      };

      client
        .on('ready', () => {
          pooled.alive = true;
          resolve(pooled);
        })
        .on('error', (err) => {
          pooled.alive = false;
          reject(err);
        })
        .on('close', () => {
          pooled.alive = false;
        })
        .connect(connectionConfig);
    });
  }

  private cleanup(): void {
    const now = Date.now();

    for (const [host, pool] of this.connections.entries()) {
      const active = pool.filter(c => {
        if (c.inUse) return true;

        // Remove idle or dead connections
        if (now - c.lastUsedAt > this.options.idleTimeout || !c.alive) {
          c.client.end();
          return false;
        }

        return true;
      });

      this.connections.set(host, active);
    }
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }

    for (const pool of this.connections.values()) {
      for (const conn of pool) {
        conn.client.end();
      }
    }

    this.connections.clear();
  }
}
