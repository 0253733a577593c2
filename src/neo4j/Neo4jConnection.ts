/**
 * @fileoverview Neo4j connection: one neo4j-driver Driver plus the settings it
 * was built from.
 *
 * Construction never contacts the server. Authentication and network failures
 * surface on first use (opening work on a session, {@link Neo4jConnection.verifyConnectivity})
 * as {@link ConnectionError}.
 *
 * @module neo4j-session-kit/neo4j/Neo4jConnection
 */

import neo4j, { type AuthToken, type Driver, type Session } from 'neo4j-driver';
import {
  DEFAULT_CONNECTION_ACQUISITION_TIMEOUT_MS,
  DEFAULT_MAX_CONNECTION_POOL_SIZE,
} from '../config/Neo4jEnvConfig.js';
import type { ILogger } from '../logging/ILogger.js';
import { childLogger, getDefaultLogger } from '../logging/PinoLogger.js';
import { mapDriverError } from './errors.js';
import type { AccessMode, Neo4jConnectionConfig, Neo4jConnectionOptions } from './types.js';

const sessionUris = new WeakMap<object, string>();

/** URI of the connection that opened `session`, if it came from {@link Neo4jConnection.session}. */
export function sessionUri(session: object): string | undefined {
  return sessionUris.get(session);
}

export interface SessionOptions {
  mode?: AccessMode;
  bookmarks?: string[];
}

export interface HealthStatus {
  isHealthy: boolean;
  details?: Record<string, unknown> | string;
}

/**
 * Usage:
 * ```typescript
 * const connection = createConnection('bolt://localhost:7687', 'neo4j', 'secret');
 * const session = connection.session();
 * try {
 *   const rows = await run(session, 'MATCH (n) RETURN count(n) AS total');
 * } finally {
 *   await session.close();
 * }
 * await connection.close();
 * ```
 */
export class Neo4jConnection {
  readonly uri: string;
  readonly username?: string;
  readonly database?: string;
  readonly driver: Driver;
  protected readonly logger: ILogger;
  private closed = false;

  constructor(config: Neo4jConnectionConfig, options: Neo4jConnectionOptions = {}) {
    this.uri = config.uri;
    this.username = config.username;
    this.database = config.database;
    this.logger = childLogger(options.logger ?? getDefaultLogger(), { component: 'Neo4jConnection' });

    const authToken: AuthToken | undefined =
      config.username !== undefined ? neo4j.auth.basic(config.username, config.password ?? '') : undefined;
    const driverFactory = options.driverFactory ?? neo4j.driver;

    this.driver = driverFactory(config.uri, authToken, {
      maxConnectionPoolSize: config.maxConnectionPoolSize ?? DEFAULT_MAX_CONNECTION_POOL_SIZE,
      connectionAcquisitionTimeout:
        config.connectionAcquisitionTimeoutMs ?? DEFAULT_CONNECTION_ACQUISITION_TIMEOUT_MS,
    });

    this.logger.debug('Neo4j driver created', {
      uri: this.uri,
      authenticated: authToken !== undefined,
      database: this.database,
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Create a session. Callers MUST close the session in a finally block,
   * or use `withSession`.
   */
  session(options: SessionOptions = {}): Session {
    const mode = options.mode ?? 'WRITE';
    const session = this.driver.session({
      database: this.database,
      defaultAccessMode: mode === 'READ' ? neo4j.session.READ : neo4j.session.WRITE,
      bookmarks: options.bookmarks,
    });
    sessionUris.set(session, this.uri);
    return session;
  }

  /**
   * Contact the server now instead of on first use.
   * @throws ConnectionError when the server is unreachable or rejects the credentials.
   */
  async verifyConnectivity(): Promise<void> {
    try {
      await this.driver.verifyConnectivity({ database: this.database });
    } catch (err) {
      throw mapDriverError(err, this.uri);
    }
  }

  /**
   * Check Neo4j connectivity without throwing.
   */
  async checkHealth(): Promise<HealthStatus> {
    if (this.closed) {
      return { isHealthy: false, details: 'Connection closed' };
    }
    const session = this.session({ mode: 'READ' });
    try {
      const result = await session.run('RETURN 1 AS ping');
      const ping: unknown = result.records[0]?.get('ping');
      return {
        isHealthy: true,
        details: {
          ping: neo4j.isInt(ping) ? ping.toNumber() : ping,
          database: this.database,
          uri: this.uri,
        },
      };
    } catch (err) {
      return { isHealthy: false, details: err instanceof Error ? err.message : String(err) };
    } finally {
      await session.close();
    }
  }

  /**
   * Close the driver and release all connection pool resources.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.driver.close();
    this.logger.debug('Neo4j driver closed', { uri: this.uri });
  }
}

/**
 * Builds a connection. With a username the driver authenticates with basic
 * auth; without one it connects anonymously.
 */
export function createConnection(
  uri: string,
  username?: string,
  password?: string,
  options: Neo4jConnectionOptions & Omit<Neo4jConnectionConfig, 'uri' | 'username' | 'password'> = {},
): Neo4jConnection {
  const { logger, driverFactory, ...config } = options;
  return new Neo4jConnection({ ...config, uri, username, password }, { logger, driverFactory });
}
