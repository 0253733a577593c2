/**
 * @fileoverview Shared types for neo4j-session-kit.
 * @module neo4j-session-kit/neo4j/types
 */

import type { AuthToken, Config, Driver, QueryResult } from 'neo4j-driver';
import type { ILogger } from '../logging/ILogger.js';

/**
 * Configuration for connecting to a Neo4j instance.
 */
export interface Neo4jConnectionConfig {
  /** Connection URI (e.g., 'bolt://localhost:7687', 'neo4j+s://xxx.databases.neo4j.io') */
  uri: string;
  /** Omit both username and password to connect without authentication */
  username?: string;
  password?: string;
  /** Database name — the server's default database when omitted */
  database?: string;
  /** Max connection pool size — defaults to 50 */
  maxConnectionPoolSize?: number;
  /** Connection acquisition timeout in ms — defaults to 30000 */
  connectionAcquisitionTimeoutMs?: number;
}

export type DriverFactory = (uri: string, authToken: AuthToken | undefined, config: Config) => Driver;

export interface Neo4jConnectionOptions {
  logger?: ILogger;
  /** Replaces `neo4j.driver`; used to plug in stand-in drivers. */
  driverFactory?: DriverFactory;
}

export type AccessMode = 'READ' | 'WRITE';

// ============================================================================
// Host values
// ============================================================================

export interface HostMap {
  [key: string]: HostValue;
}

export interface GraphNode {
  kind: 'node';
  elementId: string;
  labels: string[];
  properties: HostMap;
}

export interface GraphRelationship {
  kind: 'relationship';
  elementId: string;
  type: string;
  startElementId: string;
  endElementId: string;
  properties: HostMap;
}

export interface GraphPathSegment {
  start: GraphNode;
  relationship: GraphRelationship;
  end: GraphNode;
}

export interface GraphPath {
  kind: 'path';
  start: GraphNode;
  end: GraphNode;
  segments: GraphPathSegment[];
}

export interface GraphPoint {
  kind: 'point';
  srid: number;
  x: number;
  y: number;
  z?: number;
}

export type HostScalar = string | number | bigint | boolean | null;

export type HostValue =
  | HostScalar
  | Uint8Array
  | HostValue[]
  | HostMap
  | GraphNode
  | GraphRelationship
  | GraphPath
  | GraphPoint;

/** One converted result row, keyed in RETURN-clause order. */
export type ResultRecord = Record<string, HostValue>;

/** Caller-supplied parameters; validated at conversion time. */
export type QueryParams = Record<string, unknown>;

/**
 * Anything that can run Cypher: a driver session, a driver transaction,
 * or a {@link GraphTransaction}.
 */
export interface CypherTarget {
  run(query: string, parameters?: Record<string, unknown>): PromiseLike<QueryResult>;
}

export interface BoundQuery {
  (target: CypherTarget, params?: QueryParams): Promise<ResultRecord[]>;
  readonly cypher: string;
}
