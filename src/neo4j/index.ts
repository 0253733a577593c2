/**
 * Neo4j Integration Module
 *
 * Connections, disposable test instances, session/transaction helpers and
 * value conversion around neo4j-driver.
 *
 * @module neo4j-session-kit/neo4j
 */

export { Neo4jConnection, createConnection } from './Neo4jConnection.js';
export type { HealthStatus, SessionOptions } from './Neo4jConnection.js';
export { Neo4jCypherRunner } from './Neo4jCypherRunner.js';
export type { CypherStatement } from './Neo4jCypherRunner.js';
export {
  EphemeralConnection,
  createEphemeralConnection,
  createStorageDirectory,
  destroyEphemeralConnection,
  getFreePort,
  withEphemeralConnection,
} from './EphemeralDatabase.js';
export type { EphemeralConnectionOptions } from './EphemeralDatabase.js';
export { Neo4jServerLauncher, renderNeo4jConf } from './Neo4jServerLauncher.js';
export type {
  EmbeddedEngineHandle,
  EmbeddedEngineLaunchOptions,
  EmbeddedEngineLauncher,
  Neo4jServerLauncherConfig,
} from './Neo4jServerLauncher.js';
export {
  GraphTransaction,
  commit,
  createQuery,
  failure,
  openSession,
  openTransaction,
  rollback,
  run,
  success,
  withSession,
  withTransaction,
} from './sessions.js';
export {
  recordToObject,
  recordsToObjects,
  toHostValue,
  toNeo4jParams,
  toNeo4jValue,
} from './ValueConverter.js';
export type { ConversionOptions, RecordLike } from './ValueConverter.js';
export {
  ConnectionError,
  ConversionError,
  Neo4jKitError,
  Neo4jKitErrorCode,
  ProvisionError,
  UnsupportedParameterTypeError,
  isConnectionFailure,
  mapDriverError,
} from './errors.js';
export type * from './types.js';
