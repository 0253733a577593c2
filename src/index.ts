/**
 * Barrel exports for neo4j-session-kit.
 */

export * from './neo4j/index.js';
export { loadNeo4jEnvConfig, readDefaultLogLevel, readNeo4jHome } from './config/Neo4jEnvConfig.js';
export type { LogLevel, Neo4jEnvConfig } from './config/Neo4jEnvConfig.js';
export type { ILogger } from './logging/ILogger.js';
export { PinoLogger, getDefaultLogger, setDefaultLogger } from './logging/PinoLogger.js';
