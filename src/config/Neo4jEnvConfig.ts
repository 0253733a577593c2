/**
 * @fileoverview Environment-driven configuration for neo4j-session-kit.
 * @module neo4j-session-kit/config/Neo4jEnvConfig
 */

import { Neo4jKitError, Neo4jKitErrorCode } from '../neo4j/errors.js';

export const DEFAULT_NEO4J_URI = 'bolt://localhost:7687';
export const DEFAULT_MAX_CONNECTION_POOL_SIZE = 50;
export const DEFAULT_CONNECTION_ACQUISITION_TIMEOUT_MS = 30_000;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Neo4jEnvConfig {
  uri: string;
  username?: string;
  password?: string;
  database?: string;
  maxConnectionPoolSize: number;
  connectionAcquisitionTimeoutMs: number;
  /** Root of a local Neo4j distribution, used to boot ephemeral instances. */
  neo4jHome?: string;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Neo4jKitError(
      `${key} must be a positive integer, got '${raw}'`,
      Neo4jKitErrorCode.CONFIG_ERROR,
      { key, value: raw },
    );
  }
  return parsed;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function readLogLevel(env: Env): LogLevel {
  const raw = readString(env, 'NEO4J_SESSION_KIT_LOG_LEVEL')?.toLowerCase();
  if (raw === undefined) return 'info';
  if (!isLogLevel(raw)) {
    throw new Neo4jKitError(
      `NEO4J_SESSION_KIT_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${raw}'`,
      Neo4jKitErrorCode.CONFIG_ERROR,
      { key: 'NEO4J_SESSION_KIT_LOG_LEVEL', value: raw },
    );
  }
  return raw;
}

/**
 * Log level for the shared default logger. Unlike {@link loadNeo4jEnvConfig}
 * this never throws: a missing or unknown level falls back to `info`.
 */
export function readDefaultLogLevel(env: Env = process.env): LogLevel {
  const raw = readString(env, 'NEO4J_SESSION_KIT_LOG_LEVEL')?.toLowerCase();
  return raw !== undefined && isLogLevel(raw) ? raw : 'info';
}

/** `NEO4J_HOME` alone, without validating the rest of the environment. */
export function readNeo4jHome(env: Env = process.env): string | undefined {
  return readString(env, 'NEO4J_HOME');
}

export function loadNeo4jEnvConfig(env: Env = process.env): Neo4jEnvConfig {
  const username = readString(env, 'NEO4J_USERNAME');
  const password = env.NEO4J_PASSWORD;

  if (password !== undefined && username === undefined) {
    throw new Neo4jKitError(
      'NEO4J_PASSWORD is set but NEO4J_USERNAME is not',
      Neo4jKitErrorCode.CONFIG_ERROR,
      { key: 'NEO4J_USERNAME' },
    );
  }

  return {
    uri: readString(env, 'NEO4J_URI') ?? DEFAULT_NEO4J_URI,
    username,
    password,
    database: readString(env, 'NEO4J_DATABASE'),
    maxConnectionPoolSize: readPositiveInt(env, 'NEO4J_MAX_POOL_SIZE', DEFAULT_MAX_CONNECTION_POOL_SIZE),
    connectionAcquisitionTimeoutMs: readPositiveInt(
      env,
      'NEO4J_ACQUISITION_TIMEOUT_MS',
      DEFAULT_CONNECTION_ACQUISITION_TIMEOUT_MS,
    ),
    neo4jHome: readNeo4jHome(env),
    logLevel: readLogLevel(env),
  };
}
