/**
 * @fileoverview Error taxonomy for neo4j-session-kit.
 *
 * Only failures that originate in this layer are wrapped. Driver errors that
 * are not connection failures (syntax errors, constraint violations, ...)
 * propagate unchanged to the caller.
 *
 * @module neo4j-session-kit/neo4j/errors
 */

export enum Neo4jKitErrorCode {
  CONFIG_ERROR = 'CONFIG_ERROR',
  CONNECTION_ERROR = 'CONNECTION_ERROR',
  PROVISION_ERROR = 'PROVISION_ERROR',
  CONVERSION_ERROR = 'CONVERSION_ERROR',
  UNSUPPORTED_PARAMETER_TYPE = 'UNSUPPORTED_PARAMETER_TYPE',
}

export type Neo4jKitErrorDetails = Record<string, unknown> | undefined;

export class Neo4jKitError extends Error {
  readonly code: Neo4jKitErrorCode;
  readonly details?: Neo4jKitErrorDetails;
  readonly timestamp: string;
  readonly cause?: unknown;

  constructor(message: string, code: Neo4jKitErrorCode, details?: Neo4jKitErrorDetails, cause?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
    this.cause = cause;
    this.timestamp = new Date().toISOString();
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      timestamp: this.timestamp,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }

  static isNeo4jKitError(error: unknown): error is Neo4jKitError {
    return error instanceof Neo4jKitError;
  }
}

/** Authentication or network failure, raised on first use of a connection. */
export class ConnectionError extends Neo4jKitError {
  constructor(message: string, details?: Neo4jKitErrorDetails, cause?: unknown) {
    super(message, Neo4jKitErrorCode.CONNECTION_ERROR, details, cause);
  }
}

/** Ephemeral database setup failed (port, storage directory or engine boot). */
export class ProvisionError extends Neo4jKitError {
  constructor(message: string, details?: Neo4jKitErrorDetails, cause?: unknown) {
    super(message, Neo4jKitErrorCode.PROVISION_ERROR, details, cause);
  }
}

/** A native driver value could not be converted to a plain value. */
export class ConversionError extends Neo4jKitError {
  constructor(message: string, details?: Neo4jKitErrorDetails, cause?: unknown) {
    super(message, Neo4jKitErrorCode.CONVERSION_ERROR, details, cause);
  }
}

/** A query parameter is not one of the supported kinds. */
export class UnsupportedParameterTypeError extends Neo4jKitError {
  readonly path: string;

  constructor(path: string, received: string) {
    super(
      `Unsupported parameter type at '${path}': ${received}`,
      Neo4jKitErrorCode.UNSUPPORTED_PARAMETER_TYPE,
      { path, received },
    );
    this.path = path;
  }
}

const CONNECTION_FAILURE_CODES = new Set([
  'ServiceUnavailable',
  'SessionExpired',
  'Neo.ClientError.Security.Unauthorized',
  'Neo.ClientError.Security.AuthenticationRateLimit',
  'Neo.ClientError.Security.CredentialsExpired',
  'Neo.ClientError.Security.TokenExpired',
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

export function isConnectionFailure(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && CONNECTION_FAILURE_CODES.has(code);
}

/**
 * Maps driver connection failures to {@link ConnectionError}; returns every
 * other error as it is.
 */
export function mapDriverError(error: unknown, uri?: string): unknown {
  if (error instanceof Neo4jKitError || !isConnectionFailure(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ConnectionError(
    `Neo4j connection failed${uri ? ` (${uri})` : ''}: ${message}`,
    { uri, driverCode: errorCode(error) },
    error,
  );
}
