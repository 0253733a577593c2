/**
 * @fileoverview Session and transaction helpers.
 *
 * Every helper that opens a session or a transaction also closes it, on normal
 * return and on failure. Nothing here retries.
 *
 * @module neo4j-session-kit/neo4j/sessions
 */

import type { QueryResult, Result, Session, Transaction } from 'neo4j-driver';
import { getDefaultLogger } from '../logging/PinoLogger.js';
import { mapDriverError } from './errors.js';
import { sessionUri, type Neo4jConnection, type SessionOptions } from './Neo4jConnection.js';
import { recordsToObjects, toNeo4jParams, type ConversionOptions } from './ValueConverter.js';
import type { BoundQuery, CypherTarget, QueryParams, ResultRecord } from './types.js';

type TransactionOutcome = 'pending' | 'success' | 'failure';

/**
 * Explicit transaction with a marked outcome.
 *
 * `success()` and `failure()` only mark the outcome; `close()` then commits
 * (marked success) or rolls back (anything else). `commit()` and `rollback()`
 * end the transaction immediately. Whichever terminal call comes first wins;
 * later ones are no-ops. A driver transaction that already failed still gets
 * its commit or rollback, so the driver's own error surfaces.
 */
export class GraphTransaction implements CypherTarget {
  private outcome: TransactionOutcome = 'pending';
  private ended = false;

  constructor(
    private readonly tx: Transaction,
    readonly uri?: string,
  ) {}

  run(query: string, parameters?: Record<string, unknown>): Result {
    return this.tx.run(query, parameters);
  }

  /** Mark the transaction to commit on close. */
  success(): void {
    if (this.outcome === 'pending') this.outcome = 'success';
  }

  /** Mark the transaction to roll back on close, even after success(). */
  failure(): void {
    this.outcome = 'failure';
  }

  isOpen(): boolean {
    return !this.ended && this.tx.isOpen();
  }

  async commit(): Promise<void> {
    await this.end('commit');
  }

  async rollback(): Promise<void> {
    await this.end('rollback');
  }

  async close(): Promise<void> {
    await this.end(this.outcome === 'success' ? 'commit' : 'rollback');
  }

  private async end(action: 'commit' | 'rollback'): Promise<void> {
    if (this.ended) return;
    this.ended = true;
    try {
      await (action === 'commit' ? this.tx.commit() : this.tx.rollback());
    } catch (err) {
      throw mapDriverError(err, this.uri);
    }
  }
}

function targetUri(target: CypherTarget): string | undefined {
  return target instanceof GraphTransaction ? target.uri : sessionUri(target);
}

export function openSession(connection: Neo4jConnection, options?: SessionOptions): Session {
  return connection.session(options);
}

export function openTransaction(session: Session): GraphTransaction {
  return new GraphTransaction(session.beginTransaction(), sessionUri(session));
}

export function commit(tx: GraphTransaction): Promise<void> {
  return tx.commit();
}

export function rollback(tx: GraphTransaction): Promise<void> {
  return tx.rollback();
}

export function success(tx: GraphTransaction): void {
  tx.success();
}

export function failure(tx: GraphTransaction): void {
  tx.failure();
}

/**
 * Runs one Cypher statement and returns the fully received, converted rows.
 *
 * Parameters are converted before the driver sees them. Connection failures
 * become ConnectionError; other driver errors propagate unchanged.
 */
export async function run(
  target: CypherTarget,
  cypher: string,
  params?: QueryParams,
  options?: ConversionOptions,
): Promise<ResultRecord[]> {
  const nativeParams = toNeo4jParams(params);
  let result: QueryResult;
  try {
    result = await target.run(cypher, nativeParams);
  } catch (err) {
    throw mapDriverError(err, targetUri(target));
  }
  return recordsToObjects(result.records, options);
}

/**
 * Binds a Cypher text once and returns a reusable query function.
 *
 * ```typescript
 * const findByName = createQuery('MATCH (p:Person {name: $name}) RETURN p');
 * const rows = await findByName(session, { name: 'Ada' });
 * ```
 */
export function createQuery(cypher: string, options?: ConversionOptions): BoundQuery {
  const bound = (target: CypherTarget, params?: QueryParams) => run(target, cypher, params, options);
  return Object.assign(bound, { cypher });
}

/**
 * Runs a close step. When the body already failed, the body's error is the one
 * that propagates and a close failure is only logged.
 */
async function closeAfter(
  close: () => Promise<void>,
  bodyError: { error: unknown } | undefined,
  resource: 'session' | 'transaction',
): Promise<void> {
  try {
    await close();
  } catch (closeError) {
    if (!bodyError) throw closeError;
    getDefaultLogger().warn(`Failed to close ${resource} after an error`, {
      error: closeError instanceof Error ? closeError.message : String(closeError),
      cause: bodyError.error instanceof Error ? bodyError.error.message : String(bodyError.error),
    });
  }
}

/** Opens a session, runs `body`, and closes the session on every exit path. */
export async function withSession<T>(
  connection: Neo4jConnection,
  body: (session: Session) => Promise<T> | T,
  options?: SessionOptions,
): Promise<T> {
  const session = openSession(connection, options);
  let bodyError: { error: unknown } | undefined;
  try {
    return await body(session);
  } catch (err) {
    bodyError = { error: err };
    throw err;
  } finally {
    await closeAfter(() => session.close(), bodyError, 'session');
  }
}

/**
 * Opens a transaction, runs `body`, and closes the transaction on every exit
 * path. The body decides the outcome with `success()`/`commit()`; a
 * transaction left unmarked, or a body that throws, rolls back.
 */
export async function withTransaction<T>(
  session: Session,
  body: (tx: GraphTransaction) => Promise<T> | T,
): Promise<T> {
  const tx = openTransaction(session);
  let bodyError: { error: unknown } | undefined;
  try {
    return await body(tx);
  } catch (err) {
    bodyError = { error: err };
    tx.failure();
    throw err;
  } finally {
    await closeAfter(() => tx.close(), bodyError, 'transaction');
  }
}
