/**
 * @fileoverview Parameterized Cypher runner over managed transactions.
 *
 * Handles session lifecycle (create/close in finally), executeRead/executeWrite
 * dispatch, and record conversion through the ValueConverter. All Cypher is
 * parameterized — no string interpolation.
 *
 * @module neo4j-session-kit/neo4j/Neo4jCypherRunner
 */

import type { ManagedTransaction, QueryResult } from 'neo4j-driver';
import { mapDriverError } from './errors.js';
import type { Neo4jConnection } from './Neo4jConnection.js';
import { recordsToObjects, toNeo4jParams, type ConversionOptions } from './ValueConverter.js';
import type { QueryParams, ResultRecord } from './types.js';

export interface CypherStatement {
  cypher: string;
  params?: QueryParams;
}

export class Neo4jCypherRunner {
  constructor(
    private readonly connection: Neo4jConnection,
    private readonly conversion: ConversionOptions = {},
  ) {}

  /**
   * Execute a read-only Cypher query with automatic session management.
   */
  async read(cypher: string, params?: QueryParams): Promise<ResultRecord[]> {
    const nativeParams = toNeo4jParams(params);
    const session = this.connection.session({ mode: 'READ' });
    try {
      const result = await session.executeRead((tx: ManagedTransaction) => tx.run(cypher, nativeParams));
      return recordsToObjects(result.records, this.conversion);
    } catch (err) {
      throw mapDriverError(err, this.connection.uri);
    } finally {
      await session.close();
    }
  }

  /**
   * Execute a write Cypher query with automatic session management.
   */
  async write(cypher: string, params?: QueryParams): Promise<ResultRecord[]> {
    const nativeParams = toNeo4jParams(params);
    const session = this.connection.session({ mode: 'WRITE' });
    try {
      const result = await session.executeWrite((tx: ManagedTransaction) => tx.run(cypher, nativeParams));
      return recordsToObjects(result.records, this.conversion);
    } catch (err) {
      throw mapDriverError(err, this.connection.uri);
    } finally {
      await session.close();
    }
  }

  /**
   * Execute a write Cypher query that returns no results.
   */
  async writeVoid(cypher: string, params?: QueryParams): Promise<void> {
    await this.write(cypher, params);
  }

  /**
   * Execute multiple write statements in a single transaction.
   * Every statement's parameters are converted before the first one runs.
   */
  async writeTransaction(statements: CypherStatement[]): Promise<ResultRecord[][]> {
    const prepared = statements.map((stmt) => ({ cypher: stmt.cypher, params: toNeo4jParams(stmt.params) }));
    const session = this.connection.session({ mode: 'WRITE' });
    try {
      const results = await session.executeWrite(async (tx: ManagedTransaction) => {
        const collected: QueryResult[] = [];
        for (const stmt of prepared) {
          collected.push(await tx.run(stmt.cypher, stmt.params));
        }
        return collected;
      });
      return results.map((result) => recordsToObjects(result.records, this.conversion));
    } catch (err) {
      throw mapDriverError(err, this.connection.uri);
    } finally {
      await session.close();
    }
  }
}
