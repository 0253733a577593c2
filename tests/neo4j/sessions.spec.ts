/**
 * @file sessions.spec.ts
 * @description Tests for the session/transaction facade against the in-memory driver.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createConnection, type Neo4jConnection } from '../../src/neo4j/Neo4jConnection.js';
import {
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
} from '../../src/neo4j/sessions.js';
import { setDefaultLogger } from '../../src/logging/PinoLogger.js';
import { ConnectionError, UnsupportedParameterTypeError } from '../../src/neo4j/errors.js';
import {
  FakeDriverError,
  createInMemoryDriverFactory,
  createSilentLogger,
  type InMemoryDriverHarness,
} from '../helpers/InMemoryNeo4jDriver.js';

const URI = 'bolt://localhost:7687';

describe('sessions', () => {
  let harness: InMemoryDriverHarness;
  let connection: Neo4jConnection;

  beforeEach(() => {
    harness = createInMemoryDriverFactory();
    connection = createConnection(URI, undefined, undefined, {
      driverFactory: harness.factory,
      logger: createSilentLogger(),
    });
    setDefaultLogger(createSilentLogger());
  });

  afterEach(() => {
    setDefaultLogger(undefined);
  });

  function driver() {
    return harness.drivers[0];
  }

  describe('run', () => {
    it.each([
      ['a string', 'text'],
      ['an integer', 42],
      ['a negative integer', -7],
      ['a float', 1.5],
      ['true', true],
      ['false', false],
      ['null', null],
      ['a nested list', [1, 'two', [3]]],
      ['a nested map', { a: 1, b: { c: 'd', e: [true] } }],
    ])('echoes %s back unchanged', async (_label, value) => {
      const session = openSession(connection);
      try {
        expect(await run(session, 'RETURN $value AS value', { value })).toEqual([{ value }]);
      } finally {
        await session.close();
      }
    });

    it('echoes bytes back as Uint8Array', async () => {
      const rows = await withSession(connection, (session) =>
        run(session, 'RETURN $bytes AS bytes', { bytes: new Uint8Array([0, 127, 255]) }),
      );
      expect(rows).toEqual([{ bytes: new Uint8Array([0, 127, 255]) }]);
    });

    it('echoes large bigints when bigint integers are requested', async () => {
      const rows = await withSession(connection, (session) =>
        run(session, 'RETURN $big AS big', { big: 2n ** 60n }, { integers: 'bigint' }),
      );
      expect(rows).toEqual([{ big: 1152921504606846976n }]);
    });

    it('observes earlier writes in the same session', async () => {
      const rows = await withSession(connection, async (session) => {
        await run(session, 'CREATE (n:Test {v: 1})');
        return run(session, 'MATCH (n:Test) RETURN n.v AS v');
      });
      expect(rows).toEqual([{ v: 1 }]);
    });

    it('returns converted nodes', async () => {
      const rows = await withSession(connection, async (session) => {
        await run(session, 'CREATE (p:Person {name: $name})', { name: 'Ada' });
        return run(session, 'MATCH (p:Person) RETURN p');
      });
      expect(rows).toEqual([
        { p: { kind: 'node', elementId: '4:test:0', labels: ['Person'], properties: { name: 'Ada' } } },
      ]);
    });

    it('rejects unsupported parameters before the driver sees them', async () => {
      const session = openSession(connection);
      await expect(run(session, 'RETURN $fn AS fn', { fn: () => 1 })).rejects.toBeInstanceOf(
        UnsupportedParameterTypeError,
      );
      expect(driver().runCalls).toEqual([]);
      await session.close();
    });

    it('passes query errors through unchanged', async () => {
      const session = openSession(connection);
      const error = await run(session, 'MATCH n RETURN n').catch((err: unknown) => err);
      expect(error).toBeInstanceOf(FakeDriverError);
      expect(error).toMatchObject({ code: 'Neo.ClientError.Statement.SyntaxError' });
      await session.close();
    });

    it('reports connection failures on first use as ConnectionError', async () => {
      const unavailable = createInMemoryDriverFactory({ unavailable: true });
      const offline = createConnection(URI, 'neo4j', 'test-secret', {
        driverFactory: unavailable.factory,
        logger: createSilentLogger(),
      });
      const session = openSession(offline);

      const error = await run(session, 'RETURN 1 AS one').catch((err: unknown) => err);
      expect(error).toBeInstanceOf(ConnectionError);
      expect((error as ConnectionError).cause).toBeInstanceOf(FakeDriverError);
      expect((error as ConnectionError).details).toEqual({ uri: URI, driverCode: 'ServiceUnavailable' });
    });

    it('maps a lost connection on commit to ConnectionError naming the URI', async () => {
      const session = openSession(connection);
      const tx = openTransaction(session);
      await run(tx, 'CREATE (n:Test {v: 1})');
      driver().offline = true;

      const error = await commit(tx).catch((err: unknown) => err);
      driver().offline = false;

      expect(error).toBeInstanceOf(ConnectionError);
      expect((error as ConnectionError).details).toEqual({ uri: URI, driverCode: 'ServiceUnavailable' });
      expect(tx.isOpen()).toBe(false);
      await session.close();
    });
  });

  describe('createQuery', () => {
    it('binds the Cypher text and accepts fresh parameters on each call', async () => {
      const echo = createQuery('RETURN $x AS x');
      expect(echo.cypher).toBe('RETURN $x AS x');

      const session = openSession(connection);
      try {
        expect(await echo(session, { x: 'first' })).toEqual([{ x: 'first' }]);
        expect(await echo(session, { x: 2 })).toEqual([{ x: 2 }]);
      } finally {
        await session.close();
      }
    });

    it('runs without parameters', async () => {
      const count = createQuery('MATCH (n:Test) RETURN count(n) AS total');
      const rows = await withSession(connection, (session) => count(session));
      expect(rows).toEqual([{ total: 0 }]);
    });
  });

  describe('withSession', () => {
    it('closes the session when the body throws', async () => {
      await expect(
        withSession(connection, () => {
          throw new Error('boom');
        }),
      ).rejects.toThrow('boom');
      expect(driver().sessions[0].closed).toBe(true);
    });

    it('opens sessions in the requested access mode', async () => {
      await withSession(connection, () => undefined, { mode: 'READ' });
      expect(driver().sessions[0].config).toMatchObject({ defaultAccessMode: 'READ' });
    });

    it('keeps the body error when closing the session also fails', async () => {
      await expect(
        withSession(connection, () => {
          driver().sessions[0].closeError = new Error('close failed');
          throw new Error('body failed');
        }),
      ).rejects.toThrow('body failed');
      expect(driver().sessions[0].closed).toBe(true);
    });

    it('reports a close failure when the body succeeded', async () => {
      await expect(
        withSession(connection, () => {
          driver().sessions[0].closeError = new Error('close failed');
          return 'done';
        }),
      ).rejects.toThrow('close failed');
    });
  });

  describe('withTransaction', () => {
    it('rolls back and closes the transaction when the body throws', async () => {
      const session = openSession(connection);

      await expect(
        withTransaction(session, async (tx) => {
          await run(tx, 'CREATE (n:Test {v: 1})');
          tx.success();
          throw new Error('body failed');
        }),
      ).rejects.toThrow('body failed');

      const fakeTx = driver().sessions[0].transactions[0];
      expect(fakeTx.isOpen()).toBe(false);
      expect(fakeTx.rollbackCount).toBe(1);
      expect(fakeTx.commitCount).toBe(0);
      expect(await run(session, 'MATCH (n:Test) RETURN n.v AS v')).toEqual([]);
      await session.close();
    });

    it('commits on close when the body marks success', async () => {
      const session = openSession(connection);

      const result = await withTransaction(session, async (tx) => {
        await run(tx, 'CREATE (n:Test {v: 2})');
        success(tx);
        return 'done';
      });

      expect(result).toBe('done');
      expect(driver().sessions[0].transactions[0].commitCount).toBe(1);
      expect(await run(session, 'MATCH (n:Test) RETURN n.v AS v')).toEqual([{ v: 2 }]);
      await session.close();
    });

    it('rolls back an unmarked transaction', async () => {
      const session = openSession(connection);

      await withTransaction(session, (tx) => run(tx, 'CREATE (n:Test {v: 3})'));

      expect(driver().sessions[0].transactions[0].rollbackCount).toBe(1);
      expect(await run(session, 'MATCH (n:Test) RETURN n.v AS v')).toEqual([]);
      await session.close();
    });

    it('lets failure() override an earlier success()', async () => {
      const session = openSession(connection);

      await withTransaction(session, async (tx) => {
        await run(tx, 'CREATE (n:Test {v: 4})');
        success(tx);
        failure(tx);
      });

      expect(driver().sessions[0].transactions[0].rollbackCount).toBe(1);
      await session.close();
    });

    it('treats an explicit commit as terminal', async () => {
      const session = openSession(connection);

      await withTransaction(session, async (tx) => {
        await run(tx, 'CREATE (n:Test {v: 5})');
        await commit(tx);
        expect(tx.isOpen()).toBe(false);
      });

      const fakeTx = driver().sessions[0].transactions[0];
      expect(fakeTx.commitCount).toBe(1);
      expect(fakeTx.rollbackCount).toBe(0);
      await session.close();
    });
  });

  describe('failed transactions', () => {
    it('surfaces the driver error when committing after a failed statement', async () => {
      const session = openSession(connection);
      const tx = openTransaction(session);

      await run(tx, 'CREATE (n:Test {v: 8})');
      await expect(run(tx, 'BROKEN')).rejects.toBeInstanceOf(FakeDriverError);
      await expect(commit(tx)).rejects.toThrow('Cannot commit this transaction');

      expect(await run(session, 'MATCH (n:Test) RETURN n.v AS v')).toEqual([]);
      await session.close();
    });

    it('rejects withTransaction when a success-marked transaction cannot commit', async () => {
      const session = openSession(connection);

      await expect(
        withTransaction(session, async (tx) => {
          await run(tx, 'BROKEN').catch(() => undefined);
          tx.success();
          return 'committed';
        }),
      ).rejects.toThrow('Cannot commit this transaction');

      expect(driver().sessions[0].transactions[0].commitCount).toBe(0);
      await session.close();
    });

    it('rolls back a failed transaction quietly', async () => {
      const session = openSession(connection);
      const tx = openTransaction(session);

      await expect(run(tx, 'BROKEN')).rejects.toBeInstanceOf(FakeDriverError);
      await expect(rollback(tx)).resolves.toBeUndefined();
      await session.close();
    });

    it('keeps the body error when the rollback on close also fails', async () => {
      const session = openSession(connection);

      await expect(
        withTransaction(session, async (tx) => {
          await run(tx, 'CREATE (n:Test {v: 9})');
          driver().offline = true;
          throw new Error('body failed');
        }),
      ).rejects.toThrow('body failed');

      driver().offline = false;
      await session.close();
      expect(await withSession(connection, (s) => run(s, 'MATCH (n:Test) RETURN n.v AS v'))).toEqual([]);
    });
  });

  describe('explicit transactions', () => {
    it('sees its own writes before commit and hides them after rollback', async () => {
      const session = openSession(connection);
      const tx = openTransaction(session);

      await run(tx, 'CREATE (n:Test {v: 6})');
      expect(await run(tx, 'MATCH (n:Test) RETURN n.v AS v')).toEqual([{ v: 6 }]);
      await rollback(tx);
      await tx.close();

      expect(await run(session, 'MATCH (n:Test) RETURN n.v AS v')).toEqual([]);
      expect(driver().sessions[0].transactions[0].rollbackCount).toBe(1);
      await session.close();
    });
  });

  describe('distinct sessions', () => {
    it('have independent lifecycles and share committed data', async () => {
      const first = openSession(connection);
      const second = openSession(connection);
      expect(first).not.toBe(second);

      await run(first, 'CREATE (n:Test {v: 7})');
      await first.close();

      expect(await run(second, 'MATCH (n:Test) RETURN n.v AS v')).toEqual([{ v: 7 }]);
      expect(driver().sessions.map((s) => s.closed)).toEqual([true, false]);
      await second.close();
    });
  });
});
