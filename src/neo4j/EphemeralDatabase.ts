/**
 * @fileoverview Disposable Neo4j instances for tests.
 *
 * Provisioning picks a free port by binding port 0 and releasing it, creates a
 * storage directory named by the current epoch millis under the system temp
 * directory, boots an engine bound to `localhost:<port>`, and connects to it
 * over Bolt without credentials.
 *
 * The port is released before the engine binds it, so another process can
 * take it in between. That race is accepted; nothing here retries.
 *
 * _All_ data is wiped when the connection is destroyed.
 *
 * @module neo4j-session-kit/neo4j/EphemeralDatabase
 */

import { mkdir, rm } from 'node:fs/promises';
import { createServer } from 'node:net';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { readNeo4jHome } from '../config/Neo4jEnvConfig.js';
import type { ILogger } from '../logging/ILogger.js';
import { childLogger, getDefaultLogger } from '../logging/PinoLogger.js';
import { Neo4jKitError, ProvisionError } from './errors.js';
import { Neo4jConnection } from './Neo4jConnection.js';
import {
  Neo4jServerLauncher,
  type EmbeddedEngineHandle,
  type EmbeddedEngineLauncher,
} from './Neo4jServerLauncher.js';
import type { DriverFactory } from './types.js';

const EPHEMERAL_HOST = 'localhost';

export interface EphemeralConnectionOptions {
  /** Engine to boot. Defaults to a Neo4j server from `neo4jHome`/`NEO4J_HOME`. */
  launcher?: EmbeddedEngineLauncher;
  neo4jHome?: string;
  /** Parent of the storage directory. Default: `os.tmpdir()` */
  baseDir?: string;
  logger?: ILogger;
  driverFactory?: DriverFactory;
}

/**
 * Asks the OS for a free TCP port on `host` and releases it again.
 * @throws ProvisionError when nothing can be bound.
 */
export function getFreePort(host: string = EPHEMERAL_HOST): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = createServer();
    server.once('error', (err) => {
      reject(new ProvisionError(`Could not bind a free port on ${host}: ${err.message}`, { host }, err));
    });
    server.listen(0, host, () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        server.close();
        reject(new ProvisionError(`Could not read the bound port on ${host}`, { host }));
        return;
      }
      server.close((err) => {
        if (err) {
          reject(new ProvisionError(`Could not release port ${address.port}`, { host }, err));
        } else {
          resolve(address.port);
        }
      });
    });
  });
}

/**
 * Creates `<baseDir>/<now>`. The directory must not exist yet: storage
 * directories are single-use.
 */
export async function createStorageDirectory(
  baseDir: string = tmpdir(),
  now: number = Date.now(),
): Promise<string> {
  const dir = join(baseDir, String(now));
  try {
    await mkdir(baseDir, { recursive: true });
    await mkdir(dir);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ProvisionError(`Could not create storage directory ${dir}: ${message}`, { dir }, err);
  }
  return dir;
}

/**
 * A connection to a disposable instance. `destroy()` closes the driver, stops
 * the engine and deletes the storage directory.
 */
export class EphemeralConnection extends Neo4jConnection {
  private destroyed = false;

  constructor(
    readonly port: number,
    readonly storeDir: string,
    private readonly engine: EmbeddedEngineHandle,
    logger: ILogger,
    driverFactory?: DriverFactory,
  ) {
    super({ uri: `bolt://${EPHEMERAL_HOST}:${port}` }, { logger, driverFactory });
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  /** Calling it again after the first call does nothing. */
  async destroy(): Promise<void> {
    if (this.destroyed) return;
    this.destroyed = true;
    try {
      await this.close();
    } finally {
      try {
        await this.engine.shutdown();
      } finally {
        await rm(this.storeDir, { recursive: true, force: true });
        this.logger.info('Ephemeral Neo4j instance destroyed', { uri: this.uri, storeDir: this.storeDir });
      }
    }
  }
}

export async function createEphemeralConnection(
  options: EphemeralConnectionOptions = {},
): Promise<EphemeralConnection> {
  const logger = childLogger(options.logger ?? getDefaultLogger(), { component: 'EphemeralDatabase' });
  const launcher =
    options.launcher ??
    new Neo4jServerLauncher({ neo4jHome: options.neo4jHome ?? readNeo4jHome() });

  const port = await getFreePort(EPHEMERAL_HOST);
  const storeDir = await createStorageDirectory(options.baseDir);
  logger.debug('Provisioning ephemeral Neo4j instance', { port, storeDir });

  let engine: EmbeddedEngineHandle;
  try {
    engine = await launcher.launch({ storeDir, host: EPHEMERAL_HOST, port, logger });
  } catch (err) {
    await rm(storeDir, { recursive: true, force: true });
    if (err instanceof Neo4jKitError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new ProvisionError(`Embedded engine failed to start: ${message}`, { port, storeDir }, err);
  }

  try {
    return new EphemeralConnection(port, storeDir, engine, logger, options.driverFactory);
  } catch (err) {
    try {
      await engine.shutdown();
    } finally {
      await rm(storeDir, { recursive: true, force: true });
    }
    throw err;
  }
}

export function destroyEphemeralConnection(connection: EphemeralConnection): Promise<void> {
  return connection.destroy();
}

/**
 * Provisions an ephemeral instance, runs `body` against it, and destroys the
 * instance on every exit path.
 */
export async function withEphemeralConnection<T>(
  body: (connection: EphemeralConnection) => Promise<T> | T,
  options?: EphemeralConnectionOptions,
): Promise<T> {
  const connection = await createEphemeralConnection(options);
  const logger = options?.logger ?? getDefaultLogger();
  logger.info('Started an ephemeral Neo4j instance', { uri: connection.uri, storeDir: connection.storeDir });
  try {
    return await body(connection);
  } finally {
    await destroyEphemeralConnection(connection);
  }
}
