/**
 * @fileoverview Boots a throwaway Neo4j server from a local distribution.
 *
 * The server runs as a child process (`$NEO4J_HOME/bin/neo4j console`) with a
 * generated `neo4j.conf` that keeps data, logs and run files inside the
 * ephemeral storage directory, enables Bolt on the chosen port, and turns
 * authentication and HTTP off.
 *
 * @module neo4j-session-kit/neo4j/Neo4jServerLauncher
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { existsSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { createConnection as createSocket } from 'node:net';
import { join } from 'node:path';
import type { ILogger } from '../logging/ILogger.js';
import { ProvisionError } from './errors.js';

export interface EmbeddedEngineLaunchOptions {
  storeDir: string;
  host: string;
  port: number;
  logger: ILogger;
}

export interface EmbeddedEngineHandle {
  /** Stops the engine. Data in the storage directory is discarded by the caller. */
  shutdown(): Promise<void>;
}

export interface EmbeddedEngineLauncher {
  launch(options: EmbeddedEngineLaunchOptions): Promise<EmbeddedEngineHandle>;
}

export interface Neo4jServerLauncherConfig {
  /** Root of the Neo4j distribution (the directory holding `bin/neo4j`). */
  neo4jHome?: string;
  /** How long to wait for Bolt to accept connections. Default: 60000 */
  startupTimeoutMs?: number;
  /** How long to wait for the process to exit before SIGKILL. Default: 15000 */
  shutdownTimeoutMs?: number;
}

const DEFAULT_STARTUP_TIMEOUT_MS = 60_000;
const DEFAULT_SHUTDOWN_TIMEOUT_MS = 15_000;
const PORT_POLL_INTERVAL_MS = 250;

export function renderNeo4jConf(storeDir: string, host: string, port: number): string {
  return [
    `server.directories.data=${join(storeDir, 'data')}`,
    `server.directories.logs=${join(storeDir, 'logs')}`,
    `server.directories.run=${join(storeDir, 'run')}`,
    'server.bolt.enabled=true',
    `server.bolt.listen_address=${host}:${port}`,
    `server.bolt.advertised_address=${host}:${port}`,
    'server.http.enabled=false',
    'server.https.enabled=false',
    'dbms.security.auth_enabled=false',
    '',
  ].join('\n');
}

function canConnect(host: string, port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = createSocket({ host, port });
    socket.once('connect', () => {
      socket.destroy();
      resolve(true);
    });
    socket.once('error', () => {
      socket.destroy();
      resolve(false);
    });
  });
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function waitForExit(child: ChildProcess, timeoutMs: number): Promise<boolean> {
  if (child.exitCode !== null || child.signalCode !== null) return Promise.resolve(true);
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), timeoutMs);
    child.once('exit', () => {
      clearTimeout(timer);
      resolve(true);
    });
  });
}

class Neo4jServerProcess implements EmbeddedEngineHandle {
  constructor(
    private readonly child: ChildProcess,
    private readonly shutdownTimeoutMs: number,
    private readonly logger: ILogger,
  ) {}

  async shutdown(): Promise<void> {
    if (this.child.exitCode !== null || this.child.signalCode !== null) return;
    this.child.kill('SIGTERM');
    if (!(await waitForExit(this.child, this.shutdownTimeoutMs))) {
      this.logger.warn('Neo4j server did not stop in time; sending SIGKILL', { pid: this.child.pid });
      this.child.kill('SIGKILL');
      await waitForExit(this.child, this.shutdownTimeoutMs);
    }
    this.logger.info('Neo4j server stopped', { pid: this.child.pid });
  }
}

/**
 * Default {@link EmbeddedEngineLauncher}: a Neo4j server child process.
 */
export class Neo4jServerLauncher implements EmbeddedEngineLauncher {
  private readonly startupTimeoutMs: number;
  private readonly shutdownTimeoutMs: number;

  constructor(private readonly config: Neo4jServerLauncherConfig = {}) {
    this.startupTimeoutMs = config.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT_MS;
    this.shutdownTimeoutMs = config.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
  }

  async launch({ storeDir, host, port, logger }: EmbeddedEngineLaunchOptions): Promise<EmbeddedEngineHandle> {
    const neo4jHome = this.config.neo4jHome;
    if (!neo4jHome) {
      throw new ProvisionError('No Neo4j distribution configured. Set NEO4J_HOME or pass neo4jHome.');
    }
    const executable = join(neo4jHome, 'bin', 'neo4j');
    if (!existsSync(executable)) {
      throw new ProvisionError(`Neo4j executable not found at ${executable}`, { neo4jHome });
    }

    const confDir = join(storeDir, 'conf');
    await mkdir(confDir, { recursive: true });
    await writeFile(join(confDir, 'neo4j.conf'), renderNeo4jConf(storeDir, host, port), 'utf8');

    const child = spawn(executable, ['console'], {
      env: { ...process.env, NEO4J_HOME: neo4jHome, NEO4J_CONF: confDir },
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    child.stdout?.on('data', (chunk: Buffer) => logger.debug(chunk.toString().trimEnd(), { stream: 'stdout' }));
    child.stderr?.on('data', (chunk: Buffer) => logger.debug(chunk.toString().trimEnd(), { stream: 'stderr' }));

    const startup: { error?: Error } = {};
    child.once('error', (err) => {
      startup.error = err;
    });

    const handle = new Neo4jServerProcess(child, this.shutdownTimeoutMs, logger);
    const deadline = Date.now() + this.startupTimeoutMs;

    while (Date.now() < deadline) {
      if (startup.error) {
        throw new ProvisionError(`Failed to start Neo4j: ${startup.error.message}`, { executable }, startup.error);
      }
      if (child.exitCode !== null || child.signalCode !== null) {
        const reason = child.exitCode !== null ? `code ${child.exitCode}` : `signal ${child.signalCode}`;
        throw new ProvisionError(`Neo4j exited during startup with ${reason}`, {
          executable,
          exitCode: child.exitCode,
          signal: child.signalCode,
        });
      }
      if (await canConnect(host, port)) {
        logger.info('Neo4j server accepting Bolt connections', { pid: child.pid, host, port });
        return handle;
      }
      await delay(PORT_POLL_INTERVAL_MS);
    }

    await handle.shutdown();
    throw new ProvisionError(`Neo4j did not accept Bolt connections within ${this.startupTimeoutMs}ms`, {
      host,
      port,
    });
  }
}
