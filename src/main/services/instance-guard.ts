/**
 * InstanceGuard: at most one cliplog agent per user.
 *
 * The guard is a listening local socket: a Unix domain socket inside the
 * per-user data directory, or a per-user named pipe on Windows. The OS
 * refuses a second listener on the same path and tears the listener down
 * with the owning process, so a crash never strands the lock. A socket file
 * left behind by a crashed process refuses connections; it is removed and
 * the listen retried once.
 *
 * The same socket carries the control channel: a second launch sends its
 * requests (focus, quit, copy, ...) here.
 */

import * as fsp from 'fs/promises';
import * as net from 'net';
import * as path from 'path';
import { createLogger } from './logger';
import { createNdjsonParser, encodeLine } from './ndjson';
import { probeSocket, sendIpcRequest } from './ipc-client';
import { parseIpcRequest } from '../../shared/schemas/ipc-params';
import { errorResponse } from '../../shared/ipc-schema';
import type { IpcRequest, IpcResponse } from '../../shared/ipc-schema';
import { ClipLogError, ErrorCode } from '../../shared/types/errors';
import type { AcquireResult } from '../../shared/types/lifecycle';

const log = createLogger('InstanceGuard');

/** Time a control connection gets to flush its last reply on release (ms) */
const SOCKET_LINGER_MS = 100;

export type IpcRequestHandler = (request: IpcRequest) => Promise<IpcResponse>;

export interface InstanceGuardOptions {
  /** Bound on probing and signalling the running instance (ms) */
  signalTimeoutMs?: number;
}

function errnoCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

export class InstanceGuard {
  private server: net.Server | null = null;
  private sockets = new Set<net.Socket>();
  private handler: IpcRequestHandler | null = null;
  private signalTimeoutMs: number;

  constructor(
    private readonly socketPath: string,
    options: InstanceGuardOptions = {},
  ) {
    this.signalTimeoutMs = options.signalTimeoutMs ?? 1000;
  }

  getSocketPath(): string {
    return this.socketPath;
  }

  isHeld(): boolean {
    return this.server !== null;
  }

  setSignalTimeout(ms: number): void {
    this.signalTimeoutMs = ms;
  }

  /** Install the handler that answers control requests. */
  onRequest(handler: IpcRequestHandler): void {
    this.handler = handler;
  }

  async acquire(): Promise<AcquireResult> {
    if (this.server) return { status: 'acquired' };

    if (process.platform !== 'win32') {
      await fsp.mkdir(path.dirname(this.socketPath), { recursive: true });
    }

    if (await this.tryListen()) return { status: 'acquired' };

    if (await probeSocket(this.socketPath, this.signalTimeoutMs)) {
      return { status: 'already-running' };
    }

    if (process.platform === 'win32') {
      // A pipe that refuses us but cannot be reached is still owned by someone
      return { status: 'already-running' };
    }

    log.warn(`Removing stale instance socket ${this.socketPath}`);
    await fsp.rm(this.socketPath, { force: true });

    return (await this.tryListen()) ? { status: 'acquired' } : { status: 'already-running' };
  }

  /**
   * Send one request to the instance that holds the guard.
   * Resolves to null when it cannot be delivered in time.
   */
  signal(request: IpcRequest): Promise<IpcResponse | null> {
    return sendIpcRequest(this.socketPath, request, this.signalTimeoutMs);
  }

  async release(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    for (const socket of this.sockets) {
      socket.end();
      setTimeout(() => socket.destroy(), SOCKET_LINGER_MS).unref();
    }
    this.sockets.clear();

    await new Promise<void>((resolve) => {
      server.close((err) => {
        if (err) log.warn('Error closing instance socket:', err.message);
        resolve();
      });
    });
    log.info('Instance guard released');
  }

  // ─── Private ───

  /** Resolves false on EADDRINUSE; other listen failures are fatal. */
  private tryListen(): Promise<boolean> {
    return new Promise((resolve, reject) => {
      const server = net.createServer((socket) => this.handleConnection(socket));

      const onError = (err: Error) => {
        server.close();
        if (errnoCode(err) === 'EADDRINUSE') {
          resolve(false);
        } else {
          reject(ClipLogError.from(err, ErrorCode.CONTROL_CHANNEL_ERROR, { socketPath: this.socketPath }));
        }
      };

      server.once('error', onError);
      server.listen(this.socketPath, () => {
        server.off('error', onError);
        server.on('error', (err) => log.error('Instance socket error:', err));
        this.server = server;
        log.info(`Instance guard acquired on ${this.socketPath}`);
        resolve(true);
      });
    });
  }

  private handleConnection(socket: net.Socket): void {
    this.sockets.add(socket);
    socket.setEncoding('utf8');

    const reply = (response: IpcResponse) => {
      if (!socket.destroyed) socket.write(encodeLine(response));
    };

    const parser = createNdjsonParser(
      (value) => {
        this.dispatch(value)
          .then(reply)
          .catch((err) => {
            log.error('Control request failed:', err);
            reply(errorResponse(ClipLogError.from(err)));
          });
      },
      () => reply(errorResponse(new ClipLogError('Malformed request line', ErrorCode.INVALID_PARAMS))),
    );

    socket.on('data', (chunk: string) => parser.push(chunk));
    socket.on('close', () => this.sockets.delete(socket));
    socket.on('error', (err) => log.debug('Control connection error:', err.message));
  }

  private async dispatch(value: unknown): Promise<IpcResponse> {
    const parsed = parseIpcRequest(value);
    if ('error' in parsed) {
      return errorResponse(new ClipLogError(`Invalid request: ${parsed.error}`, ErrorCode.INVALID_PARAMS));
    }
    if (!this.handler) {
      return errorResponse(new ClipLogError('Agent is not accepting commands yet', ErrorCode.INVALID_STATE));
    }
    return this.handler(parsed.request);
  }
}
