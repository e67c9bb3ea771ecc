/**
 * Client side of the control channel: one request, one response, bounded in
 * time. Used by a second launch to reach the running agent.
 */

import * as net from 'net';
import { createLogger } from './logger';
import { createNdjsonParser, encodeLine } from './ndjson';
import { parseIpcResponse } from '../../shared/schemas/ipc-params';
import type { IpcRequest, IpcResponse } from '../../shared/ipc-schema';

const log = createLogger('IpcClient');

/**
 * Send `request` to the agent listening on `socketPath`.
 * Resolves to the response, or null when nobody answered in time.
 */
export function sendIpcRequest(socketPath: string, request: IpcRequest, timeoutMs: number): Promise<IpcResponse | null> {
  return new Promise((resolve) => {
    let settled = false;
    const socket = net.createConnection(socketPath);

    const finish = (response: IpcResponse | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      resolve(response);
    };

    const timer = setTimeout(() => {
      log.debug(`No answer on ${request.channel} within ${timeoutMs}ms`);
      finish(null);
    }, timeoutMs);

    const parser = createNdjsonParser(
      (value) => {
        const response = parseIpcResponse(value);
        if (!response) {
          log.warn(`Malformed response on ${request.channel}`);
        }
        finish(response);
      },
      (line) => log.warn(`Unparseable response line: ${line.slice(0, 80)}`),
    );

    socket.setEncoding('utf8');
    socket.on('connect', () => {
      socket.write(encodeLine(request));
    });
    socket.on('data', (chunk: string) => parser.push(chunk));
    socket.on('end', () => {
      parser.flush();
      finish(null);
    });
    socket.on('error', (err) => {
      log.debug(`Control channel unreachable: ${err.message}`);
      finish(null);
    });
  });
}

/**
 * Probe whether something is accepting connections on `socketPath`.
 * A timeout counts as alive: the socket exists and may just be slow.
 */
export function probeSocket(socketPath: string, timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.createConnection(socketPath);
    const timer = setTimeout(() => {
      socket.destroy();
      resolve(true);
    }, timeoutMs);

    socket.once('connect', () => {
      clearTimeout(timer);
      socket.end();
      resolve(true);
    });
    socket.once('error', () => {
      clearTimeout(timer);
      socket.destroy();
      resolve(false);
    });
  });
}
