/**
 * Control channel definitions: single source of truth.
 *
 * A second cliplog process talks to the running agent over the instance
 * socket. Both the agent (ipc.ts) and the CLI client import from this file.
 *
 * Convention: channels use `namespace:action` format. Every request gets
 * exactly one response line.
 */

import type { ClipLogError } from './types/errors';

export const Ch = {
  // Window (display surface)
  WINDOW_FOCUS: 'window:focus',
  WINDOW_SHOW: 'window:show',
  WINDOW_HIDE: 'window:hide',

  // App
  APP_QUIT: 'app:quit',
  APP_STATUS: 'app:status',

  // Monitor
  MONITOR_START: 'monitor:start',
  MONITOR_STOP: 'monitor:stop',

  // History
  HISTORY_COPY: 'history:copy',
  HISTORY_DELETE_ALL: 'history:delete-all',

  // Config
  CONFIG_RELOAD: 'config:reload',
} as const;

export type Channel = (typeof Ch)[keyof typeof Ch];

export const ALL_CHANNELS: readonly Channel[] = Object.values(Ch);

export function isChannel(value: string): value is Channel {
  return ALL_CHANNELS.some((channel) => channel === value);
}

/** One request line on the control socket */
export interface IpcRequest {
  channel: Channel;
  args: unknown[];
}

export interface IpcErrorPayload {
  code: string;
  message: string;
}

/** One response line on the control socket */
export type IpcResponse<T = unknown> = { success: true; data?: T } | { success: false; error: IpcErrorPayload };

export function errorResponse(err: ClipLogError): IpcResponse<never> {
  return { success: false, error: { code: err.code, message: err.message } };
}
