/**
 * Control channel handlers. Each request from a second cliplog process lands
 * here after the guard has framed and parsed it.
 */

import { createLogger } from './services/logger';
import { Ch, errorResponse } from '../shared/ipc-schema';
import { formatIssues, HistoryCopyParams, validateIpcParams } from '../shared/schemas/ipc-params';
import { ClipLogError, ErrorCode } from '../shared/types/errors';
import type { Channel, IpcRequest, IpcResponse } from '../shared/ipc-schema';
import type { InstanceGuard } from './services/instance-guard';
import type { HistoryCommands } from './services/history-commands';
import type { LifecycleController } from './services/lifecycle-controller';
import type { ConfigService } from './services/config';

const log = createLogger('IPC');

export interface Services {
  commands: HistoryCommands;
  lifecycle: LifecycleController;
  configService: ConfigService;
}

type Handler = (args: unknown[]) => unknown;

/**
 * Register every control channel handler and hand the dispatcher to the guard.
 * Returns the dispatcher for direct use.
 */
export function setupIPC(guard: InstanceGuard, services: Services): (request: IpcRequest) => Promise<IpcResponse> {
  const { commands, lifecycle, configService } = services;
  const handlers = new Map<Channel, Handler>();

  function validatedHandle(channel: Channel, handler: Handler): void {
    handlers.set(channel, handler);
  }

  async function dispatch(request: IpcRequest): Promise<IpcResponse> {
    const handler = handlers.get(request.channel);
    if (!handler) {
      return errorResponse(new ClipLogError(`No handler for ${request.channel}`, ErrorCode.INVALID_PARAMS));
    }

    const error = validateIpcParams(request.channel, request.args);
    if (error) {
      const issues = formatIssues(error.issues);
      log.warn(`Validation failed on ${request.channel}: ${issues}`);
      return errorResponse(new ClipLogError(`Invalid parameters: ${issues}`, ErrorCode.INVALID_PARAMS));
    }

    try {
      const data = await handler(request.args);
      return { success: true, data };
    } catch (err) {
      const wrapped = ClipLogError.from(err);
      log.warn(`${request.channel} failed: ${wrapped.message}`);
      return errorResponse(wrapped);
    }
  }

  // ─── Window ───

  validatedHandle(Ch.WINDOW_FOCUS, () => {
    lifecycle.show();
    return lifecycle.getState();
  });

  validatedHandle(Ch.WINDOW_SHOW, () => {
    lifecycle.show();
    return lifecycle.getState();
  });

  validatedHandle(Ch.WINDOW_HIDE, () => {
    lifecycle.hide();
    return lifecycle.getState();
  });

  // ─── App ───

  validatedHandle(Ch.APP_QUIT, () => {
    // Reply first; the shutdown closes this connection
    setImmediate(() => {
      lifecycle.quit().catch((err) => log.error('Quit failed:', err));
    });
    return { phase: 'stopping' };
  });

  validatedHandle(Ch.APP_STATUS, () => commands.status());

  // ─── Monitor ───

  validatedHandle(Ch.MONITOR_START, async () => {
    await commands.monitorStart();
    return commands.status();
  });

  validatedHandle(Ch.MONITOR_STOP, async () => {
    await commands.monitorStop();
    return commands.status();
  });

  // ─── History ───

  validatedHandle(Ch.HISTORY_COPY, (args) => {
    const [id] = HistoryCopyParams.parse(args);
    return commands.copyById(id);
  });

  validatedHandle(Ch.HISTORY_DELETE_ALL, () => ({ deleted: commands.deleteAll() }));

  // ─── Config ───

  validatedHandle(Ch.CONFIG_RELOAD, () => ({ changed: configService.reload() }));

  guard.onRequest(dispatch);
  log.info(`Control channel ready (${handlers.size} channels)`);
  return dispatch;
}
