/**
 * Command-line front end.
 *
 * `run` hosts the agent in this process. Read commands open the history file
 * directly. Commands that change agent state go over the control channel;
 * copy, delete-all and status fall back to acting on the file when no agent
 * answers.
 */

import { parseArgs } from 'util';
import { z } from 'zod';
import { createLogger, setLogLevel } from './services/logger';
import { resolveAppPaths } from './services/app-paths';
import { ConfigService } from './services/config';
import { HistoryStore } from './services/history-store';
import { HistoryCommands } from './services/history-commands';
import { SystemClipboard } from './services/clipboard-access';
import { ServiceContainer } from './services/service-container';
import { InstanceGuard } from './services/instance-guard';
import { previewText } from './services/history-view';
import { sendIpcRequest } from './services/ipc-client';
import { Ch } from '../shared/ipc-schema';
import {
  ClipItemSchema,
  DeleteAllResultSchema,
  formatIssues,
  HistoryStatusSchema,
} from '../shared/schemas/ipc-params';
import { CONFIG_KEYS } from '../shared/schemas/config-schema';
import { ClipLogError, ErrorCode } from '../shared/types/errors';
import { ExitCode } from '../shared/types/lifecycle';
import type { AppPaths } from './services/app-paths';
import type { ClipboardAccess } from './services/clipboard-access';
import type { ViewOutput } from './services/history-view';
import type { IpcRequest, IpcResponse } from '../shared/ipc-schema';
import type { ClipItem, HistoryStatus } from '../shared/types/clip';
import type { ExitCodeValue } from '../shared/types/lifecycle';

const log = createLogger('CLI');

export const USAGE = `Usage: cliplog <command> [options]

Agent:
  run [--hidden]              Start the clipboard history agent
  show | hide                 Show or hide the running agent's history view
  quit                        Stop the running agent
  monitor start|stop          Resume or pause clipboard monitoring
  status                      Agent and history summary

History:
  list [--order newest|oldest] [--limit N] [--search TEXT]
  get <id>                    Print one snippet
  copy <id>                   Put a snippet back on the clipboard
  export <path>               Write the whole history as CSV
  delete-all --yes            Remove every snippet

Settings:
  config [key [value]]        Show or change a setting
`;

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export interface CliOptions {
  paths?: AppPaths;
  io?: CliIO;
  clipboard?: ClipboardAccess;
  /** Where `run` prints the history view */
  viewOutput?: ViewOutput;
}

// ─── Argument schemas ───

const IdSchema = z.coerce.number().int().positive();

const ListOptionsSchema = z.object({
  order: z.enum(['newest', 'oldest']).default('newest'),
  limit: z.coerce.number().int().positive().optional(),
  search: z.string().min(1).optional(),
});

const MonitorActionSchema = z.enum(['start', 'stop']);

const ConfigKeySchema = z.enum(CONFIG_KEYS);

const PathSchema = z.string().min(1);

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ClipLogError(`Invalid ${what}: ${formatIssues(result.error.issues)}`, ErrorCode.INVALID_PARAMS);
  }
  return result.data;
}

// ─── Context ───

interface ParsedValues {
  hidden?: boolean;
  order?: string;
  limit?: string;
  search?: string;
  yes?: boolean;
  help?: boolean;
}

interface CommandContext {
  paths: AppPaths;
  io: CliIO;
  config: ConfigService;
  values: ParsedValues;
  args: string[];
  clipboard?: ClipboardAccess;
  viewOutput?: ViewOutput;
}

type CommandHandler = (ctx: CommandContext) => Promise<ExitCodeValue>;

const processIO: CliIO = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

function toErrorCode(code: string): ErrorCode {
  return Object.values(ErrorCode).find((value) => value === code) ?? ErrorCode.UNKNOWN_ERROR;
}

function exitCodeFor(err: ClipLogError): ExitCodeValue {
  switch (err.code) {
    case ErrorCode.INVALID_PARAMS:
    case ErrorCode.CONFIG_VALIDATION_ERROR:
      return ExitCode.USAGE;
    case ErrorCode.ALREADY_RUNNING:
      return ExitCode.ALREADY_RUNNING;
    default:
      return ExitCode.FAILURE;
  }
}

/** Ask the running agent; null when none answered */
function askAgent(ctx: CommandContext, request: IpcRequest): Promise<IpcResponse | null> {
  return sendIpcRequest(ctx.paths.socketPath, request, ctx.config.get('signalTimeoutMs'));
}

/** Ask the running agent; NOT_RUNNING when none answered */
async function requireAgent(ctx: CommandContext, request: IpcRequest): Promise<unknown> {
  const response = await askAgent(ctx, request);
  if (!response) {
    throw new ClipLogError('No cliplog agent is running', ErrorCode.NOT_RUNNING);
  }
  return unwrap(response);
}

function unwrap(response: IpcResponse): unknown {
  if (!response.success) {
    throw new ClipLogError(response.error.message, toErrorCode(response.error.code));
  }
  return response.data;
}

/** Run `fn` against the history file directly */
async function withLocalCommands<T>(ctx: CommandContext, fn: (commands: HistoryCommands) => T | Promise<T>): Promise<T> {
  const store = new HistoryStore(ctx.paths.databasePath, { busyTimeoutMs: ctx.config.get('busyTimeoutMs') });
  store.initialize();
  try {
    const clipboard = ctx.clipboard ?? new SystemClipboard({ readTimeoutMs: ctx.config.get('clipboardReadTimeoutMs') });
    return await fn(new HistoryCommands(store, clipboard));
  } finally {
    store.close();
  }
}

// ─── Output ───

export function formatListLine(item: ClipItem): string {
  return `[${item.id}] ${item.capturedAtUtc}  ${previewText(item.text)}`;
}

export function formatStatus(status: HistoryStatus, agentRunning: boolean): string {
  const lines = [
    `agent: ${agentRunning ? 'running' : 'not running'}`,
    `monitoring: ${status.monitoring ? 'on' : 'off'}`,
  ];
  if (status.visibility) lines.push(`visibility: ${status.visibility}`);
  if (status.startedAt) lines.push(`monitoring since: ${status.startedAt}`);
  lines.push(`entries: ${status.totalEntries}`);
  lines.push(`latest id: ${status.latestId ?? '-'}`);
  lines.push(`database: ${status.databasePath}`);
  return `${lines.join('\n')}\n`;
}

// ─── Commands ───

const runCommand: CommandHandler = async (ctx) => {
  // The guard comes first: a second agent must not open the store at all
  const guard = new InstanceGuard(ctx.paths.socketPath, { signalTimeoutMs: ctx.config.get('signalTimeoutMs') });
  const acquired = await guard.acquire();
  if (acquired.status === 'already-running') {
    const response = await guard.signal({ channel: Ch.WINDOW_FOCUS, args: [] });
    if (!response) log.warn('Running agent did not answer the focus request');
    ctx.io.err('cliplog: another agent is already running for this user\n');
    return ExitCode.ALREADY_RUNNING;
  }

  const container = new ServiceContainer(ctx.paths, {
    startHidden: ctx.values.hidden ? true : undefined,
    clipboard: ctx.clipboard,
    viewOutput: ctx.viewOutput,
    guard,
  });
  try {
    await container.init();
  } catch (err) {
    await guard.release();
    throw err;
  }
  const lifecycle = container.get('lifecycle');

  await lifecycle.start().catch(async (err: unknown) => {
    await container.shutdown();
    throw err;
  });

  const onSignal = (signal: NodeJS.Signals) => {
    log.info(`Received ${signal}, shutting down`);
    lifecycle.quit().catch((err) => log.error('Quit failed:', err));
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    await lifecycle.whenTerminated();
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await container.shutdown();
  }
  return ExitCode.OK;
};

const listCommand: CommandHandler = async (ctx) => {
  const options = parseWith(
    ListOptionsSchema,
    { order: ctx.values.order, limit: ctx.values.limit, search: ctx.values.search },
    'list options',
  );
  const items = await withLocalCommands(ctx, (commands) => commands.list(options));
  if (items.length === 0) {
    ctx.io.out('No clipboard history yet.\n');
  } else {
    ctx.io.out(items.map((item) => `${formatListLine(item)}\n`).join(''));
  }
  return ExitCode.OK;
};

const getCommand: CommandHandler = async (ctx) => {
  const id = parseWith(IdSchema, ctx.args[0], 'id');
  const item = await withLocalCommands(ctx, (commands) => commands.get(id));
  ctx.io.out(`${item.text}\n`);
  return ExitCode.OK;
};

const exportCommand: CommandHandler = async (ctx) => {
  const destination = parseWith(PathSchema, ctx.args[0], 'export path');
  const result = await withLocalCommands(ctx, (commands) => commands.exportAll(destination));
  ctx.io.out(`Exported ${result.count} entries to ${result.path}\n`);
  return ExitCode.OK;
};

const copyCommand: CommandHandler = async (ctx) => {
  const id = parseWith(IdSchema, ctx.args[0], 'id');
  const response = await askAgent(ctx, { channel: Ch.HISTORY_COPY, args: [id] });
  const item = response
    ? parseWith(ClipItemSchema, unwrap(response), 'agent response')
    : await withLocalCommands(ctx, (commands) => commands.copyById(id));
  ctx.io.out(`Copied [${item.id}] to the clipboard\n`);
  return ExitCode.OK;
};

const deleteAllCommand: CommandHandler = async (ctx) => {
  if (!ctx.values.yes) {
    throw new ClipLogError('delete-all removes every snippet; pass --yes to confirm', ErrorCode.INVALID_PARAMS);
  }
  const response = await askAgent(ctx, { channel: Ch.HISTORY_DELETE_ALL, args: [] });
  const deleted = response
    ? parseWith(DeleteAllResultSchema, unwrap(response), 'agent response').deleted
    : await withLocalCommands(ctx, (commands) => commands.deleteAll());
  ctx.io.out(`Deleted ${deleted} entries\n`);
  return ExitCode.OK;
};

const statusCommand: CommandHandler = async (ctx) => {
  const response = await askAgent(ctx, { channel: Ch.APP_STATUS, args: [] });
  if (response) {
    const status = parseWith(HistoryStatusSchema, unwrap(response), 'agent response');
    ctx.io.out(formatStatus(status, true));
  } else {
    const status = await withLocalCommands(ctx, (commands) => commands.status());
    ctx.io.out(formatStatus(status, false));
  }
  return ExitCode.OK;
};

const showCommand: CommandHandler = async (ctx) => {
  await requireAgent(ctx, { channel: Ch.WINDOW_SHOW, args: [] });
  return ExitCode.OK;
};

const hideCommand: CommandHandler = async (ctx) => {
  await requireAgent(ctx, { channel: Ch.WINDOW_HIDE, args: [] });
  return ExitCode.OK;
};

const quitCommand: CommandHandler = async (ctx) => {
  await requireAgent(ctx, { channel: Ch.APP_QUIT, args: [] });
  ctx.io.out('Agent stopping\n');
  return ExitCode.OK;
};

const monitorCommand: CommandHandler = async (ctx) => {
  const action = parseWith(MonitorActionSchema, ctx.args[0], 'monitor action');
  const channel = action === 'start' ? Ch.MONITOR_START : Ch.MONITOR_STOP;
  const status = parseWith(HistoryStatusSchema, await requireAgent(ctx, { channel, args: [] }), 'agent response');
  ctx.io.out(`monitoring: ${status.monitoring ? 'on' : 'off'}\n`);
  return ExitCode.OK;
};

const configCommand: CommandHandler = async (ctx) => {
  const { config } = ctx;
  const [rawKey, rawValue] = ctx.args;

  if (rawKey === undefined) {
    ctx.io.out(CONFIG_KEYS.map((key) => `${key} = ${String(config.get(key))}\n`).join(''));
    return ExitCode.OK;
  }

  const key = parseWith(ConfigKeySchema, rawKey, 'config key');
  if (rawValue === undefined) {
    ctx.io.out(`${String(config.get(key))}\n`);
    return ExitCode.OK;
  }

  const value = config.setFromString(key, rawValue);
  await config.forceSave();

  const response = await askAgent(ctx, { channel: Ch.CONFIG_RELOAD, args: [] });
  if (response && !response.success) {
    log.warn(`Running agent did not reload config: ${response.error.message}`);
  }

  ctx.io.out(`${key} = ${String(value)}\n`);
  return ExitCode.OK;
};

const COMMANDS = new Map<string, CommandHandler>([
  ['run', runCommand],
  ['list', listCommand],
  ['get', getCommand],
  ['export', exportCommand],
  ['copy', copyCommand],
  ['delete-all', deleteAllCommand],
  ['status', statusCommand],
  ['show', showCommand],
  ['hide', hideCommand],
  ['quit', quitCommand],
  ['monitor', monitorCommand],
  ['config', configCommand],
]);

// ─── Entry ───

export async function runCli(argv: string[], options: CliOptions = {}): Promise<ExitCodeValue> {
  const io = options.io ?? processIO;

  let values: ParsedValues;
  let positionals: string[];
  try {
    const parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        hidden: { type: 'boolean' },
        order: { type: 'string' },
        limit: { type: 'string' },
        search: { type: 'string' },
        yes: { type: 'boolean', short: 'y' },
        help: { type: 'boolean', short: 'h' },
      },
    });
    values = parsed.values;
    positionals = parsed.positionals;
  } catch (err) {
    io.err(`cliplog: ${err instanceof Error ? err.message : String(err)}\n\n${USAGE}`);
    return ExitCode.USAGE;
  }

  const [name, ...args] = positionals;
  if (values.help || name === 'help') {
    io.out(USAGE);
    return ExitCode.OK;
  }
  if (name === undefined) {
    io.err(USAGE);
    return ExitCode.USAGE;
  }

  const command = COMMANDS.get(name);
  if (!command) {
    io.err(`cliplog: unknown command "${name}"\n\n${USAGE}`);
    return ExitCode.USAGE;
  }

  const paths = options.paths ?? resolveAppPaths();
  let config: ConfigService | null = null;
  try {
    config = new ConfigService(paths.configPath);
    setLogLevel(config.get('logLevel'));
    return await command({ paths, io, config, values, args, clipboard: options.clipboard, viewOutput: options.viewOutput });
  } catch (err) {
    const error = ClipLogError.from(err);
    log.debug(`${name} failed:`, error);
    io.err(`cliplog: ${error.message}\n`);
    return exitCodeFor(error);
  } finally {
    await config?.shutdown();
  }
}
