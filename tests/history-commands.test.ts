import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';

vi.mock('../src/main/services/logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
  setLogLevel: vi.fn(),
}));

import { HistoryCommands } from '../src/main/services/history-commands';
import { HistoryStore } from '../src/main/services/history-store';
import { ClipboardWatcher } from '../src/main/services/clipboard-watcher';
import { ErrorCode } from '../src/shared/types/errors';
import { FakeClipboard, makeTempPaths, removeTempPaths } from './helpers/fakes';
import type { MonitorControl, SeenTracker } from '../src/main/services/history-commands';
import type { AppPaths } from '../src/main/services/app-paths';
import type { LifecycleState } from '../src/shared/types/lifecycle';

describe('HistoryCommands', () => {
  let paths: AppPaths;
  let store: HistoryStore;
  let clipboard: FakeClipboard;

  beforeEach(() => {
    paths = makeTempPaths('cliplog-cmd-');
    store = new HistoryStore(paths.databasePath);
    store.initialize();
    clipboard = new FakeClipboard('A');
  });

  afterEach(() => {
    store.close();
    removeTempPaths(paths);
  });

  describe('reads', () => {
    it('list passes query options through', () => {
      store.append('alpha');
      store.append('beta');
      store.append('alphabet');
      const commands = new HistoryCommands(store, clipboard);

      expect(commands.list({ search: 'alpha', order: 'oldest' }).map((i) => i.text)).toEqual(['alpha', 'alphabet']);
      expect(commands.list().map((i) => i.id)).toEqual([3, 2, 1]);
    });

    it('get throws NOT_FOUND for an unknown id', () => {
      const commands = new HistoryCommands(store, clipboard);
      expect(() => commands.get(7)).toThrow('No snippet with id 7');
    });
  });

  describe('copyById', () => {
    it('marks the text as seen before writing it to the clipboard', async () => {
      const item = store.append('hello');
      const events: string[] = [];
      const tracker: SeenTracker = {
        markSeen: (text) => events.push(`seen:${text}`),
        getStatus: () => ({ monitoring: true }),
      };
      const recordingClipboard = new FakeClipboard();
      const write = recordingClipboard.writeText.bind(recordingClipboard);
      recordingClipboard.writeText = async (text) => {
        events.push(`write:${text}`);
        await write(text);
      };
      const commands = new HistoryCommands(store, recordingClipboard, tracker);

      const copied = await commands.copyById(item?.id ?? -1);

      expect(copied.text).toBe('hello');
      expect(events).toEqual(['seen:hello', 'write:hello']);
    });

    it('does not capture its own write as a new entry', async () => {
      const old = store.append('old snippet');
      const watcher = new ClipboardWatcher(clipboard, store, { pollIntervalMs: 60_000 });
      await watcher.start();
      const commands = new HistoryCommands(store, clipboard, watcher);

      await commands.copyById(old?.id ?? -1);
      expect(clipboard.text).toBe('old snippet');
      expect(await watcher.pollOnce()).toBeNull();
      expect(store.count()).toBe(1);

      await watcher.stop();
    });

    it('rejects unknown ids without touching the clipboard', async () => {
      const commands = new HistoryCommands(store, clipboard);
      await expect(commands.copyById(99)).rejects.toMatchObject({ code: ErrorCode.NOT_FOUND });
      expect(clipboard.written).toEqual([]);
    });
  });

  describe('writes', () => {
    it('exportAll writes every item oldest first', async () => {
      store.append('first');
      store.append('second');
      const commands = new HistoryCommands(store, clipboard);
      const target = path.join(paths.dataDir, 'out.csv');

      const result = await commands.exportAll(target);

      expect(result).toEqual({ path: target, count: 2 });
      const lines = fs.readFileSync(target, 'utf8').split('\r\n');
      expect(lines[1]).toMatch(/^1,.*,first$/);
      expect(lines[2]).toMatch(/^2,.*,second$/);
    });

    it('deleteAll reports how many rows went', () => {
      store.append('x');
      store.append('y');
      expect(new HistoryCommands(store, clipboard).deleteAll()).toBe(2);
    });
  });

  describe('monitor and status', () => {
    it('monitor commands need a running agent', async () => {
      const commands = new HistoryCommands(store, clipboard);
      await expect(commands.monitorStart()).rejects.toMatchObject({ code: ErrorCode.NOT_RUNNING });
      await expect(commands.monitorStop()).rejects.toMatchObject({ code: ErrorCode.NOT_RUNNING });
    });

    it('monitor commands go to the lifecycle', async () => {
      const calls: string[] = [];
      const state: LifecycleState = { phase: 'running', visibility: 'hidden' };
      const lifecycle: MonitorControl = {
        monitorStart: async () => {
          calls.push('start');
        },
        monitorStop: async () => {
          calls.push('stop');
        },
        getState: () => state,
      };
      const commands = new HistoryCommands(store, clipboard, null, lifecycle);

      await commands.monitorStop();
      await commands.monitorStart();
      expect(calls).toEqual(['stop', 'start']);
    });

    it('status without an agent', () => {
      store.append('one');
      const commands = new HistoryCommands(store, clipboard);

      expect(commands.status()).toEqual({
        monitoring: false,
        visibility: null,
        totalEntries: 1,
        latestId: 1,
        startedAt: undefined,
        databasePath: paths.databasePath,
      });
    });

    it('status inside the agent', () => {
      const tracker: SeenTracker = {
        markSeen: () => {},
        getStatus: () => ({ monitoring: true, startedAt: '2026-05-05T10:00:00.000Z' }),
      };
      const lifecycle: MonitorControl = {
        monitorStart: async () => {},
        monitorStop: async () => {},
        getState: () => ({ phase: 'running', visibility: 'visible' }),
      };
      const commands = new HistoryCommands(store, clipboard, tracker, lifecycle);

      expect(commands.status()).toEqual({
        monitoring: true,
        visibility: 'visible',
        totalEntries: 0,
        latestId: null,
        startedAt: '2026-05-05T10:00:00.000Z',
        databasePath: paths.databasePath,
      });
    });
  });
});
