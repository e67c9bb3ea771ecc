import { describe, it, expect, afterEach, vi } from 'vitest';

vi.mock('../src/main/services/logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
  setLogLevel: vi.fn(),
}));

import { ClipboardWatcher } from '../src/main/services/clipboard-watcher';
import { HistoryStore } from '../src/main/services/history-store';
import { FakeClipboard, FakeWriter } from './helpers/fakes';

/** Reads see the clipboard as it was when called, then wait for the gate */
class GatedClipboard extends FakeClipboard {
  private gate: Promise<void> | null = null;

  hold(): () => void {
    let open: () => void = () => {};
    this.gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    return () => {
      this.gate = null;
      open();
    };
  }

  override async readText(): Promise<string> {
    const text = await super.readText();
    if (this.gate) await this.gate;
    return text;
  }
}

/** Long enough that the loop never ticks on its own during a test */
const IDLE_INTERVAL = 60_000;

describe('ClipboardWatcher', () => {
  const watchers: ClipboardWatcher[] = [];

  function createWatcher(clipboard: FakeClipboard, writer: FakeWriter | HistoryStore, pollIntervalMs = IDLE_INTERVAL) {
    const watcher = new ClipboardWatcher(clipboard, writer, { pollIntervalMs });
    watchers.push(watcher);
    return watcher;
  }

  afterEach(async () => {
    await Promise.all(watchers.splice(0).map((w) => w.stop()));
  });

  describe('change detection', () => {
    it('stores B then C after an A baseline, skipping the repeated B', async () => {
      const store = new HistoryStore(':memory:');
      store.initialize();
      const clipboard = new FakeClipboard('A');
      const watcher = createWatcher(clipboard, store);

      await watcher.start();
      clipboard.text = 'B';
      await watcher.pollOnce();
      await watcher.pollOnce();
      clipboard.text = 'C';
      await watcher.pollOnce();
      await watcher.stop();

      expect(store.fetchAll('newest').map((i) => i.text)).toEqual(['C', 'B']);
      store.close();
    });

    it('never stores the baseline', async () => {
      const writer = new FakeWriter();
      const watcher = createWatcher(new FakeClipboard('already there'), writer);

      await watcher.start();
      expect(await watcher.pollOnce()).toBeNull();
      expect(writer.appended).toEqual([]);
    });

    it('returns the stored item', async () => {
      const clipboard = new FakeClipboard('A');
      const watcher = createWatcher(clipboard, new FakeWriter());

      await watcher.start();
      clipboard.text = 'B';
      expect(await watcher.pollOnce()).toEqual({
        id: 1,
        text: 'B',
        capturedAtUtc: '2026-01-01T00:00:00.000Z',
        localDate: '2026-01-01',
      });
    });

    it('ignores blank text without forgetting the last value', async () => {
      const clipboard = new FakeClipboard('A');
      const writer = new FakeWriter();
      const watcher = createWatcher(clipboard, writer);

      await watcher.start();
      clipboard.text = 'X';
      await watcher.pollOnce();
      clipboard.text = '   ';
      expect(await watcher.pollOnce()).toBeNull();
      clipboard.text = 'X';
      expect(await watcher.pollOnce()).toBeNull();

      expect(writer.appended).toEqual(['X']);
    });

    it('skips unreadable ticks', async () => {
      const clipboard = new FakeClipboard('A');
      const writer = new FakeWriter();
      const watcher = createWatcher(clipboard, writer);

      await watcher.start();
      clipboard.unreadable = true;
      expect(await watcher.pollOnce()).toBeNull();
      clipboard.unreadable = false;
      clipboard.text = 'B';
      await watcher.pollOnce();

      expect(writer.appended).toEqual(['B']);
    });

    it('takes the first readable tick as baseline when start could not read', async () => {
      const clipboard = new FakeClipboard('copied before start');
      clipboard.unreadable = true;
      const writer = new FakeWriter();
      const watcher = createWatcher(clipboard, writer);

      await watcher.start();
      expect(await watcher.pollOnce()).toBeNull();
      clipboard.unreadable = false;
      expect(await watcher.pollOnce()).toBeNull();
      expect(writer.appended).toEqual([]);

      clipboard.text = 'B';
      await watcher.pollOnce();
      expect(writer.appended).toEqual(['B']);
    });

    it('never stores pre-start text into a real store after a locked start', async () => {
      const clipboard = new FakeClipboard('pre-existing text');
      clipboard.unreadable = true;
      const store = new HistoryStore(':memory:');
      store.initialize();
      const watcher = createWatcher(clipboard, store);

      await watcher.start();
      clipboard.unreadable = false;
      await watcher.pollOnce();

      expect(store.fetchAll('oldest')).toEqual([]);
      store.close();
    });

    it('a blank baseline still counts as taken', async () => {
      const clipboard = new FakeClipboard('  ');
      const writer = new FakeWriter();
      const watcher = createWatcher(clipboard, writer);

      await watcher.start();
      clipboard.text = 'first real copy';
      await watcher.pollOnce();

      expect(writer.appended).toEqual(['first real copy']);
    });

    it('keeps going after a failed append', async () => {
      const clipboard = new FakeClipboard('A');
      const writer = new FakeWriter();
      writer.failOn.add('B');
      const watcher = createWatcher(clipboard, writer);

      await watcher.start();
      clipboard.text = 'B';
      expect(await watcher.pollOnce()).toBeNull();
      clipboard.text = 'C';
      await watcher.pollOnce();

      expect(writer.appended).toEqual(['C']);
    });

    it('markSeen suppresses the next read of that text', async () => {
      const clipboard = new FakeClipboard('A');
      const writer = new FakeWriter();
      const watcher = createWatcher(clipboard, writer);

      await watcher.start();
      watcher.markSeen('restored');
      clipboard.text = 'restored';
      expect(await watcher.pollOnce()).toBeNull();
      expect(writer.appended).toEqual([]);
    });

    it('drops a read that was in flight when markSeen ran', async () => {
      const clipboard = new GatedClipboard('U');
      const store = new HistoryStore(':memory:');
      store.initialize();
      store.append('T');
      store.append('U');
      const watcher = createWatcher(clipboard, store);
      await watcher.start();

      const release = clipboard.hold();
      const tick = watcher.pollOnce();
      watcher.markSeen('T');
      await clipboard.writeText('T');
      release();

      expect(await tick).toBeNull();
      expect(await watcher.pollOnce()).toBeNull();
      expect(store.fetchAll('oldest').map((item) => item.text)).toEqual(['T', 'U']);
      store.close();
    });
  });

  describe('loop', () => {
    it('polls on its own until stopped', async () => {
      const clipboard = new FakeClipboard('A');
      const writer = new FakeWriter();
      const watcher = createWatcher(clipboard, writer, 10);

      await watcher.start();
      clipboard.text = 'B';
      await vi.waitFor(() => expect(writer.appended).toEqual(['B']));

      await watcher.stop();
      expect(watcher.isRunning()).toBe(false);

      clipboard.text = 'C';
      await new Promise((resolve) => setTimeout(resolve, 50));
      expect(writer.appended).toEqual(['B']);
    });

    it('stop cancels the sleep instead of waiting it out', async () => {
      const watcher = createWatcher(new FakeClipboard('A'), new FakeWriter());
      await watcher.start();

      const t0 = Date.now();
      await watcher.stop();
      expect(Date.now() - t0).toBeLessThan(1_000);
    });

    it('start is idempotent while running', async () => {
      const clipboard = new FakeClipboard('A');
      const watcher = createWatcher(clipboard, new FakeWriter());

      await watcher.start();
      await watcher.start();
      expect(clipboard.reads).toBe(1);
    });

    it('stop resolves immediately when not running', async () => {
      const watcher = createWatcher(new FakeClipboard(), new FakeWriter());
      await expect(watcher.stop()).resolves.toBeUndefined();
    });

    it('can be restarted after a stop', async () => {
      const clipboard = new FakeClipboard('A');
      const writer = new FakeWriter();
      const watcher = createWatcher(clipboard, writer);

      await watcher.start();
      await watcher.stop();
      clipboard.text = 'B';
      await watcher.start();
      // B is the new baseline
      expect(await watcher.pollOnce()).toBeNull();
      expect(watcher.isRunning()).toBe(true);
    });

    it('reports status', async () => {
      const watcher = createWatcher(new FakeClipboard('A'), new FakeWriter());
      expect(watcher.getStatus()).toEqual({ monitoring: false, startedAt: undefined });

      await watcher.start();
      const status = watcher.getStatus();
      expect(status.monitoring).toBe(true);
      expect(status.startedAt).toMatch(/^\d{4}-\d{2}-\d{2}T/);

      await watcher.stop();
      expect(watcher.getStatus().monitoring).toBe(false);
    });
  });
});
