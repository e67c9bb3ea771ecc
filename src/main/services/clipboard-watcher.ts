/**
 * ClipboardWatcher: polls the clipboard and appends genuine text changes to
 * the history store.
 *
 * - Whatever is on the clipboard when monitoring starts is the baseline and
 *   is never stored. If the clipboard cannot be read at start, the first
 *   readable tick becomes the baseline instead.
 * - Unreadable ticks (clipboard locked, non-text content, read timeout) are
 *   skipped silently.
 * - Blank text is ignored and does not replace the last-seen value, so
 *   clearing the clipboard never hides the next real copy.
 * - A failed append is logged; polling continues.
 *
 * The last-seen value is owned here. Other components only reach it through
 * markSeen().
 */

import { createLogger } from './logger';
import type { ClipboardAccess } from './clipboard-access';
import type { ClipItem } from '../../shared/types/clip';

const log = createLogger('ClipboardWatcher');

/** Default polling interval (ms) */
const DEFAULT_POLL_INTERVAL = 400;

/** The slice of HistoryStore the watcher writes through */
export interface HistoryWriter {
  append(text: string): ClipItem | null;
}

export interface ClipboardWatcherOptions {
  pollIntervalMs?: number;
}

export interface WatcherStatus {
  monitoring: boolean;
  startedAt?: string;
}

export class ClipboardWatcher {
  private pollIntervalMs: number;
  private lastSeen: string | null = null;
  /** Set while no readable baseline has been taken yet */
  private baselinePending = false;
  /** Bumped by markSeen; readings that straddle a bump are dropped */
  private seenGeneration = 0;
  private stopRequested = false;
  private session: Promise<void> | null = null;
  private baselineReady: Promise<void> | null = null;
  private wake: (() => void) | null = null;
  private startedAt: string | null = null;

  constructor(
    private readonly clipboard: ClipboardAccess,
    private readonly store: HistoryWriter,
    options: ClipboardWatcherOptions = {},
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL;
  }

  // ─── Public API ───

  /**
   * Record the baseline and launch the polling loop. Resolves once the
   * baseline has been captured; the loop keeps running until stop().
   */
  start(): Promise<void> {
    if (this.baselineReady) return this.baselineReady;

    this.stopRequested = false;
    this.startedAt = new Date().toISOString();

    const baselineReady = this.captureBaseline();
    this.baselineReady = baselineReady;
    this.session = baselineReady
      .then(() => this.loop())
      .catch((err) => {
        log.error('Clipboard polling loop failed:', err);
      })
      .finally(() => {
        this.session = null;
        this.baselineReady = null;
        this.startedAt = null;
        log.info('Clipboard monitoring stopped');
      });

    return baselineReady;
  }

  /**
   * Ask the loop to exit. Resolves when it has (the stop acknowledgement).
   */
  stop(): Promise<void> {
    const session = this.session;
    if (!session) return Promise.resolve();

    this.stopRequested = true;
    this.wake?.();
    return session;
  }

  isRunning(): boolean {
    return this.session !== null;
  }

  getStatus(): WatcherStatus {
    return {
      monitoring: this.isRunning(),
      startedAt: this.startedAt ?? undefined,
    };
  }

  setPollInterval(ms: number): void {
    this.pollIntervalMs = ms;
  }

  /**
   * Treat `text` as already seen; used before cliplog itself writes to the
   * clipboard, so the write is not captured again.
   */
  markSeen(text: string): void {
    this.lastSeen = text;
    this.seenGeneration++;
  }

  /**
   * One observation tick. Returns the stored item, or null when nothing was
   * stored.
   */
  async pollOnce(): Promise<ClipItem | null> {
    const generation = this.seenGeneration;
    const text = await this.readSafely();
    if (text === null) return null;
    // markSeen ran during the read; this reading predates cliplog's own write
    if (generation !== this.seenGeneration) return null;

    if (this.baselinePending) {
      this.baselinePending = false;
      this.lastSeen = text.trim().length > 0 ? text : null;
      log.debug('Baseline taken on first readable tick');
      return null;
    }

    if (text.trim().length === 0) return null;
    if (text === this.lastSeen) return null;

    this.lastSeen = text;

    try {
      const item = this.store.append(text);
      if (item) {
        log.debug(`Captured new item id=${item.id}`);
      }
      return item;
    } catch (err) {
      log.error('Failed to store clipboard entry, monitoring continues:', err);
      return null;
    }
  }

  // ─── Private: Polling ───

  private async captureBaseline(): Promise<void> {
    const generation = this.seenGeneration;
    const baseline = await this.readSafely();
    if (generation !== this.seenGeneration) {
      this.baselinePending = false;
    } else if (baseline === null) {
      this.baselinePending = true;
      this.lastSeen = null;
    } else {
      this.baselinePending = false;
      this.lastSeen = baseline.trim().length > 0 ? baseline : null;
    }
    log.info('Clipboard monitoring started');
  }

  private async loop(): Promise<void> {
    while (!this.stopRequested) {
      await this.sleep(this.pollIntervalMs);
      if (this.stopRequested) break;
      await this.pollOnce();
    }
  }

  private async readSafely(): Promise<string | null> {
    try {
      return await this.clipboard.readText();
    } catch (err) {
      log.debug('Clipboard unreadable, skipping tick:', err instanceof Error ? err.message : err);
      return null;
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
