/**
 * HistoryCommands: the command surface over the core.
 *
 * The running agent builds one with its watcher and lifecycle attached and
 * serves it over the control channel. The CLI builds a detached one (no
 * watcher, no lifecycle) when no agent is running; monitor commands then fail
 * with NOT_RUNNING.
 */

import { createLogger } from './logger';
import { exportCsv } from './history-exporter';
import { ClipLogError, ErrorCode } from '../../shared/types/errors';
import type { HistoryStore } from './history-store';
import type { ClipboardAccess } from './clipboard-access';
import type { WatcherStatus } from './clipboard-watcher';
import type { ClipItem, HistoryQueryOptions, HistoryStatus } from '../../shared/types/clip';
import type { LifecycleState } from '../../shared/types/lifecycle';

const log = createLogger('Commands');

export interface SeenTracker {
  markSeen(text: string): void;
  getStatus(): WatcherStatus;
}

export interface MonitorControl {
  monitorStart(): Promise<void>;
  monitorStop(): Promise<void>;
  getState(): LifecycleState;
}

export interface ExportResult {
  path: string;
  count: number;
}

export class HistoryCommands {
  constructor(
    private readonly store: HistoryStore,
    private readonly clipboard: ClipboardAccess,
    private readonly watcher: SeenTracker | null = null,
    private readonly lifecycle: MonitorControl | null = null,
  ) {}

  async monitorStart(): Promise<void> {
    await this.requireLifecycle('monitor start').monitorStart();
  }

  async monitorStop(): Promise<void> {
    await this.requireLifecycle('monitor stop').monitorStop();
  }

  list(options: HistoryQueryOptions = {}): ClipItem[] {
    return this.store.query(options);
  }

  /** Throws NOT_FOUND for an unknown id */
  get(id: number): ClipItem {
    const item = this.store.fetchById(id);
    if (!item) {
      throw new ClipLogError(`No snippet with id ${id}`, ErrorCode.NOT_FOUND, { context: { id } });
    }
    return item;
  }

  /**
   * Put snippet `id` back on the clipboard. The watcher is told first so the
   * write is not captured as a new entry.
   */
  async copyById(id: number): Promise<ClipItem> {
    const item = this.get(id);
    this.watcher?.markSeen(item.text);
    await this.clipboard.writeText(item.text);
    log.info(`Copied snippet ${id} to the clipboard`);
    return item;
  }

  async exportAll(destinationPath: string): Promise<ExportResult> {
    const items = this.store.fetchAll('oldest');
    const written = await exportCsv(items, destinationPath);
    return { path: written, count: items.length };
  }

  deleteAll(): number {
    return this.store.deleteAll();
  }

  status(): HistoryStatus {
    const watcherStatus = this.watcher?.getStatus();
    return {
      monitoring: watcherStatus?.monitoring ?? false,
      visibility: this.lifecycle ? this.lifecycle.getState().visibility : null,
      totalEntries: this.store.count(),
      latestId: this.store.latestId(),
      startedAt: watcherStatus?.startedAt,
      databasePath: this.store.getPath(),
    };
  }

  private requireLifecycle(operation: string): MonitorControl {
    if (!this.lifecycle) {
      throw new ClipLogError(`Cannot ${operation}: no cliplog agent is running`, ErrorCode.NOT_RUNNING);
    }
    return this.lifecycle;
  }
}
