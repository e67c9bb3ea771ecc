/**
 * Terminal history view: the agent's display surface.
 *
 * While visible it prints the newest snippets grouped by local date and
 * re-renders whenever the newest id in the store changes. It never talks to
 * the watcher; the store is the only thing they share.
 */

import { createLogger } from './logger';
import type { DisplaySurface } from './lifecycle-controller';
import type { ClipItem, FetchOrder } from '../../shared/types/clip';

const log = createLogger('HistoryView');

/** Preview width in code points, ellipsis included */
export const PREVIEW_WIDTH = 90;

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

/** The slice of HistoryStore the view reads */
export interface HistoryReader {
  fetchRecent(limit: number, order?: FetchOrder): ClipItem[];
  latestId(): number | null;
}

export interface ViewOutput {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface HistoryViewOptions {
  limit?: number;
  refreshMs?: number;
  output?: ViewOutput;
}

/** Flatten to one line and cut to PREVIEW_WIDTH */
export function previewText(text: string): string {
  const flat = text.replace(/\r?\n/g, ' ');
  // Count code points so an emoji is never split in half
  const chars = Array.from(flat);
  return chars.length > PREVIEW_WIDTH ? `${chars.slice(0, PREVIEW_WIDTH - 3).join('')}...` : flat;
}

/**
 * Render items (already in display order) under local-date headers.
 */
export function renderHistory(items: ClipItem[]): string {
  if (items.length === 0) return 'No clipboard history yet.\n';

  const lines: string[] = [];
  let currentDate: string | null = null;
  for (const item of items) {
    if (item.localDate !== currentDate) {
      if (currentDate !== null) lines.push('');
      lines.push(`▼ ${item.localDate}`);
      currentDate = item.localDate;
    }
    lines.push(`  [${item.id}] ${previewText(item.text)}`);
  }
  return `${lines.join('\n')}\n`;
}

export class ConsoleHistoryView implements DisplaySurface {
  private visible = false;
  private timer: ReturnType<typeof setInterval> | null = null;
  private renderedLatestId: number | null | undefined = undefined;
  private limit: number;
  private refreshMs: number;
  private readonly output: ViewOutput;

  constructor(
    private readonly store: HistoryReader,
    options: HistoryViewOptions = {},
  ) {
    this.limit = options.limit ?? 20;
    this.refreshMs = options.refreshMs ?? 1000;
    this.output = options.output ?? process.stdout;
  }

  isVisible(): boolean {
    return this.visible;
  }

  show(): void {
    if (this.visible) {
      this.render();
      return;
    }
    this.visible = true;
    this.render();
    this.startTimer();
  }

  hide(): void {
    this.visible = false;
    this.stopTimer();
  }

  setLimit(limit: number): void {
    this.limit = limit;
    if (this.visible) this.render();
  }

  setRefreshInterval(ms: number): void {
    this.refreshMs = ms;
    if (this.visible) {
      this.stopTimer();
      this.startTimer();
    }
  }

  /** Re-render when the newest id differs from what is on screen */
  refresh(): boolean {
    if (!this.visible) return false;
    try {
      if (this.store.latestId() === this.renderedLatestId) return false;
    } catch (err) {
      log.warn('History unavailable for refresh:', err instanceof Error ? err.message : err);
      return false;
    }
    this.render();
    return true;
  }

  private render(): void {
    try {
      this.renderedLatestId = this.store.latestId();
      const text = renderHistory(this.store.fetchRecent(this.limit, 'newest'));
      this.output.write(this.output.isTTY ? CLEAR_SCREEN + text : text);
    } catch (err) {
      log.error('Failed to render history:', err);
    }
  }

  private startTimer(): void {
    this.timer = setInterval(() => this.refresh(), this.refreshMs);
    this.timer.unref();
  }

  private stopTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
