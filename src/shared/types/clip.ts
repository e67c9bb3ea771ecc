/**
 * Clipboard history types: shared between the agent and the CLI.
 *
 * @module clip
 */

/** Single captured clipboard snippet */
export interface ClipItem {
  /** Store-assigned, strictly increasing; the canonical ordering key */
  id: number;
  /** Captured text exactly as read from the clipboard */
  text: string;
  /** ISO timestamp (UTC) of capture */
  capturedAtUtc: string;
  /** YYYY-MM-DD of capturedAtUtc in the machine's timezone, computed on read */
  localDate: string;
}

/** Order by id: newest first or oldest first */
export type FetchOrder = 'newest' | 'oldest';

export interface HistoryQueryOptions {
  order?: FetchOrder;
  /** Max results to return (omit for all) */
  limit?: number;
  /** Substring match on text */
  search?: string;
}

export interface HistoryStatus {
  /** Whether the watcher loop is currently polling */
  monitoring: boolean;
  visibility: 'visible' | 'hidden' | null;
  totalEntries: number;
  latestId: number | null;
  /** Monitoring started at (ISO) */
  startedAt?: string;
  databasePath: string;
}
