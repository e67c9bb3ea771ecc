/**
 * Clipboard access: plain text only.
 *
 * The OS clipboard is reached through clipboardy, which shells out to
 * pbcopy/pbpaste, xsel/wl-clipboard or its bundled Windows helper. Reads are
 * bounded by a timeout so a clipboard held by another process cannot stall
 * the watcher.
 */

import clipboardy from 'clipboardy';
import { ClipLogError, ErrorCode } from '../../shared/types/errors';

export interface ClipboardAccess {
  /** Current text; throws CLIPBOARD_UNREADABLE when the clipboard is locked or holds no text */
  readText(): Promise<string>;
  /** Throws CLIPBOARD_WRITE_ERROR */
  writeText(text: string): Promise<void>;
}

export interface SystemClipboardOptions {
  readTimeoutMs?: number;
}

export class SystemClipboard implements ClipboardAccess {
  private readTimeoutMs: number;

  constructor(options: SystemClipboardOptions = {}) {
    this.readTimeoutMs = options.readTimeoutMs ?? 1000;
  }

  setReadTimeout(ms: number): void {
    this.readTimeoutMs = ms;
  }

  async readText(): Promise<string> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(
          new ClipLogError(`Clipboard read timed out after ${this.readTimeoutMs}ms`, ErrorCode.CLIPBOARD_UNREADABLE, {
            severity: 'info',
          }),
        );
      }, this.readTimeoutMs);
    });

    try {
      return await Promise.race([clipboardy.read(), timeout]);
    } catch (err) {
      throw ClipLogError.from(err, ErrorCode.CLIPBOARD_UNREADABLE);
    } finally {
      clearTimeout(timer);
    }
  }

  async writeText(text: string): Promise<void> {
    try {
      await clipboardy.write(text);
    } catch (err) {
      throw ClipLogError.from(err, ErrorCode.CLIPBOARD_WRITE_ERROR);
    }
  }
}
