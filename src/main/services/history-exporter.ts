/**
 * CSV export of the whole history, oldest first.
 *
 * RFC 4180: CRLF line endings, fields holding a comma, quote or line break
 * are quoted with inner quotes doubled. The file is written to a temp path
 * and renamed into place.
 */

import * as fsp from 'fs/promises';
import * as path from 'path';
import { createLogger } from './logger';
import { ClipLogError, ErrorCode } from '../../shared/types/errors';
import type { ClipItem } from '../../shared/types/clip';

const log = createLogger('Exporter');

export const CSV_HEADER = ['id', 'captured_at_utc', 'local_date', 'text'] as const;

const CRLF = '\r\n';

export function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(items: ClipItem[]): string {
  const rows = [CSV_HEADER.join(',')];
  for (const item of items) {
    rows.push([item.id, item.capturedAtUtc, item.localDate, item.text].map(csvField).join(','));
  }
  return rows.join(CRLF) + CRLF;
}

/**
 * Write items to `destinationPath`. Returns the absolute path written.
 */
export async function exportCsv(items: ClipItem[], destinationPath: string): Promise<string> {
  const target = path.resolve(destinationPath);
  const tmpPath = `${target}.${process.pid}.tmp`;

  try {
    await fsp.writeFile(tmpPath, toCsv(items), 'utf8');
    await fsp.rename(tmpPath, target);
  } catch (err) {
    await fsp.rm(tmpPath, { force: true }).catch((rmErr) => log.debug('Temp cleanup failed:', rmErr));
    throw ClipLogError.from(err, ErrorCode.EXPORT_ERROR, { path: target });
  }

  log.info(`Exported ${items.length} entries to ${target}`);
  return target;
}
