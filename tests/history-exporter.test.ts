import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
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

import { csvField, exportCsv, toCsv } from '../src/main/services/history-exporter';
import { ErrorCode } from '../src/shared/types/errors';
import type { ClipItem } from '../src/shared/types/clip';

const items: ClipItem[] = [
  { id: 1, text: 'plain', capturedAtUtc: '2026-04-01T08:00:00.000Z', localDate: '2026-04-01' },
  { id: 2, text: 'say "hi", then\nleave', capturedAtUtc: '2026-04-02T09:30:00.000Z', localDate: '2026-04-02' },
];

describe('csvField', () => {
  it('leaves simple values bare', () => {
    expect(csvField('plain')).toBe('plain');
    expect(csvField(42)).toBe('42');
  });

  it('quotes commas, quotes and line breaks', () => {
    expect(csvField('a,b')).toBe('"a,b"');
    expect(csvField('a "b"')).toBe('"a ""b"""');
    expect(csvField('a\nb')).toBe('"a\nb"');
    expect(csvField('a\rb')).toBe('"a\rb"');
  });
});

describe('toCsv', () => {
  it('writes a header and CRLF-terminated rows', () => {
    expect(toCsv(items)).toBe(
      'id,captured_at_utc,local_date,text\r\n' +
        '1,2026-04-01T08:00:00.000Z,2026-04-01,plain\r\n' +
        '2,2026-04-02T09:30:00.000Z,2026-04-02,"say ""hi"", then\nleave"\r\n',
    );
  });

  it('writes only the header for an empty history', () => {
    expect(toCsv([])).toBe('id,captured_at_utc,local_date,text\r\n');
  });
});

describe('exportCsv', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cliplog-export-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes the file and leaves no temp file behind', async () => {
    const target = path.join(dir, 'history.csv');
    const written = await exportCsv(items, target);

    expect(written).toBe(target);
    expect(fs.readFileSync(target, 'utf8')).toBe(toCsv(items));
    expect(fs.readdirSync(dir)).toEqual(['history.csv']);
  });

  it('replaces an existing file', async () => {
    const target = path.join(dir, 'history.csv');
    fs.writeFileSync(target, 'old');
    await exportCsv([], target);
    expect(fs.readFileSync(target, 'utf8')).toBe('id,captured_at_utc,local_date,text\r\n');
  });

  it('fails with EXPORT_ERROR when the directory is missing', async () => {
    const target = path.join(dir, 'missing', 'history.csv');
    await expect(exportCsv(items, target)).rejects.toMatchObject({ code: ErrorCode.EXPORT_ERROR });
  });
});
