import { describe, it, expect } from 'vitest';
import * as os from 'os';
import * as path from 'path';
import { resolveAppPaths, resolveDataDir, resolveSocketPath } from '../src/main/services/app-paths';

describe('resolveDataDir', () => {
  it('honours CLIPLOG_HOME everywhere', () => {
    const dir = path.resolve('/srv/cliplog-data');
    expect(resolveDataDir({ CLIPLOG_HOME: '/srv/cliplog-data' }, 'linux')).toBe(dir);
    expect(resolveDataDir({ CLIPLOG_HOME: '/srv/cliplog-data' }, 'win32')).toBe(dir);
  });

  it('ignores a blank override', () => {
    expect(resolveDataDir({ CLIPLOG_HOME: '  ', XDG_DATA_HOME: '/xdg' }, 'linux')).toBe(path.join('/xdg', 'cliplog'));
  });

  it('uses XDG_DATA_HOME or ~/.local/share on Linux', () => {
    expect(resolveDataDir({ XDG_DATA_HOME: '/xdg' }, 'linux')).toBe(path.join('/xdg', 'cliplog'));
    expect(resolveDataDir({}, 'linux')).toBe(path.join(os.homedir(), '.local', 'share', 'cliplog'));
  });

  it('uses Application Support on macOS', () => {
    expect(resolveDataDir({}, 'darwin')).toBe(path.join(os.homedir(), 'Library', 'Application Support', 'cliplog'));
  });

  it('uses APPDATA on Windows', () => {
    expect(resolveDataDir({ APPDATA: '/appdata' }, 'win32')).toBe(path.join('/appdata', 'cliplog'));
  });
});

describe('resolveSocketPath', () => {
  it('puts the socket in the data directory on POSIX', () => {
    expect(resolveSocketPath('/data/cliplog', 'linux')).toBe(path.join('/data/cliplog', 'cliplog.sock'));
  });

  it('uses a per-user named pipe on Windows', () => {
    expect(resolveSocketPath('/data/cliplog', 'win32')).toMatch(/^\\\\\.\\pipe\\cliplog-[\w.-]+$/);
  });
});

describe('resolveAppPaths', () => {
  it('lays out the data directory', () => {
    const paths = resolveAppPaths({ CLIPLOG_HOME: '/home/tester/cl' }, 'linux');
    const dir = path.resolve('/home/tester/cl');
    expect(paths).toEqual({
      dataDir: dir,
      databasePath: path.join(dir, 'history.db'),
      configPath: path.join(dir, 'config.json'),
      socketPath: path.join(dir, 'cliplog.sock'),
    });
  });
});
