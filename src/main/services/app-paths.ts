/**
 * Per-user locations for the history database, config file and instance
 * socket. `CLIPLOG_HOME` overrides the data directory.
 */

import * as os from 'os';
import * as path from 'path';

export const APP_NAME = 'cliplog';

export interface AppPaths {
  dataDir: string;
  databasePath: string;
  configPath: string;
  /** Unix domain socket path, or a named pipe on Windows */
  socketPath: string;
}

export function resolveDataDir(env: NodeJS.ProcessEnv = process.env, platform: NodeJS.Platform = process.platform): string {
  const override = env.CLIPLOG_HOME?.trim();
  if (override) return path.resolve(override);

  const home = os.homedir();
  switch (platform) {
    case 'win32':
      return path.join(env.APPDATA ?? path.join(home, 'AppData', 'Roaming'), APP_NAME);
    case 'darwin':
      return path.join(home, 'Library', 'Application Support', APP_NAME);
    default:
      return path.join(env.XDG_DATA_HOME ?? path.join(home, '.local', 'share'), APP_NAME);
  }
}

function currentUser(): string {
  try {
    return os.userInfo().username || 'default';
  } catch {
    return 'default';
  }
}

export function resolveSocketPath(dataDir: string, platform: NodeJS.Platform = process.platform): string {
  if (platform === 'win32') {
    // Named pipes live in their own namespace; scope by user name
    return `\\\\.\\pipe\\${APP_NAME}-${currentUser().replace(/[^\w.-]/g, '_')}`;
  }
  return path.join(dataDir, `${APP_NAME}.sock`);
}

export function resolveAppPaths(env: NodeJS.ProcessEnv = process.env, platform: NodeJS.Platform = process.platform): AppPaths {
  const dataDir = resolveDataDir(env, platform);
  return {
    dataDir,
    databasePath: path.join(dataDir, 'history.db'),
    configPath: path.join(dataDir, 'config.json'),
    socketPath: resolveSocketPath(dataDir, platform),
  };
}
