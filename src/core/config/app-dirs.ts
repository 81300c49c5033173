// src/core/config/app-dirs.ts
import os from 'node:os';
import path from 'node:path';
import { APP_NAME, SESSION_FILE_NAME } from './constants.js';

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Per-user data directory. `REEL_ETL_DATA_DIR` wins; otherwise the
 * platform's usual location (LOCALAPPDATA, Application Support, XDG).
 */
export function getAppDataDir(env: Env = process.env, platform: NodeJS.Platform = process.platform): string {
  if (env.REEL_ETL_DATA_DIR) {
    return env.REEL_ETL_DATA_DIR;
  }

  switch (platform) {
    case 'win32': {
      const base = env.LOCALAPPDATA || env.APPDATA;
      return base ? path.join(base, APP_NAME) : path.join(os.homedir(), 'AppData', 'Local', APP_NAME);
    }
    case 'darwin':
      return path.join(os.homedir(), 'Library', 'Application Support', APP_NAME);
    default:
      return env.XDG_DATA_HOME
        ? path.join(env.XDG_DATA_HOME, APP_NAME)
        : path.join(os.homedir(), '.local', 'share', APP_NAME);
  }
}

/** Where a saved Instagram login session is looked up when none is configured */
export function getDefaultSessionFile(env: Env = process.env): string {
  return path.join(getAppDataDir(env), SESSION_FILE_NAME);
}
