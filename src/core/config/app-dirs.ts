// src/core/config/app-dirs.ts
import os from 'node:os';
import path from 'node:path';
import { BATCHES_DIRNAME, SYNC_DATE_FILENAME } from './constants.js';

/**
 * Per-user data directory for `appName`, following each platform's
 * convention (LOCALAPPDATA on Windows, Application Support on macOS,
 * XDG_DATA_HOME elsewhere).
 */
export function getAppDataDir(
  appName: string,
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env
): string {
  if (platform === 'win32') {
    const base = env.LOCALAPPDATA || env.APPDATA;
    if (base) {
      return path.join(base, appName);
    }
  }

  if (platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', appName);
  }

  const xdgDataHome = env.XDG_DATA_HOME;
  if (xdgDataHome) {
    return path.join(xdgDataHome, appName);
  }

  return path.join(os.homedir(), '.local', 'share', appName);
}

export interface MirrorPaths {
  dataDir: string;
  batchesDir: string;
  syncDateFile: string;
}

export function getMirrorPaths(dataDir: string): MirrorPaths {
  return {
    dataDir,
    batchesDir: path.join(dataDir, BATCHES_DIRNAME),
    syncDateFile: path.join(dataDir, SYNC_DATE_FILENAME),
  };
}
