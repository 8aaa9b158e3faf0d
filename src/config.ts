import os from 'node:os';
import path from 'node:path';

export const APP_NAME = 'svcstat';
export const DEFAULT_MANIFEST_URL = 'https://references.taskcluster.net/manifest.json';
export const DEFAULT_AUTH_URL = 'https://auth.taskcluster.net/v1';
const PING_URLS_FILE = path.join('status', 'pingURLs.json');

export interface AppConfig {
  manifestUrl: string;
  authBaseUrl: string;
  cacheDir: string;
  pingUrlsCachePath: string;
}

type Env = Record<string, string | undefined>;

export function loadConfig(
  env: Env = process.env,
  platform: NodeJS.Platform = process.platform,
  homeDir: string = os.homedir(),
): AppConfig {
  const cacheDir = nonEmpty(env.SVCSTAT_CACHE_DIR) ?? path.join(userCacheRoot(env, platform, homeDir), APP_NAME);
  return {
    manifestUrl: nonEmpty(env.SVCSTAT_MANIFEST_URL) ?? DEFAULT_MANIFEST_URL,
    authBaseUrl: nonEmpty(env.SVCSTAT_AUTH_URL) ?? DEFAULT_AUTH_URL,
    cacheDir,
    pingUrlsCachePath: path.join(cacheDir, PING_URLS_FILE),
  };
}

export function userCacheRoot(env: Env, platform: NodeJS.Platform, homeDir: string): string {
  if (platform === 'darwin') {
    return path.join(homeDir, 'Library', 'Caches');
  }
  if (platform === 'win32') {
    return nonEmpty(env.LOCALAPPDATA) ?? path.join(homeDir, 'AppData', 'Local');
  }
  return nonEmpty(env.XDG_CACHE_HOME) ?? path.join(homeDir, '.cache');
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
