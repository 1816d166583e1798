// XDG Base Directory Specification support
// https://specifications.freedesktop.org/basedir/latest/

import { homedir } from 'node:os';
import { join } from 'node:path';
import { Env } from './env.ts';

const APP_NAME = 'panetext';

/**
 * Get the home directory, falling back to the working directory
 */
function getHomeDir(): string {
  return Env.get('HOME') || Env.get('USERPROFILE') || homedir() || '.';
}

/**
 * Get the XDG config directory for user-specific configuration files.
 *
 * Default: $HOME/.config/panetext
 */
export function getConfigDir(): string {
  const xdgConfigHome = Env.get('XDG_CONFIG_HOME');
  const baseDir = xdgConfigHome || join(getHomeDir(), '.config');
  return join(baseDir, APP_NAME);
}

/**
 * Get the XDG cache directory for user-specific non-essential cached data.
 *
 * Default: $HOME/.cache/panetext
 */
export function getCacheDir(): string {
  const xdgCacheHome = Env.get('XDG_CACHE_HOME');
  const baseDir = xdgCacheHome || join(getHomeDir(), '.cache');
  return join(baseDir, APP_NAME);
}
