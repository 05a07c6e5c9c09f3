/**
 * Path Utilities
 *
 * Provides path expansion and the default locations of the configuration
 * file, marker directory and WireGuard files.
 */

import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';

/**
 * Environment variable overriding the configuration file path.
 */
export const CONFIG_PATH_ENV = 'HOMELAB_SETUP_CONFIG';

/**
 * Environment variable overriding the marker directory.
 */
export const MARKER_DIR_ENV = 'HOMELAB_SETUP_MARKER_DIR';

/**
 * Default directory holding WireGuard interface files.
 */
export const DEFAULT_WIREGUARD_DIR = '/etc/wireguard';

/**
 * Expand a path, resolving ~ to home directory and making relative paths absolute.
 *
 * @param inputPath - Path that may contain ~, $VAR or be relative
 * @param basePath - Base directory for resolving relative paths
 * @returns Absolute path with ~ and variables expanded
 */
export function expandPath(inputPath: string, basePath: string = process.cwd()): string {
  let expanded = inputPath;

  if (expanded === '~' || expanded.startsWith('~/')) {
    expanded = join(homedir(), expanded.slice(1));
  }

  expanded = expanded.replace(
    /\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (_, varName: string) => {
      return process.env[varName] ?? '';
    }
  );

  if (!isAbsolute(expanded)) {
    expanded = resolve(basePath, expanded);
  }

  return expanded;
}

/**
 * Resolve the configuration file path.
 *
 * Precedence: explicit option, then $HOMELAB_SETUP_CONFIG, then
 * ~/.homelab-setup.conf.
 */
export function getConfigPath(override?: string, env: NodeJS.ProcessEnv = process.env): string {
  const candidate = override ?? env[CONFIG_PATH_ENV];
  if (candidate) {
    return expandPath(candidate);
  }
  return join(homedir(), '.homelab-setup.conf');
}

/**
 * Resolve the marker directory.
 *
 * Precedence: explicit option, then $HOMELAB_SETUP_MARKER_DIR, then
 * ~/.local/homelab-setup.
 */
export function getMarkerDir(override?: string, env: NodeJS.ProcessEnv = process.env): string {
  const candidate = override ?? env[MARKER_DIR_ENV];
  if (candidate) {
    return expandPath(candidate);
  }
  return join(homedir(), '.local', 'homelab-setup');
}

/**
 * Default directory for exported peer configurations.
 *
 * @returns ~/setup/export/wireguard-peers
 */
export function getDefaultPeerExportDir(): string {
  return join(homedir(), 'setup', 'export', 'wireguard-peers');
}

/**
 * Path of the server-side configuration for a WireGuard interface.
 *
 * @param configDir - Directory holding interface files
 * @param interfaceName - Interface name such as wg0
 */
export function getInterfaceConfigPath(configDir: string, interfaceName: string): string {
  return join(configDir, `${interfaceName}.conf`);
}
