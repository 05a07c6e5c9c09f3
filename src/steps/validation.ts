/**
 * Input Validation for Setup Steps
 *
 * Paths and names collected here end up as arguments to sudo, useradd and
 * systemctl, so anything a shell could interpret is refused.
 */

import { isAbsolute } from 'node:path';

import { ValidationError } from '../core/errors.js';
import { isValidIPv4 } from '../wireguard/address.js';

const FORBIDDEN_PATH_CHARACTERS = [';', '&', '|', '$', '`', '(', ')', '<', '>', '\n', '\r', '*', '?', '[', ']', '{', '}', '\0'];

/**
 * @throws ValidationError unless the path is non-empty and absolute
 */
export function validatePath(path: string, field: string = 'path'): void {
  if (path === '') {
    throw new ValidationError('Path cannot be empty', field);
  }
  if (!isAbsolute(path)) {
    throw new ValidationError(`Path must be absolute: ${path}`, field);
  }
}

/**
 * @throws ValidationError unless the path is absolute and free of shell metacharacters
 */
export function validateSafePath(path: string, field: string = 'path'): void {
  validatePath(path, field);
  for (const char of FORBIDDEN_PATH_CHARACTERS) {
    if (path.includes(char)) {
      throw new ValidationError(
        `Path contains forbidden character ${JSON.stringify(char)}: ${JSON.stringify(path)}`,
        field
      );
    }
  }
}

/**
 * @throws ValidationError unless the name is a valid Unix username
 */
export function validateUsername(username: string): void {
  if (username === '') {
    throw new ValidationError('Username cannot be empty', 'username');
  }
  if (username.length > 32) {
    throw new ValidationError(`Username too long (max 32 characters): ${username}`, 'username');
  }
  if (!/^[A-Za-z_]/.test(username)) {
    throw new ValidationError(`Username must start with a letter or underscore: ${username}`, 'username');
  }
  if (!/^[A-Za-z0-9_-]+$/.test(username)) {
    throw new ValidationError(`Username contains invalid character: ${username}`, 'username');
  }
}

const HOSTNAME_LABEL = /^[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?$/;

/**
 * @throws ValidationError unless the value is an IPv4 address or a DNS hostname
 */
export function validateHost(host: string, field: string = 'host'): void {
  if (isValidIPv4(host)) {
    return;
  }
  const labels = host.split('.');
  const isHostname =
    host.length > 0 &&
    host.length <= 253 &&
    labels.every((label) => HOSTNAME_LABEL.test(label)) &&
    !/^\d+$/.test(labels[labels.length - 1] ?? '');
  if (!isHostname) {
    throw new ValidationError(`Invalid host (expected IPv4 address or hostname): ${host}`, field);
  }
}

/**
 * @throws ValidationError unless the value looks like an IANA zone name
 */
export function validateTimezone(tz: string): void {
  if (!/^[A-Za-z0-9_+-]+(?:\/[A-Za-z0-9_+-]+)*$/.test(tz)) {
    throw new ValidationError(`Invalid timezone: ${tz}`, 'timezone');
  }
}

/**
 * Split a comma-separated stored list, dropping empty entries.
 */
export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry !== '');
}
