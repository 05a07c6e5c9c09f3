/**
 * Configuration Store
 *
 * Persists key/value configuration in a flat KEY=value file and tracks step
 * completion through marker files. Every save is atomic (temp file, fsync,
 * rename) so a crash mid-write never leaves a partial file behind.
 */

import { randomBytes } from 'node:crypto';
import { mkdir, open, readdir, readFile, rename, rm, stat, unlink } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

import { IOError, NotFoundError, ValidationError, hasErrnoCode } from '../core/errors.js';
import { defaultFor } from './keys.js';

/**
 * Options for constructing a ConfigStore
 */
export interface ConfigStoreOptions {
  /** Path of the KEY=value configuration file */
  configPath: string;
  /** Directory holding completion marker files */
  markerDir: string;
  /** Clock used for the file header (default: Date.now) */
  now?: () => Date;
}

const CONFIG_FILE_MODE = 0o600;
const MARKER_DIR_MODE = 0o755;
const MARKER_FILE_MODE = 0o644;

const FILE_HEADER = '# homelab-setup configuration';

// =============================================================================
// Validation
// =============================================================================

/**
 * Reject marker names that could escape the marker directory.
 *
 * @throws ValidationError for empty names, path separators, '.' and '..'
 */
export function validateMarkerName(name: string): void {
  if (name === '') {
    throw new ValidationError('Marker name cannot be empty', 'marker');
  }
  if (name.includes('/') || name.includes('\\')) {
    throw new ValidationError(`Marker name cannot contain path separators: ${name}`, 'marker');
  }
  if (name === '.' || name === '..') {
    throw new ValidationError(`Marker name cannot be '.' or '..': ${name}`, 'marker');
  }
}

/**
 * Check a marker name without throwing.
 */
export function isValidMarkerName(name: string): boolean {
  try {
    validateMarkerName(name);
    return true;
  } catch {
    return false;
  }
}

/**
 * Reject keys that would not survive a save/load cycle.
 */
export function validateConfigKey(key: string): void {
  if (key === '') {
    throw new ValidationError('Configuration key cannot be empty', 'key');
  }
  if (key.includes('=')) {
    throw new ValidationError(`Configuration key cannot contain '=': ${key}`, 'key');
  }
  if (/[\r\n\0]/.test(key)) {
    throw new ValidationError('Configuration key cannot contain line breaks', 'key');
  }
  if (key.trim() !== key) {
    throw new ValidationError(`Configuration key cannot start or end with whitespace: '${key}'`, 'key');
  }
  if (key.startsWith('#')) {
    throw new ValidationError(`Configuration key cannot start with '#': ${key}`, 'key');
  }
}

/**
 * Reject values that would break the one-entry-per-line format.
 */
export function validateConfigValue(key: string, value: string): void {
  if (/[\r\n\0]/.test(value)) {
    throw new ValidationError(
      `Value for ${key} cannot contain line breaks or NUL characters`,
      key
    );
  }
}

// =============================================================================
// File format
// =============================================================================

/**
 * Parse the KEY=value file format.
 *
 * Blank lines and lines starting with '#' are skipped. The key is trimmed;
 * the value is kept verbatim apart from a trailing carriage return.
 */
export function parseConfigFile(content: string): Map<string, string> {
  const values = new Map<string, string>();

  for (const rawLine of content.split('\n')) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) {
      continue;
    }

    const separator = line.indexOf('=');
    if (separator === -1) {
      continue;
    }

    const key = line.slice(0, separator).trim();
    if (key === '') {
      continue;
    }
    values.set(key, line.slice(separator + 1));
  }

  return values;
}

/**
 * Serialize values to the KEY=value file format, keys sorted.
 */
export function serializeConfigFile(values: ReadonlyMap<string, string>, generatedAt: Date): string {
  const lines = [FILE_HEADER, `# Generated: ${generatedAt.toISOString()}`, ''];
  const keys = [...values.keys()].sort();
  for (const key of keys) {
    lines.push(`${key}=${values.get(key) ?? ''}`);
  }
  return `${lines.join('\n')}\n`;
}

// =============================================================================
// Atomic write
// =============================================================================

/**
 * Write a file atomically.
 *
 * Content goes to a temp file in the same directory, which is flushed to
 * disk and then renamed over the target. The temp file is removed on
 * failure.
 *
 * @param filePath - Destination path
 * @param content - File content
 * @param mode - Permission bits of the resulting file
 * @throws IOError if any filesystem operation fails
 */
export async function writeFileAtomic(
  filePath: string,
  content: string,
  mode: number
): Promise<void> {
  const dir = dirname(filePath);
  const tempPath = join(dir, `.${basename(filePath)}.tmp-${randomBytes(6).toString('hex')}`);

  try {
    await mkdir(dir, { recursive: true });
  } catch (error) {
    throw new IOError('Failed to create directory', dir, error);
  }

  try {
    const handle = await open(tempPath, 'wx', mode);
    try {
      await handle.chmod(mode);
      await handle.writeFile(content, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new IOError('Failed to write file', filePath, error);
  }
}

// =============================================================================
// ConfigStore
// =============================================================================

/**
 * Persistent configuration and completion markers.
 *
 * Values are read from the file on first access and cached for the life of
 * the instance. A mutation merges into the cached values and rewrites the
 * whole file; a concurrent writer in another process may lose an update (last rename
 * wins) but never sees a partial file. Markers are independent files whose
 * exclusive creation is the only cross-process synchronisation.
 */
export class ConfigStore {
  private readonly configPath: string;
  private readonly markerDir: string;
  private readonly now: () => Date;
  private values: Map<string, string> | null = null;

  constructor(options: ConfigStoreOptions) {
    this.configPath = options.configPath;
    this.markerDir = options.markerDir;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Get the configuration file path.
   */
  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Get the marker directory path.
   */
  getMarkerDir(): string {
    return this.markerDir;
  }

  // ---------------------------------------------------------------------------
  // Key/value
  // ---------------------------------------------------------------------------

  /**
   * Read the configuration file, replacing any cached values.
   *
   * A missing file is an empty store.
   *
   * @throws IOError if the file exists but cannot be read
   */
  async load(): Promise<void> {
    let content: string;
    try {
      content = await readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (hasErrnoCode(error, 'ENOENT')) {
        this.values = new Map();
        return;
      }
      throw new IOError('Failed to read configuration file', this.configPath, error);
    }
    this.values = parseConfigFile(content);
  }

  private async ensureLoaded(): Promise<Map<string, string>> {
    if (this.values === null) {
      await this.load();
    }
    return this.values ?? new Map<string, string>();
  }

  private async save(values: Map<string, string>): Promise<void> {
    await writeFileAtomic(
      this.configPath,
      serializeConfigFile(values, this.now()),
      CONFIG_FILE_MODE
    );
  }

  /**
   * Get a stored value.
   *
   * @throws NotFoundError if the key is not stored
   * @throws IOError if the file cannot be read
   */
  async get(key: string): Promise<string> {
    const values = await this.ensureLoaded();
    const value = values.get(key);
    if (value === undefined) {
      throw new NotFoundError(key);
    }
    return value;
  }

  /**
   * Get a stored value, falling back to the built-in default for the key
   * and then to `fallback`. Never rejects; an unreadable file counts as empty.
   */
  async getOrDefault(key: string, fallback: string = ''): Promise<string> {
    let values: Map<string, string>;
    try {
      values = await this.ensureLoaded();
    } catch {
      values = new Map();
    }
    return values.get(key) ?? defaultFor(key) ?? fallback;
  }

  /**
   * Whether a key is stored. An unreadable file counts as empty.
   */
  async exists(key: string): Promise<boolean> {
    try {
      const values = await this.ensureLoaded();
      return values.has(key);
    } catch {
      return false;
    }
  }

  /**
   * Copy of every stored entry.
   */
  async getAll(): Promise<Record<string, string>> {
    const values = await this.ensureLoaded();
    return Object.fromEntries(values);
  }

  /**
   * Store a value and save.
   *
   * @throws ValidationError if the key or value cannot be stored
   * @throws IOError if the file cannot be written
   */
  async set(key: string, value: string): Promise<void> {
    await this.setMany({ [key]: value });
  }

  /**
   * Store several values with a single save.
   */
  async setMany(entries: Readonly<Record<string, string>>): Promise<void> {
    for (const [key, value] of Object.entries(entries)) {
      validateConfigKey(key);
      validateConfigValue(key, value);
    }

    const values = await this.ensureLoaded();
    const next = new Map(values);
    for (const [key, value] of Object.entries(entries)) {
      next.set(key, value);
    }
    await this.save(next);
    this.values = next;
  }

  /**
   * Remove a key and save. Removing an absent key still rewrites the file.
   */
  async delete(key: string): Promise<void> {
    const values = await this.ensureLoaded();
    const next = new Map(values);
    next.delete(key);
    await this.save(next);
    this.values = next;
  }

  /**
   * Delete the configuration file. A missing file is not an error.
   */
  async removeConfigFile(): Promise<void> {
    try {
      await rm(this.configPath, { force: true });
    } catch (error) {
      throw new IOError('Failed to remove configuration file', this.configPath, error);
    }
    this.values = new Map();
  }

  /**
   * Atomically write an arbitrary file (used for generated configuration).
   */
  async writeFileAtomic(filePath: string, content: string, mode: number): Promise<void> {
    await writeFileAtomic(filePath, content, mode);
  }

  // ---------------------------------------------------------------------------
  // Markers
  // ---------------------------------------------------------------------------

  private markerPath(name: string): string {
    return join(this.markerDir, name);
  }

  private async ensureMarkerDir(): Promise<void> {
    try {
      await mkdir(this.markerDir, { recursive: true, mode: MARKER_DIR_MODE });
    } catch (error) {
      throw new IOError('Failed to create marker directory', this.markerDir, error);
    }
  }

  /**
   * Create a completion marker. Idempotent.
   *
   * @throws ValidationError if the name is unsafe
   * @throws IOError if the marker cannot be written
   */
  async markComplete(name: string): Promise<void> {
    validateMarkerName(name);
    await this.ensureMarkerDir();

    const path = this.markerPath(name);
    try {
      const handle = await open(path, 'a', MARKER_FILE_MODE);
      await handle.close();
    } catch (error) {
      throw new IOError('Failed to create marker file', path, error);
    }
  }

  /**
   * Create a completion marker only if it does not exist.
   *
   * Creation is exclusive, so when several processes race exactly one
   * of them gets `true`.
   *
   * @returns true if this call created the marker, false if it already existed
   * @throws ValidationError if the name is unsafe
   * @throws IOError on any other filesystem failure
   */
  async markCompleteIfNotExists(name: string): Promise<boolean> {
    validateMarkerName(name);
    await this.ensureMarkerDir();

    const path = this.markerPath(name);
    try {
      const handle = await open(path, 'wx', MARKER_FILE_MODE);
      await handle.close();
      return true;
    } catch (error) {
      if (hasErrnoCode(error, 'EEXIST')) {
        return false;
      }
      throw new IOError('Failed to create marker file', path, error);
    }
  }

  /**
   * Whether a marker exists. Unsafe names are never complete.
   */
  async isComplete(name: string): Promise<boolean> {
    if (!isValidMarkerName(name)) {
      return false;
    }
    try {
      await stat(this.markerPath(name));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Remove a marker. An absent marker is not an error.
   *
   * @throws ValidationError if the name is unsafe
   */
  async clearMarker(name: string): Promise<void> {
    validateMarkerName(name);
    const path = this.markerPath(name);
    try {
      await unlink(path);
    } catch (error) {
      if (hasErrnoCode(error, 'ENOENT')) {
        return;
      }
      throw new IOError('Failed to remove marker file', path, error);
    }
  }

  /**
   * Remove the marker directory and everything in it.
   */
  async clearAllMarkers(): Promise<void> {
    try {
      await rm(this.markerDir, { recursive: true, force: true });
    } catch (error) {
      throw new IOError('Failed to remove marker directory', this.markerDir, error);
    }
  }

  /**
   * Names of all markers, sorted.
   */
  async listMarkers(): Promise<string[]> {
    try {
      const entries = await readdir(this.markerDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile())
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (hasErrnoCode(error, 'ENOENT')) {
        return [];
      }
      throw new IOError('Failed to read marker directory', this.markerDir, error);
    }
  }
}
