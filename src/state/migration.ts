/**
 * Legacy Marker Migration
 *
 * Older releases recorded some steps under different marker names. These
 * helpers fold a legacy marker into its canonical name exactly once, even
 * when several processes race to do it.
 */

import type { ConfigStore } from './store.js';

/**
 * Options for {@link ensureCanonicalMarker}
 */
export interface MigrationOptions {
  /** Called when a legacy marker could not be removed after migration */
  onCleanupError?: (legacyName: string, error: unknown) => void;
}

/**
 * Report whether the canonical marker is (now) present, migrating a legacy
 * marker if one exists.
 *
 * Only the process whose exclusive create produced the canonical marker
 * removes the legacy marker, so racing processes never both clean up.
 * Failure to remove the legacy marker does not change the result.
 *
 * @param store - Store owning the markers
 * @param canonical - Current marker name
 * @param legacy - Older names, checked in order; empty names and the canonical name are ignored
 * @returns true if the step should be treated as complete
 */
export async function ensureCanonicalMarker(
  store: ConfigStore,
  canonical: string,
  legacy: readonly string[],
  options: MigrationOptions = {}
): Promise<boolean> {
  if (await store.isComplete(canonical)) {
    return true;
  }

  for (const name of legacy) {
    if (name === '' || name === canonical) {
      continue;
    }
    if (!(await store.isComplete(name))) {
      continue;
    }

    const created = await store.markCompleteIfNotExists(canonical);
    if (created) {
      try {
        await store.clearMarker(name);
      } catch (error) {
        options.onCleanupError?.(name, error);
      }
    }
    return true;
  }

  return false;
}
