/**
 * Config Value Sanitization
 *
 * User-supplied strings are written into INI-like WireGuard files. Anything
 * with syntactic meaning there (section brackets, comments, assignment, line
 * breaks) or in a shell is stripped before rendering.
 */

// eslint-disable-next-line no-useless-escape
const UNSAFE_CHARACTERS = /[\n\r\[\]#=;|&`$\\]/g;

/**
 * Strip characters that could inject a new section, key or comment.
 */
export function sanitizeConfigValue(value: string): string {
  return value.replace(UNSAFE_CHARACTERS, '').replace(/\t/g, ' ').trim();
}

/**
 * Derive a filesystem-safe file stem from a peer name.
 *
 * @returns Lowercase letters, digits, '-' and '_'; 'peer' if nothing is left
 */
export function safePeerFilename(name: string): string {
  const stem = sanitizeConfigValue(name)
    .toLowerCase()
    .replace(/ /g, '-')
    .replace(/[^a-z0-9_-]/g, '');
  return stem === '' ? 'peer' : stem;
}
