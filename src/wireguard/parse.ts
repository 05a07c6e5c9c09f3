/**
 * WireGuard Config Parsing
 *
 * Reads back a server configuration so that peers can be appended to an
 * interface created by an earlier run (or by hand).
 */

import { PreflightError } from '../core/errors.js';
import { formatIPv4, isValidIPv4, isValidIPv4Cidr, parseIPv4Cidr } from './address.js';

/**
 * One `[Peer]` section and the `# Peer:` name preceding it.
 */
export interface ParsedPeer {
  name: string;
  values: Record<string, string>;
}

/**
 * Sections of a parsed server configuration.
 */
export interface ParsedServerConfig {
  interface: Record<string, string>;
  peers: ParsedPeer[];
}

const PEER_COMMENT = '# Peer:';

function stripInlineComment(value: string): string {
  const index = value.search(/[#;]/);
  return (index === -1 ? value : value.slice(0, index)).trim();
}

/**
 * Parse server configuration text.
 *
 * Section names are case-insensitive; unknown sections are skipped. A
 * `# Peer: name` comment names the `[Peer]` section that follows it.
 */
export function parseServerConfig(content: string): ParsedServerConfig {
  const parsed: ParsedServerConfig = { interface: {}, peers: [] };
  let current: Record<string, string> | null = null;
  let pendingName = '';

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();

    if (line.startsWith(PEER_COMMENT)) {
      pendingName = line.slice(PEER_COMMENT.length).trim();
      continue;
    }
    if (line === '' || line.startsWith('#') || line.startsWith(';')) {
      continue;
    }

    if (line.startsWith('[') && line.endsWith(']')) {
      const section = line.slice(1, -1).trim().toLowerCase();
      if (section === 'interface') {
        current = parsed.interface;
      } else if (section === 'peer') {
        const peer: ParsedPeer = { name: pendingName, values: {} };
        parsed.peers.push(peer);
        current = peer.values;
        pendingName = '';
      } else {
        current = null;
      }
      continue;
    }

    if (current === null) {
      continue;
    }
    const separator = line.indexOf('=');
    if (separator === -1) {
      continue;
    }
    const key = line.slice(0, separator).trim();
    const value = stripInlineComment(line.slice(separator + 1));
    if (key !== '') {
      current[key] = value;
    }
  }

  return parsed;
}

/**
 * Case-insensitive lookup of a section value.
 */
export function lookupValue(values: Record<string, string>, key: string): string | undefined {
  const target = key.toLowerCase();
  for (const [name, value] of Object.entries(values)) {
    if (name.toLowerCase() === target) {
      return value;
    }
  }
  return undefined;
}

/**
 * The first Address of the `[Interface]` section, validated as IPv4 CIDR.
 *
 * @throws PreflightError if the address is missing or malformed
 */
export function interfaceAddress(parsed: ParsedServerConfig): string {
  const raw = lookupValue(parsed.interface, 'Address');
  const primary = raw?.split(',')[0]?.trim() ?? '';
  if (primary === '') {
    throw new PreflightError('WireGuard interface section has no Address');
  }
  try {
    parseIPv4Cidr(primary);
  } catch (error) {
    throw new PreflightError(`WireGuard interface address is not an IPv4 CIDR: ${primary}`, undefined, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return primary;
}

/**
 * IPv4 host addresses already assigned to peers (from their AllowedIPs).
 *
 * Only single-host entries (`a.b.c.d` or `a.b.c.d/32`) count; routed
 * networks behind a peer are not tunnel addresses.
 */
export function usedPeerAddresses(parsed: ParsedServerConfig): string[] {
  const used: string[] = [];
  for (const peer of parsed.peers) {
    const allowed = lookupValue(peer.values, 'AllowedIPs');
    if (allowed === undefined) {
      continue;
    }
    for (const entry of allowed.split(',')) {
      const token = entry.trim();
      if (isValidIPv4(token)) {
        used.push(token);
        continue;
      }
      if (token.endsWith('/32') && isValidIPv4Cidr(token)) {
        used.push(formatIPv4(parseIPv4Cidr(token).address));
      }
    }
  }
  return used;
}
