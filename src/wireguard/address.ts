/**
 * IPv4 Address Helpers
 *
 * Strict parsing: a value is accepted only if it formats back to exactly the
 * text that was given, so leading zeros, shorthand forms and stray
 * whitespace are all rejected.
 */

import { isIPv4 } from 'node:net';

import { ValidationError } from '../core/errors.js';

/**
 * A parsed IPv4 CIDR.
 */
export interface Subnet {
  /** The address as written (host bits may be set) */
  address: number;
  prefix: number;
  network: number;
  broadcast: number;
}

/**
 * Format a 32-bit unsigned integer as a dotted quad.
 */
export function formatIPv4(value: number): string {
  return [24, 16, 8, 0].map((shift) => (value >>> shift) & 0xff).join('.');
}

/**
 * Parse a dotted-quad IPv4 address.
 *
 * @throws ValidationError if the text is not a canonical IPv4 address
 */
export function parseIPv4(text: string, field: string = 'address'): number {
  if (!isIPv4(text)) {
    throw new ValidationError(`Invalid IPv4 address: '${text}'`, field);
  }
  const value = text
    .split('.')
    .reduce((acc, octet) => ((acc << 8) | Number.parseInt(octet, 10)) >>> 0, 0);
  if (formatIPv4(value) !== text) {
    throw new ValidationError(`Invalid IPv4 address: '${text}'`, field);
  }
  return value;
}

/**
 * Whether `text` is a canonical IPv4 address.
 */
export function isValidIPv4(text: string): boolean {
  try {
    parseIPv4(text);
    return true;
  } catch {
    return false;
  }
}

function maskFor(prefix: number): number {
  return prefix === 0 ? 0 : (0xffffffff << (32 - prefix)) >>> 0;
}

/**
 * Parse `a.b.c.d/n`.
 *
 * @throws ValidationError if the text is not a canonical IPv4 CIDR
 */
export function parseIPv4Cidr(text: string, field: string = 'address'): Subnet {
  const slash = text.indexOf('/');
  if (slash === -1) {
    throw new ValidationError(`Invalid CIDR (missing prefix length): '${text}'`, field);
  }

  const address = parseIPv4(text.slice(0, slash), field);
  const prefixText = text.slice(slash + 1);
  const prefix = Number.parseInt(prefixText, 10);
  if (!/^\d{1,2}$/.test(prefixText) || String(prefix) !== prefixText || prefix > 32) {
    throw new ValidationError(`Invalid CIDR prefix length: '${text}'`, field);
  }

  const mask = maskFor(prefix);
  const network = (address & mask) >>> 0;
  const broadcast = (network | (~mask >>> 0)) >>> 0;
  return { address, prefix, network, broadcast };
}

/**
 * Whether `text` is a canonical IPv4 CIDR.
 */
export function isValidIPv4Cidr(text: string): boolean {
  try {
    parseIPv4Cidr(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Whether `address` falls inside the subnet (network and broadcast included).
 */
export function subnetContains(subnet: Subnet, address: number): boolean {
  return address >= subnet.network && address <= subnet.broadcast;
}

/**
 * Format the subnet's network in CIDR notation, e.g. 10.253.0.0/24.
 */
export function formatNetwork(subnet: Subnet): string {
  return `${formatIPv4(subnet.network)}/${subnet.prefix}`;
}

/**
 * Number of usable host addresses (network and broadcast excluded).
 */
export function hostCapacity(subnet: Subnet): number {
  const size = subnet.broadcast - subnet.network + 1;
  return Math.max(0, size - 2);
}

/**
 * Validate a comma-separated list of IPv4 addresses and normalise spacing.
 */
export function normalizeAddressList(text: string, field: string): string {
  return splitList(text)
    .map((entry) => {
      parseIPv4(entry, field);
      return entry;
    })
    .join(', ');
}

/**
 * Validate a comma-separated list of IPv4 CIDRs and normalise spacing.
 */
export function normalizeCidrList(text: string, field: string): string {
  return splitList(text)
    .map((entry) => {
      parseIPv4Cidr(entry, field);
      return entry;
    })
    .join(', ');
}

function splitList(text: string): string[] {
  return text
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry !== '');
}
