/**
 * WireGuard Config Rendering
 *
 * Every user-supplied string passes through sanitizeConfigValue on its way
 * into the file; keys are validated base64 and written as-is.
 */

import { sanitizeConfigValue } from './sanitize.js';
import type { ClientConfigInput, WireGuardInterface, WireGuardPeer } from './types.js';

/**
 * Client AllowedIPs used when all traffic goes through the tunnel.
 */
export const ROUTE_ALL_ALLOWED_IPS = '0.0.0.0/0, ::/0';

/**
 * Default PersistentKeepalive for new peers, in seconds.
 */
export const DEFAULT_KEEPALIVE_SECONDS = 25;

function keepaliveLine(seconds: number | undefined): string[] {
  if (seconds === undefined || seconds <= 0) {
    return [];
  }
  return [`PersistentKeepalive = ${seconds}`];
}

/**
 * Render the server-side `# Peer:` comment and `[Peer]` section for one peer.
 */
export function renderPeerBlock(peer: WireGuardPeer): string {
  const lines = [
    `# Peer: ${sanitizeConfigValue(peer.name)}`,
    '[Peer]',
    `PublicKey = ${peer.publicKey}`,
  ];
  if (peer.presharedKey) {
    lines.push(`PresharedKey = ${peer.presharedKey}`);
  }
  lines.push(`AllowedIPs = ${sanitizeConfigValue(peer.address)}/32`);
  lines.push(...keepaliveLine(peer.persistentKeepalive));
  return `${lines.join('\n')}\n`;
}

/**
 * Render a complete server configuration.
 */
export function renderServerConfig(iface: WireGuardInterface): string {
  const sections = [
    [
      '[Interface]',
      `Address = ${sanitizeConfigValue(iface.address)}`,
      `ListenPort = ${iface.listenPort}`,
      `PrivateKey = ${iface.privateKey}`,
      '',
    ].join('\n'),
    ...iface.peers.map(renderPeerBlock),
  ];
  return sections.join('\n');
}

/**
 * Append a peer block to existing server configuration text, separated by a
 * blank line. Content already in the file is kept unchanged.
 */
export function appendPeerBlock(existing: string, block: string): string {
  const trimmed = existing.replace(/\n+$/, '');
  if (trimmed === '') {
    return block;
  }
  return `${trimmed}\n\n${block}`;
}

/**
 * Render a client-importable configuration.
 */
export function renderClientConfig(input: ClientConfigInput): string {
  const lines = [
    '[Interface]',
    `PrivateKey = ${input.privateKey}`,
    `Address = ${sanitizeConfigValue(input.address)}/32`,
  ];
  const dns = input.dns ? sanitizeConfigValue(input.dns) : '';
  if (dns) {
    lines.push(`DNS = ${dns}`);
  }

  lines.push('', '[Peer]', `PublicKey = ${input.serverPublicKey}`);
  if (input.presharedKey) {
    lines.push(`PresharedKey = ${input.presharedKey}`);
  }
  lines.push(`Endpoint = ${sanitizeConfigValue(input.endpoint)}`);
  lines.push(`AllowedIPs = ${sanitizeConfigValue(input.allowedIPs)}`);
  lines.push(...keepaliveLine(input.persistentKeepalive));

  return `${lines.join('\n')}\n`;
}
