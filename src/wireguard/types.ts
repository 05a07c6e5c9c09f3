/**
 * WireGuard Types
 */

/**
 * Server-side interface definition.
 */
export interface WireGuardInterface {
  /** Interface name, e.g. wg0 */
  name: string;
  /** Server address in CIDR notation, e.g. 10.253.0.1/24 */
  address: string;
  listenPort: number;
  privateKey: string;
  publicKey: string;
  peers: WireGuardPeer[];
}

/**
 * One VPN client as seen by the server.
 */
export interface WireGuardPeer {
  /** Sanitized display name, written as a `# Peer:` comment */
  name: string;
  publicKey: string;
  presharedKey?: string;
  /** Tunnel address allocated to the peer (no prefix) */
  address: string;
  /** AllowedIPs written into the client's own config */
  clientAllowedIPs?: string;
  /** Keepalive in seconds; absent means the line is omitted */
  persistentKeepalive?: number;
}

/**
 * Everything needed to render a client-importable config.
 */
export interface ClientConfigInput {
  privateKey: string;
  /** Client tunnel address (no prefix) */
  address: string;
  dns?: string;
  serverPublicKey: string;
  presharedKey?: string;
  endpoint: string;
  allowedIPs: string;
  persistentKeepalive?: number;
}

/**
 * How the preshared key for a new peer is obtained.
 */
export type PresharedKeyPolicy =
  | { kind: 'generate' }
  | { kind: 'none' }
  | { kind: 'supplied'; key: string };
