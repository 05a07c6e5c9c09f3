/**
 * Add-Peer Workflow
 *
 * Collects and validates everything about a new peer before touching any
 * state, then generates keys, allocates an address, writes the client export
 * and the updated server configuration, and commits the allocation.
 */

import { readFile, rm } from 'node:fs/promises';

import { IOError, PreflightError, ValidationError, describeError, hasErrnoCode } from '../core/errors.js';
import type { StepContext } from '../core/types.js';
import { getDefaultPeerExportDir, getInterfaceConfigPath } from '../lib/paths.js';
import { CONFIG_KEYS, MARKERS } from '../state/keys.js';
import { runChecked } from '../system/executor.js';
import { formatNetwork, normalizeAddressList, normalizeCidrList, parseIPv4Cidr } from './address.js';
import { AddressAllocator } from './allocator.js';
import { renderQrCode, writeClientExport } from './export.js';
import { assertValidKey, generateKeyPair, isValidKey } from './keys.js';
import { interfaceAddress, lookupValue, parseServerConfig, usedPeerAddresses } from './parse.js';
import {
  DEFAULT_KEEPALIVE_SECONDS,
  ROUTE_ALL_ALLOWED_IPS,
  appendPeerBlock,
  renderClientConfig,
  renderPeerBlock,
} from './render.js';
import { sanitizeConfigValue } from './sanitize.js';
import type { PresharedKeyPolicy, WireGuardPeer } from './types.js';

/**
 * Inputs for adding a peer. Anything left out is taken from the store or
 * asked for; in non-interactive mode it falls back to a default or fails.
 */
export interface AddPeerOptions {
  interfaceName?: string;
  peerName?: string;
  /** Server endpoint the client dials, host:port */
  endpoint?: string;
  /** Comma-separated DNS servers for the client */
  dns?: string;
  /** Comma-separated CIDRs routed through the tunnel (excludes routeAll) */
  clientAllowedIPs?: string;
  /** Route all client traffic through the tunnel (excludes clientAllowedIPs) */
  routeAll?: boolean;
  /** Directory for the exported client config */
  exportDir?: string;
  /** Keepalive in seconds; 0 omits the line */
  keepalive?: number;
  presharedKey?: PresharedKeyPolicy;
  nonInteractive?: boolean;
  skipQrCode?: boolean;
  skipServiceRestart?: boolean;
}

/**
 * Outcome of a successful add-peer.
 */
export interface AddPeerResult {
  peer: WireGuardPeer;
  exportPath: string;
  serverConfigPath: string;
  clientConfig: string;
  qrCode?: string;
  /** True if this call created the WireGuard completion marker */
  markedComplete: boolean;
}

/**
 * Validated peer request.
 */
export interface PeerRequest {
  interfaceName: string;
  name: string;
  endpoint: string;
  dns?: string;
  clientAllowedIPs?: string;
  routeAll: boolean;
  keepalive: number;
  presharedKey: PresharedKeyPolicy;
  exportDir: string;
}

// =============================================================================
// Validation
// =============================================================================

const INTERFACE_NAME_PATTERN = /^[A-Za-z0-9_=+.-]{1,15}$/;

/**
 * @throws ValidationError unless the name is a valid network interface name
 */
export function validateInterfaceName(name: string): void {
  if (!INTERFACE_NAME_PATTERN.test(name)) {
    throw new ValidationError(
      `Invalid interface name '${name}': use 1-15 letters, digits or _=+.-`,
      'interface'
    );
  }
}

/**
 * Validate a TCP/UDP port number given as text.
 *
 * @throws ValidationError unless the text is an integer in 1-65535
 */
export function parsePort(text: string, field: string): number {
  const port = Number.parseInt(text, 10);
  if (!/^\d+$/.test(text) || port < 1 || port > 65535) {
    throw new ValidationError(`Invalid port (must be 1-65535): ${text}`, field);
  }
  return port;
}

/**
 * Sanitize and validate an endpoint of the form host:port.
 *
 * @returns The sanitized endpoint
 * @throws ValidationError if empty or malformed
 */
export function validateEndpoint(raw: string): string {
  const endpoint = sanitizeConfigValue(raw);
  if (endpoint === '') {
    throw new ValidationError(
      'Server endpoint is required',
      'endpoint',
      'Pass --endpoint <host:port> or store WIREGUARD_ENDPOINT.'
    );
  }
  const separator = endpoint.lastIndexOf(':');
  const host = separator === -1 ? '' : endpoint.slice(0, separator);
  if (host === '' || /\s/.test(host)) {
    throw new ValidationError(`Invalid endpoint '${endpoint}': expected host:port`, 'endpoint');
  }
  parsePort(endpoint.slice(separator + 1), 'endpoint');
  return endpoint;
}

/**
 * @throws ValidationError unless 0 <= seconds <= 65535
 */
export function validateKeepalive(seconds: number): number {
  if (!Number.isInteger(seconds) || seconds < 0 || seconds > 65535) {
    throw new ValidationError(`Invalid keepalive (must be 0-65535 seconds): ${seconds}`, 'keepalive');
  }
  return seconds;
}

function optionalText(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Resolve every peer input from options, stored values and prompts, and
 * validate it. Nothing is written.
 */
export async function collectPeerRequest(
  ctx: StepContext,
  options: AddPeerOptions
): Promise<PeerRequest> {
  const { store, prompter } = ctx;
  const nonInteractive = ctx.nonInteractive || options.nonInteractive === true;
  const now = ctx.now?.() ?? new Date();

  const interfaceName =
    optionalText(options.interfaceName) ??
    (await store.getOrDefault(CONFIG_KEYS.wireguardInterface, 'wg0'));
  validateInterfaceName(interfaceName);

  const defaultName = `peer-${Math.floor(now.getTime() / 1000)}`;
  let rawName = optionalText(options.peerName);
  if (rawName === undefined) {
    rawName = nonInteractive
      ? defaultName
      : await prompter.input("Peer name (e.g. 'laptop', 'phone')", { defaultValue: defaultName });
  }
  const name = sanitizeConfigValue(rawName);
  if (name === '') {
    throw new ValidationError(`Peer name '${rawName}' is empty after removing unsafe characters`, 'name');
  }

  let endpoint =
    optionalText(options.endpoint) ??
    optionalText(await store.getOrDefault(CONFIG_KEYS.wireguardEndpoint, ''));
  if (endpoint === undefined && !nonInteractive) {
    endpoint = await prompter.input('Server endpoint (host:port)', { placeholder: 'vpn.example.com:51820' });
  }
  const validEndpoint = validateEndpoint(endpoint ?? '');

  let dns =
    optionalText(options.dns) ??
    optionalText(await store.getOrDefault(CONFIG_KEYS.wireguardPeerDns, ''));
  if (dns === undefined && !nonInteractive) {
    dns = optionalText(await prompter.input('Client DNS server (optional)', { defaultValue: '' }));
  }
  const validDns = dns === undefined ? undefined : normalizeAddressList(sanitizeConfigValue(dns), 'dns');

  const override = optionalText(options.clientAllowedIPs);
  if (override !== undefined && options.routeAll !== undefined) {
    throw new ValidationError(
      'Client allowed IPs and route-all are mutually exclusive',
      'clientAllowedIPs'
    );
  }
  const clientAllowedIPs =
    override === undefined ? undefined : normalizeCidrList(sanitizeConfigValue(override), 'clientAllowedIPs');
  if (clientAllowedIPs === '') {
    throw new ValidationError('Client allowed IPs cannot be empty', 'clientAllowedIPs');
  }

  let routeAll = options.routeAll ?? false;
  if (options.routeAll === undefined && clientAllowedIPs === undefined) {
    routeAll = nonInteractive
      ? true
      : await prompter.confirm('Route all client traffic through the VPN?', true);
  }

  const keepalive = validateKeepalive(options.keepalive ?? DEFAULT_KEEPALIVE_SECONDS);

  let presharedKey = options.presharedKey;
  if (presharedKey === undefined) {
    const generate = nonInteractive
      ? true
      : await prompter.confirm('Generate a preshared key for this peer?', true);
    presharedKey = generate ? { kind: 'generate' } : { kind: 'none' };
  }
  if (presharedKey.kind === 'supplied') {
    assertValidKey(presharedKey.key, 'presharedKey');
  }

  return {
    interfaceName,
    name,
    endpoint: validEndpoint,
    dns: validDns === '' ? undefined : validDns,
    clientAllowedIPs,
    routeAll,
    keepalive,
    presharedKey,
    exportDir:
      optionalText(options.exportDir) ??
      (await store.getOrDefault(CONFIG_KEYS.wireguardExportDir, getDefaultPeerExportDir())),
  };
}

// =============================================================================
// Workflow
// =============================================================================

async function readServerConfig(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (hasErrnoCode(error, 'ENOENT')) {
      throw new PreflightError(
        `WireGuard config ${path} does not exist`,
        "Run 'homelab-setup run wireguard' to create the interface first."
      );
    }
    throw new IOError('Failed to read WireGuard config', path, error);
  }
}

/**
 * Add a peer to an existing interface.
 *
 * @throws ValidationError for bad input, before anything is generated or written
 * @throws PreflightError if the interface file is missing or unusable
 * @throws ExternalCommandError if key generation fails
 * @throws AddressSpaceExhaustedError if the subnet is full
 */
export async function addPeer(ctx: StepContext, options: AddPeerOptions = {}): Promise<AddPeerResult> {
  const { store, keygen, logger } = ctx;
  const request = await collectPeerRequest(ctx, options);

  const configDir = await store.getOrDefault(CONFIG_KEYS.wireguardConfigDir);
  const serverConfigPath = getInterfaceConfigPath(configDir, request.interfaceName);
  const rawConfig = await readServerConfig(serverConfigPath);
  const parsed = parseServerConfig(rawConfig);
  const serverAddress = interfaceAddress(parsed);

  const stored: Record<string, string> = {
    [CONFIG_KEYS.wireguardEndpoint]: request.endpoint,
  };
  if (request.dns !== undefined) {
    stored[CONFIG_KEYS.wireguardPeerDns] = request.dns;
  }

  let serverPublicKey = (await store.getOrDefault(CONFIG_KEYS.wireguardPublicKey, '')).trim();
  if (!isValidKey(serverPublicKey)) {
    const privateKey = lookupValue(parsed.interface, 'PrivateKey');
    if (privateKey === undefined || !isValidKey(privateKey)) {
      throw new PreflightError(
        `Cannot determine the server public key for ${request.interfaceName}`,
        'Store WIREGUARD_PUBLIC_KEY or make sure the interface file has a PrivateKey.'
      );
    }
    serverPublicKey = await keygen.derivePublicKey(privateKey);
    stored[CONFIG_KEYS.wireguardPublicKey] = serverPublicKey;
  }

  const client = await generateKeyPair(keygen);
  let presharedKey: string | undefined;
  if (request.presharedKey.kind === 'generate') {
    presharedKey = await keygen.generatePresharedKey();
  } else if (request.presharedKey.kind === 'supplied') {
    presharedKey = request.presharedKey.key;
  }

  const allocator = new AddressAllocator(store, request.interfaceName, serverAddress);
  const allocation = await allocator.peekNextAddress(usedPeerAddresses(parsed));

  const allowedIPs =
    request.clientAllowedIPs ??
    (request.routeAll ? ROUTE_ALL_ALLOWED_IPS : formatNetwork(parseIPv4Cidr(serverAddress)));

  const peer: WireGuardPeer = {
    name: request.name,
    publicKey: client.publicKey,
    presharedKey,
    address: allocation.address,
    clientAllowedIPs: allowedIPs,
    persistentKeepalive: request.keepalive > 0 ? request.keepalive : undefined,
  };

  const clientConfig = renderClientConfig({
    privateKey: client.privateKey,
    address: allocation.address,
    dns: request.dns,
    serverPublicKey,
    presharedKey,
    endpoint: request.endpoint,
    allowedIPs,
    persistentKeepalive: peer.persistentKeepalive,
  });

  const exportPath = await writeClientExport(
    request.exportDir,
    request.name,
    clientConfig,
    ctx.now?.() ?? new Date()
  );
  try {
    await store.writeFileAtomic(serverConfigPath, appendPeerBlock(rawConfig, renderPeerBlock(peer)), 0o600);
  } catch (error) {
    // The export holds a private key for a peer the server does not know.
    await rm(exportPath, { force: true });
    throw error;
  }
  await allocator.commit(allocation);
  await store.setMany(stored);

  logger.success(`Peer ${peer.name} added with address ${peer.address}`);
  logger.info(`Client config: ${exportPath}`);

  let qrCode: string | undefined;
  if (!options.skipQrCode) {
    try {
      qrCode = await renderQrCode(clientConfig);
      logger.info('Scan this QR code from the WireGuard mobile app:');
      logger.raw(qrCode);
    } catch (error) {
      logger.warning(`Failed to render QR code: ${describeError(error)}`);
    }
  }

  const markedComplete = await store.markCompleteIfNotExists(MARKERS.wireguard);

  if (!options.skipServiceRestart) {
    await offerRestart(ctx, request.interfaceName);
  }

  return { peer, exportPath, serverConfigPath, clientConfig, qrCode, markedComplete };
}

async function offerRestart(ctx: StepContext, interfaceName: string): Promise<void> {
  const service = `wg-quick@${interfaceName}.service`;
  const restart = await ctx.prompter.confirm(`Restart ${service} now?`, true);
  if (!restart) {
    ctx.logger.info(`Restart later with: sudo systemctl restart ${service}`);
    return;
  }
  try {
    await runChecked(ctx.runner, 'sudo', ['systemctl', 'restart', service]);
    ctx.logger.success(`Service ${service} restarted`);
  } catch (error) {
    ctx.logger.warning(`Failed to restart ${service}: ${describeError(error)}`);
  }
}
