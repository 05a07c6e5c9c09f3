/**
 * WireGuard Command Handlers
 */

import type { PresharedKeyPolicy } from '../../wireguard/types.js';
import { addPeer, type AddPeerOptions } from '../../wireguard/peer.js';
import { createContext, finish, handleError, type GlobalOptions } from '../context.js';

/**
 * Options for `wireguard add-peer`
 */
export interface AddPeerCommandOptions extends GlobalOptions {
  interface?: string;
  name?: string;
  endpoint?: string;
  dns?: string;
  clientAllowedIps?: string;
  routeAll?: boolean;
  exportDir?: string;
  keepalive?: number;
  /** false when --no-psk is given */
  psk?: boolean;
  presharedKey?: string;
  nonInteractive?: boolean;
  /** false when --no-qr is given */
  qr?: boolean;
  /** false when --no-restart is given */
  restart?: boolean;
}

function presharedKeyPolicy(options: AddPeerCommandOptions): PresharedKeyPolicy | undefined {
  if (options.presharedKey !== undefined) {
    return { kind: 'supplied', key: options.presharedKey };
  }
  if (options.psk === false) {
    return { kind: 'none' };
  }
  return undefined;
}

/**
 * Map command-line flags onto add-peer options.
 */
export function toAddPeerOptions(options: AddPeerCommandOptions): AddPeerOptions {
  return {
    interfaceName: options.interface,
    peerName: options.name,
    endpoint: options.endpoint,
    dns: options.dns,
    clientAllowedIPs: options.clientAllowedIps,
    routeAll: options.routeAll,
    exportDir: options.exportDir,
    keepalive: options.keepalive,
    presharedKey: presharedKeyPolicy(options),
    nonInteractive: options.nonInteractive === true,
    skipQrCode: options.qr === false,
    skipServiceRestart: options.restart === false,
  };
}

/**
 * Execute `wireguard add-peer`.
 */
export async function addPeerCommand(options: AddPeerCommandOptions): Promise<void> {
  const ctx = createContext('wireguard add-peer', options, options.nonInteractive === true);
  const { logger } = ctx;

  try {
    const result = await addPeer(ctx, toAddPeerOptions(options));

    logger.setData({
      peer: result.peer.name,
      address: result.peer.address,
      publicKey: result.peer.publicKey,
      exportPath: result.exportPath,
      serverConfigPath: result.serverConfigPath,
    });

    finish(logger);
  } catch (error) {
    handleError(logger, error);
  }
}
