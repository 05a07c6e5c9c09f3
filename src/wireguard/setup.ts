/**
 * WireGuard Setup Step
 *
 * Creates the server interface: key pair, address, listen port and the
 * `<dir>/<iface>.conf` file, then optionally enables the service and adds
 * peers.
 */

import { PreflightError, describeError } from '../core/errors.js';
import type { StepContext } from '../core/types.js';
import { getInterfaceConfigPath } from '../lib/paths.js';
import { CONFIG_KEYS, peerNetworkKey, peerOffsetKey } from '../state/keys.js';
import { commandExists, runChecked } from '../system/executor.js';
import { formatNetwork, hostCapacity, parseIPv4Cidr } from './address.js';
import { generateKeyPair } from './keys.js';
import { addPeer, parsePort, validateInterfaceName } from './peer.js';
import { renderServerConfig } from './render.js';
import type { WireGuardInterface } from './types.js';

/**
 * Build an interface record, validating address and port.
 *
 * @throws ValidationError for a bad name, CIDR or port
 */
export function createInterface(
  name: string,
  address: string,
  listenPort: string,
  privateKey: string,
  publicKey: string
): WireGuardInterface {
  validateInterfaceName(name);
  parseIPv4Cidr(address, 'address');
  return {
    name,
    address,
    listenPort: parsePort(listenPort, 'listenPort'),
    privateKey,
    publicKey,
    peers: [],
  };
}

async function enableService(ctx: StepContext, interfaceName: string): Promise<void> {
  const service = `wg-quick@${interfaceName}.service`;
  const enable = await ctx.prompter.confirm(`Enable and start ${service} now?`, true);
  if (!enable) {
    ctx.logger.info(`Enable later with: sudo systemctl enable --now ${service}`);
    return;
  }
  try {
    await runChecked(ctx.runner, 'sudo', ['systemctl', 'enable', '--now', service]);
    ctx.logger.success(`Service ${service} enabled`);
  } catch (error) {
    ctx.logger.warning(`Failed to enable ${service}: ${describeError(error)}`);
  }
}

async function addPeersLoop(ctx: StepContext, interfaceName: string): Promise<void> {
  if (ctx.nonInteractive) {
    return;
  }
  let another = await ctx.prompter.confirm('Do you want to add peers now?', false);
  while (another) {
    // Peer failures only warn: the interface file is already written.
    try {
      const result = await addPeer(ctx, { interfaceName, skipServiceRestart: true });
      ctx.logger.info(`Peer ${result.peer.name} exported to ${result.exportPath}`);
    } catch (error) {
      ctx.logger.warning(`Failed to add peer: ${describeError(error)}`);
      ctx.logger.info("Add it later with 'homelab-setup wireguard add-peer'");
    }
    another = await ctx.prompter.confirm('Add another peer?', false);
  }
}

/**
 * The `wireguard` step.
 */
export async function runWireGuardSetup(ctx: StepContext): Promise<void> {
  const { store, prompter, runner, keygen, logger } = ctx;

  const enabledByDefault = (await store.getOrDefault(CONFIG_KEYS.wireguardEnabled, 'false')) === 'true';
  const useWireGuard = await prompter.confirm('Do you want to configure WireGuard?', enabledByDefault);
  if (!useWireGuard) {
    logger.info('Skipping WireGuard configuration');
    await store.set(CONFIG_KEYS.wireguardEnabled, 'false');
    return;
  }

  if (!(await commandExists(runner, 'wg'))) {
    throw new PreflightError(
      'wg command not available',
      'Install wireguard-tools: sudo rpm-ostree install wireguard-tools && sudo systemctl reboot'
    );
  }

  const keys = await generateKeyPair(keygen);
  logger.success('Keys generated');
  logger.info(`Public key (share with peers): ${keys.publicKey}`);

  const name = await prompter.input('Interface name', {
    defaultValue: await store.getOrDefault(CONFIG_KEYS.wireguardInterface),
  });
  const address = await prompter.input('Interface IP address (CIDR notation)', {
    defaultValue: await store.getOrDefault(CONFIG_KEYS.wireguardAddress),
  });
  const port = await prompter.input('Listen port', {
    defaultValue: await store.getOrDefault(CONFIG_KEYS.wireguardListenPort),
  });

  const iface = createInterface(name, address, port, keys.privateKey, keys.publicKey);
  const configDir = await store.getOrDefault(CONFIG_KEYS.wireguardConfigDir);
  const configPath = getInterfaceConfigPath(configDir, iface.name);

  await store.writeFileAtomic(configPath, renderServerConfig(iface), 0o600);
  logger.success(`Configuration written to ${configPath}`);
  const subnet = parseIPv4Cidr(iface.address);
  logger.info(`Subnet ${formatNetwork(subnet)} has room for ${Math.max(0, hostCapacity(subnet) - 1)} peers`);

  await store.setMany({
    [CONFIG_KEYS.wireguardEnabled]: 'true',
    [CONFIG_KEYS.wireguardInterface]: iface.name,
    [CONFIG_KEYS.wireguardAddress]: iface.address,
    [CONFIG_KEYS.wireguardListenPort]: String(iface.listenPort),
    [CONFIG_KEYS.wireguardPublicKey]: iface.publicKey,
    // A freshly written interface has no peers.
    [peerOffsetKey(iface.name)]: '0',
    [peerNetworkKey(iface.name)]: formatNetwork(subnet),
  });

  await enableService(ctx, iface.name);
  await addPeersLoop(ctx, iface.name);

  logger.success(`WireGuard interface ${iface.name} configured (${iface.address}, port ${iface.listenPort})`);
}
