/**
 * Configuration Keys
 *
 * Names of every key persisted in the configuration file, and the defaults
 * consulted by ConfigStore.getOrDefault.
 */

export const CONFIG_KEYS = {
  configVersion: 'CONFIG_VERSION',

  homelabUser: 'HOMELAB_USER',
  puid: 'PUID',
  pgid: 'PGID',
  timezone: 'TZ',

  baseDir: 'HOMELAB_BASE_DIR',
  containersBase: 'CONTAINERS_BASE',
  containerRuntime: 'CONTAINER_RUNTIME',
  selectedServices: 'SELECTED_SERVICES',
  envPuid: 'ENV_PUID',
  envPgid: 'ENV_PGID',
  envTz: 'ENV_TZ',
  envAppdataPath: 'ENV_APPDATA_PATH',

  nfsEnabled: 'NFS_ENABLED',
  nfsServer: 'NFS_SERVER',
  nfsExport: 'NFS_EXPORT',
  nfsMountPoint: 'NFS_MOUNT_POINT',

  wireguardEnabled: 'WIREGUARD_ENABLED',
  wireguardConfigDir: 'WIREGUARD_CONFIG_DIR',
  wireguardInterface: 'WIREGUARD_INTERFACE',
  wireguardAddress: 'WIREGUARD_ADDRESS',
  wireguardListenPort: 'WIREGUARD_LISTEN_PORT',
  wireguardPublicKey: 'WIREGUARD_PUBLIC_KEY',
  wireguardEndpoint: 'WIREGUARD_ENDPOINT',
  wireguardPeerDns: 'WIREGUARD_PEER_DNS',
  wireguardExportDir: 'WIREGUARD_EXPORT_DIR',
} as const;

export type ConfigKey = (typeof CONFIG_KEYS)[keyof typeof CONFIG_KEYS];

/**
 * Values returned by getOrDefault when a key has not been stored.
 */
export const DEFAULTS: Readonly<Partial<Record<ConfigKey, string>>> = {
  [CONFIG_KEYS.configVersion]: '1',
  [CONFIG_KEYS.containersBase]: '/srv/containers',
  [CONFIG_KEYS.containerRuntime]: 'docker',
  [CONFIG_KEYS.nfsMountPoint]: '/mnt/nas',
  [CONFIG_KEYS.wireguardConfigDir]: '/etc/wireguard',
  [CONFIG_KEYS.wireguardInterface]: 'wg0',
  [CONFIG_KEYS.wireguardAddress]: '10.253.0.1/24',
  [CONFIG_KEYS.wireguardListenPort]: '51820',
};

/**
 * Key tracking the last allocated host offset for an interface.
 */
export function peerOffsetKey(interfaceName: string): string {
  return `WIREGUARD_LAST_PEER_OFFSET_${interfaceName}`;
}

/**
 * Key recording which network the interface's peer offset was counted in.
 */
export function peerNetworkKey(interfaceName: string): string {
  return `WIREGUARD_LAST_PEER_NETWORK_${interfaceName}`;
}

/**
 * Look up the built-in default for a key.
 */
export function defaultFor(key: string): string | undefined {
  for (const [name, value] of Object.entries(DEFAULTS)) {
    if (name === key) {
      return value;
    }
  }
  return undefined;
}

/**
 * Completion marker names.
 */
export const MARKERS = {
  preflight: 'preflight-complete',
  user: 'user-setup-complete',
  directory: 'directory-setup-complete',
  wireguard: 'wireguard-setup-complete',
  nfs: 'nfs-setup-complete',
  container: 'container-setup-complete',
  deployment: 'service-deployment-complete',
} as const;

/**
 * Marker names written by older releases of the WireGuard step.
 */
export const LEGACY_WIREGUARD_MARKERS = ['wireguard-configured', 'wireguard-skipped'] as const;
