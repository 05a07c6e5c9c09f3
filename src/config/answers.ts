/**
 * Answers Application
 *
 * Copies answers into the configuration store so that steps find them as
 * stored values and prompt defaults.
 */

import type { ConfigStore } from '../state/store.js';
import { CONFIG_KEYS } from '../state/keys.js';
import type { AnswersFile } from './types.js';

function flag(value: boolean): string {
  return value ? 'true' : 'false';
}

/**
 * Translate answers into configuration entries. Absent fields produce no entry.
 */
export function answersToEntries(answers: AnswersFile): Record<string, string> {
  const entries: Record<string, string> = {};
  const put = (key: string, value: string | undefined): void => {
    if (value !== undefined) {
      entries[key] = value;
    }
  };

  const { user, directories, nfs, containers, wireguard } = answers;

  put(CONFIG_KEYS.homelabUser, user?.name);
  put(CONFIG_KEYS.timezone, user?.timezone);

  put(CONFIG_KEYS.baseDir, directories?.base);

  put(CONFIG_KEYS.nfsEnabled, nfs?.enabled === undefined ? undefined : flag(nfs.enabled));
  put(CONFIG_KEYS.nfsServer, nfs?.server);
  put(CONFIG_KEYS.nfsExport, nfs?.export);
  put(CONFIG_KEYS.nfsMountPoint, nfs?.mount_point);

  put(CONFIG_KEYS.containerRuntime, containers?.runtime);
  put(CONFIG_KEYS.selectedServices, containers?.services?.join(','));

  put(CONFIG_KEYS.wireguardEnabled, wireguard?.enabled === undefined ? undefined : flag(wireguard.enabled));
  put(CONFIG_KEYS.wireguardConfigDir, wireguard?.config_dir);
  put(CONFIG_KEYS.wireguardInterface, wireguard?.interface);
  put(CONFIG_KEYS.wireguardAddress, wireguard?.address);
  put(
    CONFIG_KEYS.wireguardListenPort,
    wireguard?.listen_port === undefined ? undefined : String(wireguard.listen_port)
  );
  put(CONFIG_KEYS.wireguardEndpoint, wireguard?.endpoint);
  put(CONFIG_KEYS.wireguardPeerDns, wireguard?.peer_dns);
  put(CONFIG_KEYS.wireguardExportDir, wireguard?.export_dir);

  return entries;
}

/**
 * Store every answered value in one save.
 *
 * @returns The keys written, sorted
 */
export async function applyAnswers(store: ConfigStore, answers: AnswersFile): Promise<string[]> {
  const entries = answersToEntries(answers);
  const keys = Object.keys(entries).sort();
  if (keys.length > 0) {
    await store.setMany(entries);
  }
  return keys;
}
