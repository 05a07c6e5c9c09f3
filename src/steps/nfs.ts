/**
 * NFS Setup
 *
 * Records the NAS export to mount and prepares the local mount point.
 */

import type { StepContext } from '../core/types.js';
import { CONFIG_KEYS } from '../state/keys.js';
import { runChecked } from '../system/executor.js';
import { validateHost, validatePath, validateSafePath } from './validation.js';

function storedDefault(value: string): string | undefined {
  return value === '' ? undefined : value;
}

/**
 * The `nfs` step.
 */
export async function runNfsSetup(ctx: StepContext): Promise<void> {
  const { store, prompter, runner, logger } = ctx;

  const enabledByDefault = (await store.getOrDefault(CONFIG_KEYS.nfsEnabled, 'false')) === 'true';
  const configure = await prompter.confirm('Do you want to configure NFS storage?', enabledByDefault);
  if (!configure) {
    logger.info('Skipping NFS configuration');
    await store.set(CONFIG_KEYS.nfsEnabled, 'false');
    return;
  }

  const server = await prompter.input('NFS server (IP address or hostname)', {
    defaultValue: storedDefault(await store.getOrDefault(CONFIG_KEYS.nfsServer, '')),
  });
  validateHost(server, 'nfsServer');

  const exportPath = await prompter.input('NFS export path', {
    defaultValue: storedDefault(await store.getOrDefault(CONFIG_KEYS.nfsExport, '')),
    placeholder: '/volume1/homelab',
  });
  validatePath(exportPath, 'nfsExport');

  const mountPoint = await prompter.input('Local mount point', {
    defaultValue: await store.getOrDefault(CONFIG_KEYS.nfsMountPoint),
  });
  validateSafePath(mountPoint, 'nfsMountPoint');

  await runChecked(runner, 'sudo', ['mkdir', '-p', mountPoint]);

  await store.setMany({
    [CONFIG_KEYS.nfsEnabled]: 'true',
    [CONFIG_KEYS.nfsServer]: server,
    [CONFIG_KEYS.nfsExport]: exportPath,
    [CONFIG_KEYS.nfsMountPoint]: mountPoint,
  });

  logger.success(`NFS export ${server}:${exportPath} will mount at ${mountPoint}`);
}
