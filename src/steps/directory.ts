/**
 * Directory Setup
 *
 * Creates the base directory tree and one directory per service stack,
 * owned by the homelab user.
 */

import { join } from 'node:path';

import { PreflightError } from '../core/errors.js';
import type { StepContext } from '../core/types.js';
import { CONFIG_KEYS } from '../state/keys.js';
import { runChecked } from '../system/executor.js';
import { AVAILABLE_SERVICES, getSelectedServices } from './container.js';
import { validateSafePath } from './validation.js';

export const DEFAULT_BASE_DIR = '/srv/containers';

const BASE_SUBDIRECTORIES = ['config', 'data', 'compose'] as const;
const SERVICE_SUBDIRECTORIES = ['config', 'data'] as const;

/**
 * Every directory created for a base directory and service list, parents first.
 */
export function plannedDirectories(baseDir: string, services: readonly string[]): string[] {
  const dirs = [baseDir, ...BASE_SUBDIRECTORIES.map((sub) => join(baseDir, sub))];
  for (const service of services) {
    const serviceDir = join(baseDir, service);
    dirs.push(serviceDir, ...SERVICE_SUBDIRECTORIES.map((sub) => join(serviceDir, sub)));
  }
  return dirs;
}

/**
 * The `directory` step.
 */
export async function runDirectorySetup(ctx: StepContext): Promise<void> {
  const { store, prompter, runner, logger } = ctx;

  const user = await store.getOrDefault(CONFIG_KEYS.homelabUser, '');
  if (user === '') {
    throw new PreflightError('Homelab user is not configured', "Run 'homelab-setup run user' first.");
  }

  const baseDir = await prompter.input('Base directory for homelab services', {
    defaultValue: await store.getOrDefault(CONFIG_KEYS.baseDir, DEFAULT_BASE_DIR),
  });
  validateSafePath(baseDir, 'baseDir');

  const services = await prompter.multiSelect(
    'Create directories for which services?',
    AVAILABLE_SERVICES,
    await getSelectedServices(ctx)
  );

  const dirs = plannedDirectories(baseDir, services);
  await runChecked(runner, 'sudo', ['mkdir', '-p', ...dirs]);
  await runChecked(runner, 'sudo', ['chown', '-R', `${user}:${user}`, baseDir]);
  logger.success(`Created ${dirs.length} directories under ${baseDir}`);

  await store.setMany({
    [CONFIG_KEYS.baseDir]: baseDir,
    [CONFIG_KEYS.containersBase]: baseDir,
  });
}
