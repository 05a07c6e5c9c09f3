/**
 * Container Setup
 *
 * Chooses the container runtime and the service stacks to deploy, and
 * records the environment shared by every stack.
 */

import { ValidationError } from '../core/errors.js';
import type { StepContext } from '../core/types.js';
import { CONFIG_KEYS } from '../state/keys.js';
import { splitList } from './validation.js';

/**
 * Service stacks offered by the container and directory steps.
 */
export const AVAILABLE_SERVICES = ['media', 'web', 'cloud'] as const;

export const CONTAINER_RUNTIMES = ['docker', 'podman'] as const;

export const DEFAULT_APPDATA_PATH = '/var/lib/containers/appdata';

/**
 * Services currently recorded in SELECTED_SERVICES.
 */
export async function getSelectedServices(ctx: StepContext): Promise<string[]> {
  return splitList(await ctx.store.getOrDefault(CONFIG_KEYS.selectedServices, ''));
}

/**
 * The `container` step.
 */
export async function runContainerSetup(ctx: StepContext): Promise<void> {
  const { store, prompter, logger } = ctx;

  const storedRuntime = await store.getOrDefault(CONFIG_KEYS.containerRuntime);
  const runtimeIndex = Math.max(0, CONTAINER_RUNTIMES.findIndex((runtime) => runtime === storedRuntime));
  const runtime = await prompter.select('Container runtime', CONTAINER_RUNTIMES, runtimeIndex);

  const services = await prompter.multiSelect(
    'Select service stacks to deploy',
    AVAILABLE_SERVICES,
    await getSelectedServices(ctx)
  );
  if (services.length === 0) {
    throw new ValidationError(
      'At least one service must be selected',
      'services',
      `Choose from: ${AVAILABLE_SERVICES.join(', ')}`
    );
  }

  const env = {
    [CONFIG_KEYS.envPuid]: await store.getOrDefault(CONFIG_KEYS.puid, '1000'),
    [CONFIG_KEYS.envPgid]: await store.getOrDefault(CONFIG_KEYS.pgid, '1000'),
    [CONFIG_KEYS.envTz]: await store.getOrDefault(CONFIG_KEYS.timezone, 'UTC'),
    [CONFIG_KEYS.envAppdataPath]: await store.getOrDefault(CONFIG_KEYS.envAppdataPath, DEFAULT_APPDATA_PATH),
  };

  await store.setMany({
    [CONFIG_KEYS.containerRuntime]: runtime,
    [CONFIG_KEYS.selectedServices]: services.join(','),
    ...env,
  });

  logger.success(`Runtime ${runtime}, services: ${services.join(', ')}`);
}
