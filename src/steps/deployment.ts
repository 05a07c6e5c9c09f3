/**
 * Service Deployment
 *
 * Pulls images for each selected stack and enables its compose unit.
 */

import { join } from 'node:path';

import { PreflightError, describeError } from '../core/errors.js';
import type { StepContext } from '../core/types.js';
import { CONFIG_KEYS } from '../state/keys.js';
import { runChecked } from '../system/executor.js';
import { getSelectedServices } from './container.js';

/**
 * systemd unit that runs a stack's compose project.
 */
export function composeUnitName(runtime: string, service: string): string {
  const prefix = runtime === 'podman' ? 'podman-compose' : 'docker-compose';
  return `${prefix}-${service}.service`;
}

async function pullImages(ctx: StepContext, runtime: string, service: string, serviceDir: string): Promise<void> {
  try {
    const result = await ctx.runner.run(runtime, ['compose', 'pull'], { cwd: serviceDir });
    if (result.exitCode === 0) {
      ctx.logger.success(`Images pulled for ${service}`);
    } else {
      ctx.logger.warning(`Image pull for ${service} exited with code ${result.exitCode}; continuing`);
    }
  } catch (error) {
    ctx.logger.warning(`Image pull for ${service} failed: ${describeError(error)}`);
  }
}

/**
 * The `deployment` step.
 */
export async function runDeployment(ctx: StepContext): Promise<void> {
  const { store, runner, logger } = ctx;

  const services = await getSelectedServices(ctx);
  if (services.length === 0) {
    throw new PreflightError('No services selected', "Run 'homelab-setup run container' first.");
  }

  const runtime = await store.getOrDefault(CONFIG_KEYS.containerRuntime);
  const containersBase = await store.getOrDefault(CONFIG_KEYS.containersBase);

  for (const service of services) {
    logger.info(`Deploying ${service}`);
    await pullImages(ctx, runtime, service, join(containersBase, service));

    const unit = composeUnitName(runtime, service);
    await runChecked(runner, 'sudo', ['systemctl', 'enable', '--now', unit]);
    logger.success(`Service ${unit} enabled`);
  }
}
