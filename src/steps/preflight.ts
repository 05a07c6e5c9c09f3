/**
 * Pre-flight Check
 *
 * Verifies the host can run the remaining steps: an rpm-ostree system, a
 * container runtime and sudo. Optional packages are reported only.
 */

import { PreflightError, describeError } from '../core/errors.js';
import type { StepContext } from '../core/types.js';
import { CONFIG_KEYS } from '../state/keys.js';
import { commandExists } from '../system/executor.js';

/**
 * Packages used by optional steps.
 */
export const OPTIONAL_PACKAGES = ['nfs-utils', 'wireguard-tools'] as const;

const RUNTIMES = ['docker', 'podman'] as const;

async function detectRuntime(ctx: StepContext): Promise<string> {
  const preferred = await ctx.store.getOrDefault(CONFIG_KEYS.containerRuntime);
  const candidates = [preferred, ...RUNTIMES.filter((runtime) => runtime !== preferred)];
  for (const runtime of candidates) {
    if (await commandExists(ctx.runner, runtime)) {
      return runtime;
    }
  }
  throw new PreflightError(
    'No container runtime found (docker or podman)',
    'Install one with: sudo rpm-ostree install docker && sudo systemctl reboot'
  );
}

async function isRpmOstreeHost(ctx: StepContext): Promise<boolean> {
  if (!(await commandExists(ctx.runner, 'rpm-ostree'))) {
    return false;
  }
  const status = await ctx.runner.run('rpm-ostree', ['status']);
  return status.exitCode === 0;
}

async function reportOptionalPackages(ctx: StepContext): Promise<void> {
  for (const pkg of OPTIONAL_PACKAGES) {
    try {
      const result = await ctx.runner.run('rpm', ['-q', pkg]);
      if (result.exitCode === 0) {
        ctx.logger.success(`${pkg} is installed`);
      } else {
        ctx.logger.info(`${pkg} is not installed (optional): sudo rpm-ostree install ${pkg}`);
      }
    } catch (error) {
      ctx.logger.warning(`Could not check ${pkg}: ${describeError(error)}`);
    }
  }
}

/**
 * The `preflight` step.
 */
export async function runPreflight(ctx: StepContext): Promise<void> {
  const { runner, store, logger } = ctx;

  if (!(await isRpmOstreeHost(ctx))) {
    throw new PreflightError(
      'This system does not appear to be running rpm-ostree',
      'These steps target rpm-ostree based hosts such as uCore.'
    );
  }
  logger.success('rpm-ostree system detected');

  const runtime = await detectRuntime(ctx);
  await store.set(CONFIG_KEYS.containerRuntime, runtime);
  logger.success(`Container runtime: ${runtime}`);

  const sudo = await runner.run('sudo', ['-n', 'true']);
  if (sudo.exitCode === 0) {
    logger.success('Passwordless sudo is configured');
  } else {
    logger.warning('sudo requires a password; later steps will prompt for it');
  }

  await reportOptionalPackages(ctx);
}
