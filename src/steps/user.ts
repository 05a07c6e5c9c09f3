/**
 * User Setup
 *
 * Resolves the account that owns the homelab directories and containers,
 * creating it if needed, and records its UID, GID and timezone.
 */

import { userInfo } from 'node:os';

import { PreflightError } from '../core/errors.js';
import type { StepContext } from '../core/types.js';
import { CONFIG_KEYS } from '../state/keys.js';
import { runChecked } from '../system/executor.js';
import { validateTimezone, validateUsername } from './validation.js';

async function resolveUsername(ctx: StepContext): Promise<string> {
  const stored = (await ctx.store.getOrDefault(CONFIG_KEYS.homelabUser, '')).trim();
  if (stored !== '') {
    validateUsername(stored);
    ctx.logger.info(`Using configured homelab user: ${stored}`);
    return stored;
  }

  const username = await ctx.prompter.input('Homelab username (Enter for the current user)', {
    defaultValue: userInfo().username,
  });
  validateUsername(username);
  return username;
}

async function ensureUserExists(ctx: StepContext, username: string): Promise<void> {
  const probe = await ctx.runner.run('id', ['-u', username]);
  if (probe.exitCode === 0) {
    ctx.logger.info(`User ${username} already exists`);
    return;
  }

  const create = await ctx.prompter.confirm(`User ${username} does not exist. Create it?`, true);
  if (!create) {
    throw new PreflightError(`User ${username} does not exist and was not created`);
  }
  await runChecked(ctx.runner, 'sudo', ['useradd', '-m', username]);
  ctx.logger.success(`User ${username} created`);
}

/**
 * The `user` step.
 */
export async function runUserSetup(ctx: StepContext): Promise<void> {
  const { runner, store, prompter, logger } = ctx;

  const username = await resolveUsername(ctx);
  await ensureUserExists(ctx, username);

  const uid = (await runChecked(runner, 'id', ['-u', username])).stdout.trim();
  const gid = (await runChecked(runner, 'id', ['-g', username])).stdout.trim();
  logger.success(`User ${username} (UID ${uid}, GID ${gid})`);

  const timezone = await prompter.input('Timezone', {
    defaultValue: await store.getOrDefault(CONFIG_KEYS.timezone, 'UTC'),
  });
  validateTimezone(timezone);

  await store.setMany({
    [CONFIG_KEYS.homelabUser]: username,
    [CONFIG_KEYS.puid]: uid,
    [CONFIG_KEYS.pgid]: gid,
    [CONFIG_KEYS.timezone]: timezone,
  });
}
