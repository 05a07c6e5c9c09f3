/**
 * Unit tests for the user step
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';

import { runUserSetup } from '../../../src/steps/user.js';
import { ExternalCommandError, PreflightError, ValidationError } from '../../../src/core/errors.js';
import { createTempDir, createTestContext, removeTempDir } from '../../helpers/context.js';

describe('runUserSetup', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('should record an existing stored user without asking for a name', async () => {
    const ctx = createTestContext(tempDir, { answers: ['Europe/Berlin'] });
    await ctx.store.set('HOMELAB_USER', 'alice');
    ctx.runner.on('id -u alice', { stdout: '1001\n' }).on('id -g alice', { stdout: '1002\n' });

    await runUserSetup(ctx);

    assert.deepStrictEqual(ctx.prompter.asked, ['Timezone']);
    assert.deepStrictEqual(ctx.runner.lines(), ['id -u alice', 'id -u alice', 'id -g alice']);
    assert.deepStrictEqual(await ctx.store.getAll(), {
      HOMELAB_USER: 'alice',
      PUID: '1001',
      PGID: '1002',
      TZ: 'Europe/Berlin',
    });
  });

  it('should ask for the username and default the timezone to UTC', async () => {
    const ctx = createTestContext(tempDir, { answers: ['homelab', ''] });
    ctx.runner.on('id -u homelab', { stdout: '1000\n' }).on('id -g homelab', { stdout: '1000\n' });

    await runUserSetup(ctx);

    assert.deepStrictEqual(ctx.prompter.asked, ['Homelab username (Enter for the current user)', 'Timezone']);
    assert.strictEqual(await ctx.store.get('HOMELAB_USER'), 'homelab');
    assert.strictEqual(await ctx.store.get('TZ'), 'UTC');
  });

  it('should create a missing user when confirmed', async () => {
    const ctx = createTestContext(tempDir, { answers: ['bob', true, 'UTC'] });
    ctx.runner
      .once('id -u bob', { exitCode: 1, stderr: 'id: bob: no such user' })
      .on('id -u bob', { stdout: '1003\n' })
      .on('id -g bob', { stdout: '1003\n' });

    await runUserSetup(ctx);

    assert.deepStrictEqual(ctx.runner.lines(), ['id -u bob', 'sudo useradd -m bob', 'id -u bob', 'id -g bob']);
    assert.strictEqual(await ctx.store.get('PUID'), '1003');
  });

  it('should fail when creating a missing user is declined', async () => {
    const ctx = createTestContext(tempDir, { answers: ['bob', false] });
    ctx.runner.on('id -u bob', { exitCode: 1 });

    await assert.rejects(
      runUserSetup(ctx),
      (error: unknown) =>
        error instanceof PreflightError && error.message === 'User bob does not exist and was not created'
    );
    assert.deepStrictEqual(ctx.runner.lines(), ['id -u bob']);
    assert.strictEqual(await ctx.store.exists('HOMELAB_USER'), false);
  });

  it('should surface a failed useradd', async () => {
    const ctx = createTestContext(tempDir, { answers: ['bob', true] });
    ctx.runner.on('id -u bob', { exitCode: 1 }).on('sudo useradd -m bob', { exitCode: 9 });

    await assert.rejects(runUserSetup(ctx), ExternalCommandError);
  });

  it('should reject an invalid username before running commands', async () => {
    const ctx = createTestContext(tempDir, { answers: ['bad name'] });

    await assert.rejects(runUserSetup(ctx), ValidationError);
    assert.deepStrictEqual(ctx.runner.lines(), []);
  });

  it('should reject an invalid timezone without storing anything', async () => {
    const ctx = createTestContext(tempDir, { answers: ['alice', 'Not A Zone'] });
    ctx.runner.on('id -u alice', { stdout: '1001\n' }).on('id -g alice', { stdout: '1001\n' });

    await assert.rejects(runUserSetup(ctx), { message: 'Invalid timezone: Not A Zone' });
    assert.deepStrictEqual(await ctx.store.getAll(), {});
  });
});
