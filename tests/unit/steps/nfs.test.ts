/**
 * Unit tests for the NFS step
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';

import { runNfsSetup } from '../../../src/steps/nfs.js';
import { ValidationError } from '../../../src/core/errors.js';
import { createTempDir, createTestContext, removeTempDir } from '../../helpers/context.js';

describe('runNfsSetup', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('should record that NFS is disabled when declined', async () => {
    const ctx = createTestContext(tempDir, { answers: [false] });

    await runNfsSetup(ctx);

    assert.deepStrictEqual(await ctx.store.getAll(), { NFS_ENABLED: 'false' });
    assert.deepStrictEqual(ctx.runner.lines(), []);
  });

  it('should store the export and create the default mount point', async () => {
    const ctx = createTestContext(tempDir, { answers: [true, '192.168.1.10', '/volume1/homelab', ''] });

    await runNfsSetup(ctx);

    assert.deepStrictEqual(ctx.runner.lines(), ['sudo mkdir -p /mnt/nas']);
    assert.deepStrictEqual(await ctx.store.getAll(), {
      NFS_ENABLED: 'true',
      NFS_SERVER: '192.168.1.10',
      NFS_EXPORT: '/volume1/homelab',
      NFS_MOUNT_POINT: '/mnt/nas',
    });
  });

  it('should offer stored values as defaults', async () => {
    const ctx = createTestContext(tempDir, { answers: [true, '', '', ''] });
    await ctx.store.setMany({
      NFS_ENABLED: 'true',
      NFS_SERVER: 'nas.local',
      NFS_EXPORT: '/export/media',
      NFS_MOUNT_POINT: '/mnt/media',
    });

    await runNfsSetup(ctx);

    assert.deepStrictEqual(ctx.runner.lines(), ['sudo mkdir -p /mnt/media']);
    assert.strictEqual(await ctx.store.get('NFS_SERVER'), 'nas.local');
    assert.strictEqual(await ctx.store.get('NFS_EXPORT'), '/export/media');
  });

  it('should reject an invalid server', async () => {
    const ctx = createTestContext(tempDir, { answers: [true, 'bad_host!'] });

    await assert.rejects(
      runNfsSetup(ctx),
      (error: unknown) => error instanceof ValidationError && error.field === 'nfsServer'
    );
    assert.deepStrictEqual(ctx.runner.lines(), []);
  });

  it('should reject a relative export path', async () => {
    const ctx = createTestContext(tempDir, { answers: [true, 'nas.local', 'volume1'] });

    await assert.rejects(runNfsSetup(ctx), { message: 'Path must be absolute: volume1' });
  });

  it('should reject an unsafe mount point', async () => {
    const ctx = createTestContext(tempDir, { answers: [true, 'nas.local', '/volume1', '/mnt/nas;reboot'] });

    await assert.rejects(runNfsSetup(ctx), ValidationError);
    assert.deepStrictEqual(ctx.runner.lines(), []);
    assert.strictEqual(await ctx.store.exists('NFS_ENABLED'), false);
  });
});
