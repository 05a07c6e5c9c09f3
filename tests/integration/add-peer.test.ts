/**
 * Integration tests for `wireguard add-peer`
 *
 * Creates the interface with the WireGuard step, then adds peers through the
 * same option mapping the command line uses.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';

import { toAddPeerOptions } from '../../src/cli/commands/wireguard.js';
import type { StepContext } from '../../src/core/types.js';
import { Logger } from '../../src/lib/logger.js';
import { NonInteractivePrompter } from '../../src/prompt/non-interactive.js';
import { StepRunner } from '../../src/steps/orchestrator.js';
import { addPeer } from '../../src/wireguard/peer.js';
import { parseServerConfig, usedPeerAddresses } from '../../src/wireguard/parse.js';
import { createStore, createTempDir, removeTempDir } from '../helpers/context.js';
import { FakeKeyGenerator, RecordingCommandRunner, fakeKey, fakePublicKeyFor } from '../helpers/fakes.js';

interface UnattendedContext extends StepContext {
  runner: RecordingCommandRunner;
  keygen: FakeKeyGenerator;
}

function unattendedContext(tempDir: string): UnattendedContext {
  const logger = new Logger('json');
  return {
    store: createStore(tempDir),
    prompter: new NonInteractivePrompter(logger),
    runner: new RecordingCommandRunner(),
    keygen: new FakeKeyGenerator(),
    logger,
    nonInteractive: true,
    now: () => new Date('2024-05-01T12:00:00Z'),
  };
}

describe('wireguard add-peer', () => {
  let tempDir: string;
  let configDir: string;
  let exportDir: string;
  let ctx: UnattendedContext;

  beforeEach(async () => {
    tempDir = await createTempDir();
    configDir = join(tempDir, 'wireguard');
    exportDir = join(tempDir, 'export');
    ctx = unattendedContext(tempDir);
    await ctx.store.setMany({ WIREGUARD_ENABLED: 'true', WIREGUARD_CONFIG_DIR: configDir });
    await new StepRunner(ctx).runStep('wireguard');
    ctx.runner.calls.length = 0;
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('should add peers to the interface created by the setup step', async () => {
    const flags = { endpoint: 'vpn.example.com:51820', exportDir, nonInteractive: true, qr: false };

    const laptop = await addPeer(ctx, toAddPeerOptions({ ...flags, name: 'laptop' }));
    const phone = await addPeer(ctx, toAddPeerOptions({ ...flags, name: 'phone', psk: false }));

    assert.strictEqual(laptop.peer.address, '10.253.0.2');
    assert.strictEqual(phone.peer.address, '10.253.0.3');

    const server = await readFile(join(configDir, 'wg0.conf'), 'utf-8');
    assert.strictEqual(
      server,
      [
        '[Interface]',
        'Address = 10.253.0.1/24',
        'ListenPort = 51820',
        `PrivateKey = ${fakeKey(1)}`,
        '',
        '# Peer: laptop',
        '[Peer]',
        `PublicKey = ${fakePublicKeyFor(fakeKey(2))}`,
        `PresharedKey = ${fakeKey(101)}`,
        'AllowedIPs = 10.253.0.2/32',
        'PersistentKeepalive = 25',
        '',
        '# Peer: phone',
        '[Peer]',
        `PublicKey = ${fakePublicKeyFor(fakeKey(3))}`,
        'AllowedIPs = 10.253.0.3/32',
        'PersistentKeepalive = 25',
        '',
      ].join('\n')
    );
    assert.deepStrictEqual(usedPeerAddresses(parseServerConfig(server)), ['10.253.0.2', '10.253.0.3']);
    assert.deepStrictEqual((await readdir(exportDir)).sort(), ['laptop.conf', 'phone.conf']);
  });

  it('should point clients at the server key written by the setup step', async () => {
    const result = await addPeer(
      ctx,
      toAddPeerOptions({ name: 'laptop', endpoint: 'vpn.example.com:51820', exportDir, qr: false, restart: false })
    );

    assert.ok(result.clientConfig.includes(`PublicKey = ${fakePublicKeyFor(fakeKey(1))}\n`));
    assert.deepStrictEqual(ctx.keygen.calls, ['genkey', 'pubkey', 'genkey', 'pubkey', 'genpsk']);
  });

  it('should restart the interface by default', async () => {
    await addPeer(ctx, toAddPeerOptions({ name: 'laptop', endpoint: 'vpn.example.com:51820', exportDir, qr: false }));

    assert.deepStrictEqual(ctx.runner.lines(), ['sudo systemctl restart wg-quick@wg0.service']);
  });

  it('should keep the step marked complete', async () => {
    const result = await addPeer(
      ctx,
      toAddPeerOptions({ name: 'laptop', endpoint: 'vpn.example.com:51820', exportDir, qr: false, restart: false })
    );

    assert.strictEqual(result.markedComplete, false);
    assert.deepStrictEqual(await ctx.store.listMarkers(), ['wireguard-setup-complete']);
  });

  it('should export to a timestamped file when the name is taken', async () => {
    const flags = { name: 'laptop', endpoint: 'vpn.example.com:51820', exportDir, qr: false, restart: false };

    await addPeer(ctx, toAddPeerOptions(flags));
    const second = await addPeer(ctx, toAddPeerOptions(flags));

    assert.strictEqual(second.exportPath, join(exportDir, 'laptop-1714564800.conf'));
  });

  it('should fail without an endpoint and leave the server config unchanged', async () => {
    const before = await readFile(join(configDir, 'wg0.conf'), 'utf-8');

    await assert.rejects(
      addPeer(ctx, toAddPeerOptions({ name: 'laptop', exportDir, nonInteractive: true })),
      { message: 'Server endpoint is required' }
    );

    assert.strictEqual(await readFile(join(configDir, 'wg0.conf'), 'utf-8'), before);
    assert.strictEqual(await ctx.store.get('WIREGUARD_LAST_PEER_OFFSET_wg0'), '0');
  });
});
