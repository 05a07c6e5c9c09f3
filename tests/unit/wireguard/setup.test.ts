/**
 * Unit tests for the WireGuard setup step
 */

import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';

import { createInterface, runWireGuardSetup } from '../../../src/wireguard/setup.js';
import { PreflightError, ValidationError } from '../../../src/core/errors.js';
import { Logger } from '../../../src/lib/logger.js';
import { createTempDir, createTestContext, removeTempDir } from '../../helpers/context.js';
import { fakeKey, fakePublicKeyFor, type ScriptedAnswer } from '../../helpers/fakes.js';

describe('createInterface', () => {
  it('should build an interface with no peers', () => {
    const iface = createInterface('wg0', '10.253.0.1/24', '51820', fakeKey(1), fakeKey(2));

    assert.deepStrictEqual(iface, {
      name: 'wg0',
      address: '10.253.0.1/24',
      listenPort: 51820,
      privateKey: fakeKey(1),
      publicKey: fakeKey(2),
      peers: [],
    });
  });

  it('should reject a bad address or port', () => {
    assert.throws(() => createInterface('wg0', '10.253.0.1', '51820', fakeKey(1), fakeKey(2)), ValidationError);
    assert.throws(() => createInterface('wg0', '10.253.0.1/24', 'abc', fakeKey(1), fakeKey(2)), ValidationError);
  });
});

describe('runWireGuardSetup', () => {
  let tempDir: string;
  let configDir: string;

  async function setupContext(answers: ScriptedAnswer[]) {
    const ctx = createTestContext(tempDir, { answers, now: () => new Date('2024-05-01T12:00:00Z') });
    await ctx.store.setMany({
      WIREGUARD_CONFIG_DIR: configDir,
      WIREGUARD_EXPORT_DIR: join(tempDir, 'export'),
    });
    return ctx;
  }

  beforeEach(async () => {
    tempDir = await createTempDir();
    configDir = join(tempDir, 'wireguard');
  });

  afterEach(async () => {
    mock.restoreAll();
    await removeTempDir(tempDir);
  });

  it('should write the server config with defaults and enable the service', async () => {
    const ctx = await setupContext([true, '', '', '', true, false]);

    await runWireGuardSetup(ctx);

    const configPath = join(configDir, 'wg0.conf');
    assert.strictEqual(
      await readFile(configPath, 'utf-8'),
      ['[Interface]', 'Address = 10.253.0.1/24', 'ListenPort = 51820', `PrivateKey = ${fakeKey(1)}`, ''].join('\n')
    );
    assert.strictEqual((await stat(configPath)).mode & 0o777, 0o600);
    assert.deepStrictEqual(ctx.runner.lines(), ['which wg', 'sudo systemctl enable --now wg-quick@wg0.service']);
    assert.deepStrictEqual(ctx.prompter.asked, [
      'Do you want to configure WireGuard?',
      'Interface name',
      'Interface IP address (CIDR notation)',
      'Listen port',
      'Enable and start wg-quick@wg0.service now?',
      'Do you want to add peers now?',
    ]);
  });

  it('should store the interface settings', async () => {
    const ctx = await setupContext([true, 'wg1', '10.9.0.1/24', '51821', false, false]);

    await runWireGuardSetup(ctx);

    assert.strictEqual(await ctx.store.get('WIREGUARD_ENABLED'), 'true');
    assert.strictEqual(await ctx.store.get('WIREGUARD_INTERFACE'), 'wg1');
    assert.strictEqual(await ctx.store.get('WIREGUARD_ADDRESS'), '10.9.0.1/24');
    assert.strictEqual(await ctx.store.get('WIREGUARD_LISTEN_PORT'), '51821');
    assert.strictEqual(await ctx.store.get('WIREGUARD_PUBLIC_KEY'), fakePublicKeyFor(fakeKey(1)));
    assert.deepStrictEqual(ctx.runner.lines(), ['which wg']);
  });

  it('should report the public key and peer capacity', async () => {
    const log = mock.method(console, 'log', () => {});
    const ctx = await setupContext([true, '', '', '', false, false]);
    ctx.logger = new Logger('human');

    await runWireGuardSetup(ctx);

    const lines = log.mock.calls.map((call) => call.arguments[0]);
    assert.ok(lines.includes(`Public key (share with peers): ${fakePublicKeyFor(fakeKey(1))}`));
    assert.ok(lines.includes('Subnet 10.253.0.0/24 has room for 253 peers'));
  });

  it('should record the choice and stop when declined', async () => {
    const ctx = await setupContext([false]);

    await runWireGuardSetup(ctx);

    assert.strictEqual(await ctx.store.get('WIREGUARD_ENABLED'), 'false');
    assert.deepStrictEqual(ctx.runner.lines(), []);
    assert.deepStrictEqual(ctx.keygen.calls, []);
  });

  it('should fail without generating keys when wg is missing', async () => {
    const ctx = await setupContext([true]);
    ctx.runner.missing('wg');

    await assert.rejects(
      runWireGuardSetup(ctx),
      (error: unknown) => error instanceof PreflightError && error.message === 'wg command not available'
    );
    assert.deepStrictEqual(ctx.keygen.calls, []);
  });

  it('should reject an invalid listen port without writing a file', async () => {
    const ctx = await setupContext([true, '', '', 'abc']);

    await assert.rejects(runWireGuardSetup(ctx), ValidationError);
    await assert.rejects(stat(join(configDir, 'wg0.conf')), { code: 'ENOENT' });
  });

  it('should add peers until the operator stops', async () => {
    const ctx = await setupContext([
      true, '', '', '', false,
      true, 'laptop', 'vpn.example.com:51820', '', true, true,
      false,
    ]);

    await runWireGuardSetup(ctx);

    const server = await readFile(join(configDir, 'wg0.conf'), 'utf-8');
    assert.ok(server.includes('# Peer: laptop\n'));
    assert.ok(server.includes('AllowedIPs = 10.253.0.2/32\n'));
    const exported = await readFile(join(tempDir, 'export', 'laptop.conf'), 'utf-8');
    assert.ok(exported.startsWith(`[Interface]\nPrivateKey = ${fakeKey(2)}\n`));
    assert.strictEqual(ctx.prompter.remaining(), 0);
    assert.strictEqual(await ctx.store.isComplete('wireguard-setup-complete'), true);
  });

  it('should warn and keep going when adding a peer fails', async () => {
    const warn = mock.method(console, 'warn', () => {});
    mock.method(console, 'log', () => {});
    const ctx = await setupContext([
      true, '', '', '', false,
      true, 'laptop', 'no-port-here',
      false,
    ]);
    ctx.logger = new Logger('human');

    await runWireGuardSetup(ctx);

    assert.deepStrictEqual(
      warn.mock.calls.map((call) => call.arguments[0]),
      ["⚠ Failed to add peer: Invalid endpoint 'no-port-here': expected host:port"]
    );
    assert.strictEqual(ctx.prompter.asked.at(-1), 'Add another peer?');
    assert.strictEqual(ctx.prompter.remaining(), 0);
    assert.strictEqual(
      await readFile(join(configDir, 'wg0.conf'), 'utf-8'),
      ['[Interface]', 'Address = 10.253.0.1/24', 'ListenPort = 51820', `PrivateKey = ${fakeKey(1)}`, ''].join('\n')
    );
    assert.strictEqual(await ctx.store.get('WIREGUARD_LAST_PEER_OFFSET_wg0'), '0');
  });

  it('should start peer addresses over for a recreated interface', async () => {
    const ctx = await setupContext([
      true, '', '10.9.0.1/29', '', false,
      true, 'laptop', 'vpn.example.com:51820', '', true, true,
      false,
    ]);
    await ctx.store.setMany({
      WIREGUARD_LAST_PEER_OFFSET_wg0: '20',
      WIREGUARD_LAST_PEER_NETWORK_wg0: '10.9.0.0/29',
    });

    await runWireGuardSetup(ctx);

    const server = await readFile(join(configDir, 'wg0.conf'), 'utf-8');
    assert.ok(server.includes('AllowedIPs = 10.9.0.2/32\n'));
    assert.strictEqual(await ctx.store.get('WIREGUARD_LAST_PEER_OFFSET_wg0'), '2');
    assert.strictEqual(await ctx.store.get('WIREGUARD_LAST_PEER_NETWORK_wg0'), '10.9.0.0/29');
  });

  it('should not offer peers in non-interactive mode', async () => {
    const ctx = await setupContext([true, '', '', '', false]);
    ctx.nonInteractive = true;

    await runWireGuardSetup(ctx);

    assert.strictEqual(ctx.prompter.remaining(), 0);
    assert.ok(!ctx.prompter.asked.includes('Do you want to add peers now?'));
  });
});
