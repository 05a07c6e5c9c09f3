/**
 * Unit tests for the command runner
 *
 * ExecCommandRunner is exercised against the running Node.js binary so that
 * no other program needs to be installed.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { realpath } from 'node:fs/promises';

import {
  ExecCommandRunner,
  commandExists,
  formatFailureMessage,
  runChecked,
} from '../../../src/system/executor.js';
import { ExternalCommandError } from '../../../src/core/errors.js';
import { RecordingCommandRunner } from '../../helpers/fakes.js';
import { createTempDir, removeTempDir } from '../../helpers/context.js';

const NODE = process.execPath;

describe('ExecCommandRunner', () => {
  const runner = new ExecCommandRunner();

  it('should capture stdout and the exit code', async () => {
    const result = await runner.run(NODE, ['-e', 'process.stdout.write("hello")']);

    assert.deepStrictEqual(result, { stdout: 'hello', stderr: '', exitCode: 0 });
  });

  it('should resolve with a non-zero exit code instead of rejecting', async () => {
    const result = await runner.run(NODE, ['-e', 'process.stderr.write("bad"); process.exit(3)']);

    assert.strictEqual(result.exitCode, 3);
    assert.strictEqual(result.stderr, 'bad');
  });

  it('should pipe input to stdin', async () => {
    const script = 'let s = ""; process.stdin.on("data", (d) => { s += d; }); process.stdin.on("end", () => process.stdout.write(s.toUpperCase()));';

    const result = await runner.run(NODE, ['-e', script], { input: 'private-key\n' });

    assert.strictEqual(result.stdout, 'PRIVATE-KEY\n');
  });

  it('should pass arguments without a shell', async () => {
    const result = await runner.run(NODE, ['-e', 'process.stdout.write(process.argv[1])', '$HOME; echo hi']);

    assert.strictEqual(result.stdout, '$HOME; echo hi');
  });

  describe('working directory', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await createTempDir();
    });

    afterEach(async () => {
      await removeTempDir(tempDir);
    });

    it('should run in the given directory', async () => {
      const result = await runner.run(NODE, ['-e', 'process.stdout.write(process.cwd())'], { cwd: tempDir });

      assert.strictEqual(await realpath(result.stdout), await realpath(tempDir));
    });
  });

  it('should reject with ExternalCommandError when the program cannot start', async () => {
    await assert.rejects(
      async () => runner.run('homelab-setup-no-such-program', ['x']),
      (error: unknown) => {
        assert.ok(error instanceof ExternalCommandError);
        assert.strictEqual(error.command, 'homelab-setup-no-such-program');
        assert.strictEqual(error.commandExitCode, null);
        assert.ok(error.message.startsWith('Failed to start homelab-setup-no-such-program: '));
        return true;
      }
    );
  });
});

describe('formatFailureMessage', () => {
  it('should include up to three stderr lines', () => {
    const message = formatFailureMessage('sudo', ['useradd', 'lab'], {
      stdout: '',
      stderr: '\x1b[31mline one\x1b[0m\r\n\nline two\nline three\nline four\n',
      exitCode: 9,
    });

    assert.strictEqual(message, 'sudo useradd lab failed (exit 9): line one | line two | line three');
  });

  it('should fall back to the exit code', () => {
    assert.strictEqual(
      formatFailureMessage('rpm', ['-q', 'nfs-utils'], { stdout: '', stderr: '', exitCode: 1 }),
      'rpm -q nfs-utils failed with exit code 1'
    );
  });
});

describe('runChecked', () => {
  it('should return the result on success', async () => {
    const runner = new RecordingCommandRunner().on('id -u lab', { stdout: '1001\n' });

    const result = await runChecked(runner, 'id', ['-u', 'lab']);

    assert.strictEqual(result.stdout, '1001\n');
  });

  it('should throw ExternalCommandError on a non-zero exit', async () => {
    const runner = new RecordingCommandRunner().on('wg genkey', { exitCode: 1, stderr: 'denied' });

    await assert.rejects(
      async () => runChecked(runner, 'wg', ['genkey']),
      (error: unknown) => {
        assert.ok(error instanceof ExternalCommandError);
        assert.strictEqual(error.message, 'wg genkey failed (exit 1): denied');
        assert.strictEqual(error.commandExitCode, 1);
        return true;
      }
    );
  });
});

describe('commandExists', () => {
  it('should ask which', async () => {
    const runner = new RecordingCommandRunner().missing('podman');

    assert.strictEqual(await commandExists(runner, 'docker'), true);
    assert.strictEqual(await commandExists(runner, 'podman'), false);
    assert.deepStrictEqual(runner.lines(), ['which docker', 'which podman']);
  });

  it('should treat a spawn failure as absent', async () => {
    const runner = new RecordingCommandRunner().on('which wg', new Error('which not installed'));

    assert.strictEqual(await commandExists(runner, 'wg'), false);
  });
});
