/**
 * Unit tests for Logger
 */

import { describe, it, mock, afterEach } from 'node:test';
import assert from 'node:assert';

import { Logger } from '../../../src/lib/logger.js';
import { PreflightError } from '../../../src/core/errors.js';

describe('Logger', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  describe('human mode', () => {
    it('should prefix success lines with a check mark', () => {
      const log = mock.method(console, 'log', () => {});
      const logger = new Logger('human');

      logger.success('Keys generated');

      assert.strictEqual(log.mock.callCount(), 1);
      assert.deepStrictEqual(log.mock.calls[0]?.arguments, ['✓ Keys generated']);
    });

    it('should indent nested output', () => {
      const log = mock.method(console, 'log', () => {});
      const logger = new Logger('human');

      logger.indent();
      logger.info('nested');
      logger.dedent();
      logger.dedent();
      logger.info('top');

      assert.deepStrictEqual(log.mock.calls[0]?.arguments, ['  nested']);
      assert.deepStrictEqual(log.mock.calls[1]?.arguments, ['top']);
    });

    it('should underline headers', () => {
      const log = mock.method(console, 'log', () => {});
      const logger = new Logger('human');

      logger.header('Status');

      assert.deepStrictEqual(log.mock.calls[0]?.arguments, ['Status']);
      assert.deepStrictEqual(log.mock.calls[1]?.arguments, ['======']);
    });

    it('should print errors with the suggestion to stderr', () => {
      const err = mock.method(console, 'error', () => {});
      const logger = new Logger('human');

      logger.error('wg missing', new PreflightError('wg missing', 'Install wireguard-tools'));

      assert.deepStrictEqual(err.mock.calls[0]?.arguments, ['✗ wg missing']);
      assert.deepStrictEqual(err.mock.calls[1]?.arguments, ['  Fix: Install wireguard-tools']);
    });

    it('should hide debug output unless verbose', () => {
      const err = mock.method(console, 'error', () => {});

      new Logger('human', false).debug('hidden');
      new Logger('human', true).debug('shown');

      assert.strictEqual(err.mock.callCount(), 1);
      assert.deepStrictEqual(err.mock.calls[0]?.arguments, ['· shown']);
    });

    it('should align table columns', () => {
      const log = mock.method(console, 'log', () => {});
      const logger = new Logger('human');

      logger.table(['STEP', 'STATUS'], [['preflight', 'completed'], ['nfs', 'pending']]);

      assert.deepStrictEqual(
        log.mock.calls.map((call) => call.arguments[0]),
        ['STEP       STATUS', 'preflight  completed', 'nfs        pending']
      );
    });
  });

  describe('json mode', () => {
    it('should print nothing until flushed', () => {
      const log = mock.method(console, 'log', () => {});
      const logger = new Logger('json');

      logger.info('quiet');
      logger.success('quiet');
      logger.table(['A'], [['b']]);

      assert.strictEqual(log.mock.callCount(), 0);
    });

    it('should record errors in the buffer', () => {
      const logger = new Logger('json');
      logger.setCommand('run');

      logger.error('boom', new PreflightError('boom', 'try again'));

      assert.deepStrictEqual(logger.getJsonBuffer(), {
        success: false,
        command: 'run',
        error: { code: 'PRECONDITION_FAILED', message: 'boom', suggestion: 'try again' },
      });
    });

    it('should merge data and emit one document on flush', () => {
      const log = mock.method(console, 'log', () => {});
      const logger = new Logger('json');
      logger.setCommand('status');
      logger.setData({ steps: [] });
      logger.addData('markerDir', '/tmp/m');

      logger.flush();

      assert.strictEqual(log.mock.callCount(), 1);
      assert.deepStrictEqual(JSON.parse(String(log.mock.calls[0]?.arguments[0])), {
        success: true,
        command: 'status',
        data: { steps: [], markerDir: '/tmp/m' },
      });
    });
  });

  describe('fromOptions', () => {
    it('should select json mode from --json', () => {
      assert.strictEqual(Logger.fromOptions({ json: true }).getMode(), 'json');
      assert.strictEqual(Logger.fromOptions({}).getMode(), 'human');
    });

    it('should show debug lines only with --verbose', () => {
      const error = mock.method(console, 'error', () => {});

      Logger.fromOptions({}).debug('hidden');
      Logger.fromOptions({ verbose: true }).debug('shown');

      assert.deepStrictEqual(error.mock.calls.map((call) => call.arguments[0]), ['· shown']);
    });
  });
});
