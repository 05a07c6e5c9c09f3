/**
 * Unit tests for step input validation
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  splitList,
  validateHost,
  validatePath,
  validateSafePath,
  validateTimezone,
  validateUsername,
} from '../../../src/steps/validation.js';
import { ValidationError } from '../../../src/core/errors.js';

describe('validatePath', () => {
  it('should accept absolute paths', () => {
    assert.doesNotThrow(() => validatePath('/volume1/homelab'));
  });

  it('should reject empty and relative paths', () => {
    assert.throws(() => validatePath(''), { message: 'Path cannot be empty' });
    assert.throws(() => validatePath('srv/containers'), { message: 'Path must be absolute: srv/containers' });
    assert.throws(() => validatePath('../escape'), ValidationError);
  });
});

describe('validateSafePath', () => {
  it('should accept plain absolute paths', () => {
    assert.doesNotThrow(() => validateSafePath('/srv/containers'));
    assert.doesNotThrow(() => validateSafePath('/mnt/nas-1/media_files'));
  });

  it('should reject shell metacharacters', () => {
    for (const path of ['/srv/$(reboot)', '/srv;rm', '/srv/`id`', '/srv/a|b', '/srv/*', '/srv/a\nb']) {
      assert.throws(() => validateSafePath(path), ValidationError, path);
    }
  });

  it('should carry the field name', () => {
    assert.throws(
      () => validateSafePath('/srv&', 'baseDir'),
      (error: unknown) => error instanceof ValidationError && error.field === 'baseDir'
    );
  });
});

describe('validateUsername', () => {
  it('should accept typical usernames', () => {
    assert.doesNotThrow(() => validateUsername('homelab'));
    assert.doesNotThrow(() => validateUsername('_svc-media1'));
  });

  it('should reject invalid usernames', () => {
    assert.throws(() => validateUsername(''), { message: 'Username cannot be empty' });
    assert.throws(() => validateUsername('1user'), {
      message: 'Username must start with a letter or underscore: 1user',
    });
    assert.throws(() => validateUsername('bad name'), { message: 'Username contains invalid character: bad name' });
    assert.throws(() => validateUsername('a'.repeat(33)), ValidationError);
  });
});

describe('validateHost', () => {
  it('should accept IPv4 addresses and hostnames', () => {
    assert.doesNotThrow(() => validateHost('192.168.1.10'));
    assert.doesNotThrow(() => validateHost('nas'));
    assert.doesNotThrow(() => validateHost('nas.home.arpa'));
  });

  it('should reject malformed hosts', () => {
    assert.throws(() => validateHost(''), ValidationError);
    assert.throws(() => validateHost('bad_host!'), ValidationError);
    assert.throws(() => validateHost('-nas.local'), ValidationError);
    assert.throws(() => validateHost('300.1.1.1'), ValidationError);
  });
});

describe('validateTimezone', () => {
  it('should accept zone names', () => {
    assert.doesNotThrow(() => validateTimezone('UTC'));
    assert.doesNotThrow(() => validateTimezone('America/Argentina/Buenos_Aires'));
    assert.doesNotThrow(() => validateTimezone('Etc/GMT+3'));
  });

  it('should reject text that is not a zone name', () => {
    assert.throws(() => validateTimezone('Not A Zone'), { message: 'Invalid timezone: Not A Zone' });
    assert.throws(() => validateTimezone('../etc/passwd'), ValidationError);
    assert.throws(() => validateTimezone(''), ValidationError);
  });
});

describe('splitList', () => {
  it('should split on commas and drop blanks', () => {
    assert.deepStrictEqual(splitList('media, web,,cloud '), ['media', 'web', 'cloud']);
    assert.deepStrictEqual(splitList(''), []);
  });
});
