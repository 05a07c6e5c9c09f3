/**
 * Shared setup for tests that need a store or a full step context.
 */

import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import type { StepContext } from '../../src/core/types.js';
import { Logger } from '../../src/lib/logger.js';
import { ConfigStore } from '../../src/state/store.js';
import { FakeKeyGenerator, RecordingCommandRunner, ScriptedPrompter, type ScriptedAnswer } from './fakes.js';

/**
 * Create a unique temp directory for a test.
 */
export async function createTempDir(): Promise<string> {
  const dir = join(tmpdir(), `homelab-setup-test-${randomUUID()}`);
  await mkdir(dir, { recursive: true });
  return dir;
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Store rooted in a temp directory.
 */
export function createStore(dir: string): ConfigStore {
  return new ConfigStore({
    configPath: join(dir, 'homelab-setup.conf'),
    markerDir: join(dir, 'markers'),
  });
}

/**
 * A step context whose collaborators are all test doubles.
 */
export interface TestContext extends StepContext {
  prompter: ScriptedPrompter;
  runner: RecordingCommandRunner;
  keygen: FakeKeyGenerator;
}

export interface TestContextOptions {
  answers?: ScriptedAnswer[];
  nonInteractive?: boolean;
  /** Clock for export filenames */
  now?: () => Date;
}

export function createTestContext(dir: string, options: TestContextOptions = {}): TestContext {
  return {
    store: createStore(dir),
    prompter: new ScriptedPrompter(options.answers),
    runner: new RecordingCommandRunner(),
    keygen: new FakeKeyGenerator(),
    logger: new Logger('json'),
    nonInteractive: options.nonInteractive ?? false,
    now: options.now,
  };
}
