/**
 * homelab-setup public API
 */

export * from './core/errors.js';
export type * from './core/types.js';
export { Logger } from './lib/logger.js';
export { ConfigStore, type ConfigStoreOptions } from './state/store.js';
export { CONFIG_KEYS, DEFAULTS, MARKERS, LEGACY_WIREGUARD_MARKERS } from './state/keys.js';
export { ensureCanonicalMarker, type MigrationOptions } from './state/migration.js';
export type { Prompter, InputOptions } from './prompt/types.js';
export { ClackPrompter } from './prompt/clack.js';
export { NonInteractivePrompter } from './prompt/non-interactive.js';
export {
  ExecCommandRunner,
  runChecked,
  commandExists,
  type CommandRunner,
  type CommandResult,
  type RunOptions,
} from './system/executor.js';
export { StepRunner, askToRerun, type RerunPolicy, type StepStatus } from './steps/orchestrator.js';
export { BUILT_IN_STEPS } from './steps/registry.js';
export { loadAnswersFile } from './config/loader.js';
export { applyAnswers } from './config/answers.js';
export type { AnswersFile } from './config/types.js';
export { CommandKeyGenerator, type KeyGenerator, type KeyPair } from './wireguard/keys.js';
export { AddressAllocator } from './wireguard/allocator.js';
export { addPeer, type AddPeerOptions, type AddPeerResult } from './wireguard/peer.js';
export { createInterface, runWireGuardSetup } from './wireguard/setup.js';
export { renderClientConfig, renderServerConfig, renderPeerBlock } from './wireguard/render.js';
export type * from './wireguard/types.js';
