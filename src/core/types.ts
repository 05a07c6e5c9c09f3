/**
 * Core Types for homelab-setup
 *
 * Types shared by the step orchestrator and the individual steps.
 */

import type { Logger } from '../lib/logger.js';
import type { Prompter } from '../prompt/types.js';
import type { ConfigStore } from '../state/store.js';
import type { CommandRunner } from '../system/executor.js';
import type { KeyGenerator } from '../wireguard/keys.js';

/**
 * Collaborators handed to every step.
 */
export interface StepContext {
  store: ConfigStore;
  prompter: Prompter;
  runner: CommandRunner;
  keygen: KeyGenerator;
  logger: Logger;
  /** True when no operator is available to answer prompts */
  nonInteractive: boolean;
  /** Clock (default: current time) */
  now?: () => Date;
}

/**
 * A unit of provisioning work. Steps keep no state between runs; everything
 * they learn is written to the store.
 */
export type StepFunction = (ctx: StepContext) => Promise<void>;

/**
 * Immutable description of a step.
 */
export interface StepDescriptor {
  /** Display name, e.g. "WireGuard Setup" */
  readonly name: string;
  /** Identifier used on the command line, e.g. "wireguard" */
  readonly shortName: string;
  readonly description: string;
  /** Completion marker written when the step succeeds */
  readonly markerName: string;
  /** Steps the operator may skip (run all --skip-wireguard, run quick) */
  readonly optional: boolean;
  /** Older marker names that also mean "complete" */
  readonly legacyMarkers: readonly string[];
}

/**
 * A descriptor bound to the function that performs the step.
 */
export interface RegisteredStep extends StepDescriptor {
  readonly run: StepFunction;
}

/**
 * State of a step derived from markers.
 */
export type StepState = 'pending' | 'completed';

/**
 * What happened when a step was asked to run.
 */
export type StepOutcome =
  | { status: 'completed'; step: StepDescriptor }
  | { status: 'skipped'; step: StepDescriptor; reason: 'already-complete' };
