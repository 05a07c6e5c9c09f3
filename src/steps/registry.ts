/**
 * Step Registry
 *
 * The built-in steps in the order `run all` executes them.
 */

import type { RegisteredStep } from '../core/types.js';
import { LEGACY_WIREGUARD_MARKERS, MARKERS } from '../state/keys.js';
import { runWireGuardSetup } from '../wireguard/setup.js';
import { runContainerSetup } from './container.js';
import { runDeployment } from './deployment.js';
import { runDirectorySetup } from './directory.js';
import { runNfsSetup } from './nfs.js';
import { runPreflight } from './preflight.js';
import { runUserSetup } from './user.js';

function defineStep(step: RegisteredStep): RegisteredStep {
  return Object.freeze({ ...step, legacyMarkers: Object.freeze([...step.legacyMarkers]) });
}

export const BUILT_IN_STEPS: readonly RegisteredStep[] = Object.freeze([
  defineStep({
    name: 'Pre-flight Check',
    shortName: 'preflight',
    description: 'Verify the host, container runtime and sudo access',
    markerName: MARKERS.preflight,
    optional: false,
    legacyMarkers: [],
    run: runPreflight,
  }),
  defineStep({
    name: 'User Setup',
    shortName: 'user',
    description: 'Configure the account that owns homelab services',
    markerName: MARKERS.user,
    optional: false,
    legacyMarkers: [],
    run: runUserSetup,
  }),
  defineStep({
    name: 'Directory Setup',
    shortName: 'directory',
    description: 'Create the base directory tree',
    markerName: MARKERS.directory,
    optional: false,
    legacyMarkers: [],
    run: runDirectorySetup,
  }),
  defineStep({
    name: 'WireGuard Setup',
    shortName: 'wireguard',
    description: 'Configure the WireGuard VPN interface',
    markerName: MARKERS.wireguard,
    optional: true,
    legacyMarkers: LEGACY_WIREGUARD_MARKERS,
    run: runWireGuardSetup,
  }),
  defineStep({
    name: 'NFS Setup',
    shortName: 'nfs',
    description: 'Configure network storage',
    markerName: MARKERS.nfs,
    optional: false,
    legacyMarkers: [],
    run: runNfsSetup,
  }),
  defineStep({
    name: 'Container Setup',
    shortName: 'container',
    description: 'Choose the runtime and service stacks',
    markerName: MARKERS.container,
    optional: false,
    legacyMarkers: [],
    run: runContainerSetup,
  }),
  defineStep({
    name: 'Service Deployment',
    shortName: 'deployment',
    description: 'Pull images and enable compose services',
    markerName: MARKERS.deployment,
    optional: false,
    legacyMarkers: [],
    run: runDeployment,
  }),
]);
