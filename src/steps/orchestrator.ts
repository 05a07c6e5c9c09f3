/**
 * Step Orchestrator
 *
 * Runs registered steps in order, consulting completion markers so that a
 * finished step is not repeated unless the operator asks for it.
 */

import { StepFailureError, ValidationError, describeError } from '../core/errors.js';
import type {
  RegisteredStep,
  StepContext,
  StepDescriptor,
  StepOutcome,
  StepState,
} from '../core/types.js';
import { ensureCanonicalMarker } from '../state/migration.js';
import { BUILT_IN_STEPS } from './registry.js';

/**
 * Decides whether an already-complete step runs again.
 */
export type RerunPolicy = (step: StepDescriptor, ctx: StepContext) => Promise<boolean>;

/**
 * Ask the operator, defaulting to no. Never reruns in non-interactive mode.
 */
export const askToRerun: RerunPolicy = async (step, ctx) => {
  if (ctx.nonInteractive) {
    return false;
  }
  return ctx.prompter.confirm(`${step.name} is already complete. Run again?`, false);
};

/**
 * State of one step as shown by `status`
 */
export interface StepStatus {
  step: StepDescriptor;
  state: StepState;
}

export interface StepRunnerOptions {
  /** Steps in execution order (default: the built-in steps) */
  steps?: readonly RegisteredStep[];
  /** Default: {@link askToRerun} */
  rerunPolicy?: RerunPolicy;
}

export class StepRunner {
  private readonly steps: readonly RegisteredStep[];
  private readonly rerunPolicy: RerunPolicy;

  constructor(
    private readonly ctx: StepContext,
    options: StepRunnerOptions = {}
  ) {
    this.steps = options.steps ?? BUILT_IN_STEPS;
    this.rerunPolicy = options.rerunPolicy ?? askToRerun;
  }

  getAllSteps(): readonly StepDescriptor[] {
    return this.steps;
  }

  /**
   * Report whether the step owning a marker is complete, folding in any
   * legacy marker it declares.
   */
  async isStepComplete(markerName: string): Promise<boolean> {
    const legacy = this.steps.find((step) => step.markerName === markerName)?.legacyMarkers ?? [];
    return ensureCanonicalMarker(this.ctx.store, markerName, legacy, {
      onCleanupError: (legacyName, error) => {
        this.ctx.logger.warning(`Could not remove legacy marker ${legacyName}: ${describeError(error)}`);
      },
    });
  }

  async getStepStates(): Promise<StepStatus[]> {
    const states: StepStatus[] = [];
    for (const step of this.steps) {
      const complete = await this.isStepComplete(step.markerName);
      states.push({ step, state: complete ? 'completed' : 'pending' });
    }
    return states;
  }

  /**
   * Run one step by short name.
   *
   * @throws ValidationError for an unknown step
   * @throws StepFailureError when the step fails; the marker is not written
   */
  async runStep(shortName: string): Promise<StepOutcome> {
    const step = this.steps.find((candidate) => candidate.shortName === shortName);
    if (!step) {
      throw new ValidationError(
        `Unknown step: ${shortName}`,
        'step',
        `Valid steps: ${this.steps.map((candidate) => candidate.shortName).join(', ')}`
      );
    }

    const { store, logger } = this.ctx;

    if (await this.isStepComplete(step.markerName)) {
      if (!(await this.rerunPolicy(step, this.ctx))) {
        logger.info(`${step.name} already complete, skipping`);
        return { status: 'skipped', step, reason: 'already-complete' };
      }
      await store.clearMarker(step.markerName);
    }

    logger.step(step.name, step.description);
    logger.indent();
    try {
      await step.run(this.ctx);
      await store.markComplete(step.markerName);
    } catch (error) {
      const failure = new StepFailureError(step.name, step.shortName, error);
      logger.error(failure.message, failure);
      throw failure;
    } finally {
      logger.dedent();
    }

    logger.success(`${step.name} complete`);
    return { status: 'completed', step };
  }

  /**
   * Run every step in order, stopping at the first failure. Completed steps
   * are left as they are; nothing is rolled back.
   */
  async runAll(skipOptional: boolean = false): Promise<StepOutcome[]> {
    const outcomes: StepOutcome[] = [];
    for (const step of this.steps) {
      if (skipOptional && step.optional) {
        this.ctx.logger.info(`Skipping optional step: ${step.name}`);
        continue;
      }
      outcomes.push(await this.runStep(step.shortName));
    }
    return outcomes;
  }
}
