/**
 * Run Command Handler
 *
 * Runs one step, every step, or the quick path that skips optional steps.
 */

import { loadAnswersFile } from '../../config/loader.js';
import { applyAnswers } from '../../config/answers.js';
import type { StepOutcome } from '../../core/types.js';
import { StepRunner } from '../../steps/orchestrator.js';
import { createContext, finish, handleError, type GlobalOptions } from '../context.js';

/**
 * Options for the run command
 */
export interface RunCommandOptions extends GlobalOptions {
  nonInteractive?: boolean;
  /** YAML answers file applied before any step runs */
  answers?: string;
  skipWireguard?: boolean;
}

function summarize(outcomes: StepOutcome[]): Array<{ step: string; status: string }> {
  return outcomes.map((outcome) => ({ step: outcome.step.shortName, status: outcome.status }));
}

/**
 * Execute the run command.
 *
 * @param target - A step short name, `all` or `quick`
 */
export async function runCommand(target: string, options: RunCommandOptions): Promise<void> {
  const ctx = createContext('run', options, options.nonInteractive === true);
  const { logger } = ctx;

  try {
    if (options.answers) {
      const answers = await loadAnswersFile(options.answers);
      const keys = await applyAnswers(ctx.store, answers);
      logger.info(`Applied ${keys.length} answers from ${options.answers}`);
    }

    const runner = new StepRunner(ctx);
    let outcomes: StepOutcome[];

    if (target === 'all' || target === 'quick') {
      logger.header('Homelab Setup');
      outcomes = await runner.runAll(target === 'quick' || options.skipWireguard === true);
    } else {
      outcomes = [await runner.runStep(target)];
    }

    logger.newline();
    const completed = outcomes.filter((outcome) => outcome.status === 'completed').length;
    const skipped = outcomes.length - completed;
    logger.success(`${completed} step(s) completed, ${skipped} skipped`);
    logger.setData({ steps: summarize(outcomes) });

    finish(logger);
  } catch (error) {
    handleError(logger, error);
  }
}
