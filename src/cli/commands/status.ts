/**
 * Status Command Handler
 *
 * Shows which steps are complete. Read-only apart from folding legacy
 * markers into their current names.
 */

import { StepRunner } from '../../steps/orchestrator.js';
import { createContext, finish, handleError, type GlobalOptions } from '../context.js';

/**
 * Execute the status command.
 */
export async function statusCommand(options: GlobalOptions): Promise<void> {
  const ctx = createContext('status', options, true);
  const { logger, store } = ctx;

  try {
    const states = await new StepRunner(ctx).getStepStates();

    logger.header('Setup Status');
    logger.info(`Configuration: ${store.getConfigPath()}`);
    logger.info(`Markers: ${store.getMarkerDir()}`);
    logger.newline();
    logger.table(
      ['STEP', 'NAME', 'STATUS'],
      states.map(({ step, state }) => [
        step.shortName,
        step.optional ? `${step.name} (optional)` : step.name,
        state,
      ])
    );

    const completed = states.filter(({ state }) => state === 'completed').length;
    logger.newline();
    logger.info(`${completed}/${states.length} steps complete`);

    logger.setData({
      configPath: store.getConfigPath(),
      markerDir: store.getMarkerDir(),
      steps: states.map(({ step, state }) => ({
        step: step.shortName,
        name: step.name,
        optional: step.optional,
        state,
      })),
    });

    finish(logger);
  } catch (error) {
    handleError(logger, error);
  }
}
