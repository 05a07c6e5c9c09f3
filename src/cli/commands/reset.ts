/**
 * Reset Command Handler
 *
 * Clears every completion marker so that steps run again, and optionally
 * removes the configuration file.
 */

import { createContext, finish, handleError, type GlobalOptions } from '../context.js';

/**
 * Options for the reset command
 */
export interface ResetCommandOptions extends GlobalOptions {
  force?: boolean;
  /** Also delete the configuration file */
  configFile?: boolean;
}

/**
 * Execute the reset command.
 */
export async function resetCommand(options: ResetCommandOptions): Promise<void> {
  const ctx = createContext('reset', options);
  const { logger, store, prompter } = ctx;

  try {
    const markers = await store.listMarkers();

    if (!options.force) {
      const what = options.configFile ? 'all completion markers and the configuration file' : 'all completion markers';
      const confirmed = !ctx.nonInteractive && (await prompter.confirm(`Remove ${what}?`, false));
      if (!confirmed) {
        logger.info('Reset cancelled. Use --force to reset without confirmation.');
        logger.setData({ cleared: [], configRemoved: false });
        finish(logger);
      }
    }

    await store.clearAllMarkers();
    logger.success(`Cleared ${markers.length} marker(s)`);

    if (options.configFile) {
      await store.removeConfigFile();
      logger.success(`Removed ${store.getConfigPath()}`);
    }

    logger.setData({ cleared: markers, configRemoved: options.configFile === true });
    finish(logger);
  } catch (error) {
    handleError(logger, error);
  }
}
