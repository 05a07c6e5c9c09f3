/**
 * Command Context
 *
 * Builds the collaborators every command needs from the global options.
 */

import { formatSchemaIssues } from '../config/validator.js';
import { ConfigError, StepFailureError, getExitCode, isSetupError } from '../core/errors.js';
import type { StepContext } from '../core/types.js';
import { Logger } from '../lib/logger.js';
import { getConfigPath, getMarkerDir } from '../lib/paths.js';
import { ClackPrompter } from '../prompt/clack.js';
import { NonInteractivePrompter } from '../prompt/non-interactive.js';
import { ConfigStore } from '../state/store.js';
import { ExecCommandRunner } from '../system/executor.js';
import { CommandKeyGenerator } from '../wireguard/keys.js';

/**
 * Options accepted by every command
 */
export interface GlobalOptions {
  config?: string;
  markerDir?: string;
  verbose?: boolean;
  json?: boolean;
}

/**
 * Build a step context for a command.
 *
 * JSON output implies non-interactive prompting, since stdout carries the
 * JSON document.
 */
export function createContext(
  command: string,
  options: GlobalOptions,
  nonInteractive: boolean = false
): StepContext {
  const logger = Logger.fromOptions(options);
  logger.setCommand(command);

  const unattended = nonInteractive || logger.getMode() === 'json';
  const runner = new ExecCommandRunner({ verbose: options.verbose === true });

  return {
    store: new ConfigStore({
      configPath: getConfigPath(options.config),
      markerDir: getMarkerDir(options.markerDir),
    }),
    prompter: unattended ? new NonInteractivePrompter(logger) : new ClackPrompter(),
    runner,
    keygen: new CommandKeyGenerator(runner),
    logger,
    nonInteractive: unattended,
  };
}

/**
 * Report an error through the logger, listing schema issues for invalid
 * answers files.
 */
export function reportError(logger: Logger, error: unknown): void {
  if (error instanceof ConfigError && error.validationErrors) {
    logger.error(error.message, error);
    logger.addData('validationErrors', error.validationErrors);
    logger.info(formatSchemaIssues(error.validationErrors));
  } else if (isSetupError(error)) {
    logger.error(error.message, error);
  } else if (error instanceof Error) {
    logger.error(error.message);
  } else {
    logger.error(String(error));
  }
}

/**
 * Report an error and exit with its exit code.
 *
 * Step failures have already been reported by the orchestrator.
 */
export function handleError(logger: Logger, error: unknown): never {
  if (!(error instanceof StepFailureError)) {
    reportError(logger, error);
  }
  logger.flush();
  process.exit(getExitCode(error));
}

/**
 * Flush output and exit successfully.
 */
export function finish(logger: Logger): never {
  logger.setSuccess(true);
  logger.flush();
  process.exit(0);
}
