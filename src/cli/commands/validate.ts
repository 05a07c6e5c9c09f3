/**
 * Validate Command Handler
 *
 * Checks an answers file against the schema without touching the stored
 * configuration or the host.
 */

import { resolve } from 'node:path';

import { loadAnswersFile } from '../../config/loader.js';
import { answersToEntries } from '../../config/answers.js';
import { Logger } from '../../lib/logger.js';
import { handleError, finish, type GlobalOptions } from '../context.js';

/**
 * Execute the validate command.
 *
 * @param file - Path to the answers file
 */
export async function validateCommand(file: string, options: GlobalOptions): Promise<void> {
  const logger = Logger.fromOptions(options);
  logger.setCommand('validate');

  try {
    const answersPath = resolve(file);
    logger.info(`Validating answers file: ${file}`);

    const answers = await loadAnswersFile(answersPath);
    const entries = answersToEntries(answers);
    const keys = Object.keys(entries).sort();

    logger.success(`Answers file is valid (${keys.length} values)`);
    for (const key of keys) {
      logger.info(`  ${key}=${entries[key] ?? ''}`);
    }
    logger.setData({ file: answersPath, values: entries });

    finish(logger);
  } catch (error) {
    handleError(logger, error);
  }
}
