/**
 * Prompter for --non-interactive runs.
 *
 * Every question is answered with its default. A question without a default
 * is an error, since nobody is there to answer it.
 */

import { ValidationError } from '../core/errors.js';
import type { Logger } from '../lib/logger.js';
import type { InputOptions, Prompter } from './types.js';

export class NonInteractivePrompter implements Prompter {
  constructor(private readonly logger: Logger) {}

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    this.logger.info(`[non-interactive] ${message} -> ${defaultValue ? 'yes' : 'no'}`);
    return defaultValue;
  }

  async input(message: string, options: InputOptions = {}): Promise<string> {
    if (options.defaultValue === undefined || options.defaultValue === '') {
      throw new ValidationError(
        `No value available for '${message}' in non-interactive mode`,
        undefined,
        'Provide the value with a command-line flag or an answers file.'
      );
    }
    this.logger.info(`[non-interactive] ${message} -> ${options.defaultValue}`);
    return options.defaultValue;
  }

  async password(message: string): Promise<string> {
    throw new ValidationError(
      `Cannot prompt for a secret ('${message}') in non-interactive mode`,
      undefined,
      'Run the command interactively.'
    );
  }

  async select(message: string, options: readonly string[], defaultIndex: number = 0): Promise<string> {
    const choice = options[defaultIndex];
    if (choice === undefined) {
      throw new ValidationError(
        `No default choice available for '${message}' in non-interactive mode`
      );
    }
    this.logger.info(`[non-interactive] ${message} -> ${choice}`);
    return choice;
  }

  async multiSelect(
    message: string,
    options: readonly string[],
    defaults: readonly string[] = []
  ): Promise<string[]> {
    const chosen = options.filter((option) => defaults.includes(option));
    this.logger.info(`[non-interactive] ${message} -> ${chosen.join(', ') || '(none)'}`);
    return chosen;
  }
}
