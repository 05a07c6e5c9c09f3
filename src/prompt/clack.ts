/**
 * Terminal prompts on @clack/prompts.
 */

import * as p from '@clack/prompts';

import { PromptCancelledError } from '../core/errors.js';
import type { InputOptions, Prompter } from './types.js';

/**
 * Unwrap a clack answer, turning a cancelled prompt into PromptCancelledError.
 */
function answered<T>(value: T | symbol, message: string): T {
  if (p.isCancel(value)) {
    p.cancel('Setup cancelled.');
    throw new PromptCancelledError(message);
  }
  return value;
}

/**
 * Prompter used by interactive runs.
 */
export class ClackPrompter implements Prompter {
  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    const value = await p.confirm({ message, initialValue: defaultValue });
    return answered(value, message);
  }

  async input(message: string, options: InputOptions = {}): Promise<string> {
    const value = await p.text({
      message,
      placeholder: options.placeholder ?? options.defaultValue,
      defaultValue: options.defaultValue,
    });
    const text = answered(value, message).trim();
    return text === '' ? (options.defaultValue ?? '') : text;
  }

  async password(message: string): Promise<string> {
    const value = await p.password({ message });
    return answered(value, message);
  }

  async select(message: string, options: readonly string[], defaultIndex: number = 0): Promise<string> {
    const value = await p.select({
      message,
      options: options.map((option) => ({ value: option, label: option })),
      initialValue: options[defaultIndex],
    });
    return answered(value, message);
  }

  async multiSelect(
    message: string,
    options: readonly string[],
    defaults: readonly string[] = []
  ): Promise<string[]> {
    const value = await p.multiselect({
      message,
      options: options.map((option) => ({ value: option, label: option })),
      initialValues: [...defaults],
      required: false,
    });
    const chosen = answered(value, message);
    return options.filter((option) => chosen.includes(option));
  }
}
