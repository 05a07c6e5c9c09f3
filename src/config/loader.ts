/**
 * Answers File Loader
 *
 * Loads YAML answers files from the filesystem.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';

import { ConfigError, describeError, hasErrnoCode } from '../core/errors.js';
import type { AnswersFile } from './types.js';
import { validateAnswers } from './validator.js';

/**
 * Load and parse a YAML file.
 *
 * @returns Parsed YAML content as unknown (requires validation)
 * @throws ConfigError if the file cannot be read or parsed
 */
export async function loadYamlFile(filePath: string): Promise<unknown> {
  let content: string;

  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (hasErrnoCode(error, 'ENOENT')) {
      throw new ConfigError(
        `Answers file not found: ${filePath}`,
        'CONFIG_NOT_FOUND',
        'Check the path passed to --answers.',
        filePath
      );
    }
    throw new ConfigError(
      `Failed to read answers file: ${filePath} (${describeError(error)})`,
      'CONFIG_NOT_FOUND',
      undefined,
      filePath
    );
  }

  try {
    return yaml.load(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid YAML syntax in ${filePath}: ${describeError(error)}`,
      'CONFIG_INVALID_YAML',
      undefined,
      filePath
    );
  }
}

/**
 * Load, parse and validate an answers file.
 *
 * @throws ConfigError with code CONFIG_VALIDATION_FAILED and the schema issues
 */
export async function loadAnswersFile(filePath: string): Promise<AnswersFile> {
  const data = await loadYamlFile(filePath);
  const result = validateAnswers(data);
  if (!result.valid) {
    throw new ConfigError(
      `Answers file ${filePath} is invalid`,
      'CONFIG_VALIDATION_FAILED',
      'Fix the listed fields and try again.',
      filePath,
      result.errors
    );
  }
  return result.answers;
}
