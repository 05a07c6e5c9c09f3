/**
 * Answers File Validator
 *
 * Validates parsed answers against the JSON Schema using Ajv.
 */

import Ajv, { type ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import type { AnswersFile } from './types.js';
import { answersSchema } from './schema.js';

/**
 * Schema violation details
 */
export interface SchemaIssue {
  /** JSON path to the invalid field */
  path: string;
  /** Human-readable error message */
  message: string;
}

/**
 * Validation result - either success with answers or failure with issues
 */
export type AnswersValidationResult =
  | { valid: true; answers: AnswersFile }
  | { valid: false; errors: SchemaIssue[] };

const ajv = new Ajv.default({
  allErrors: true,
  verbose: true,
  strict: false,
});
addFormats.default(ajv);

const validate = ajv.compile<AnswersFile>(answersSchema);

/**
 * Validate parsed YAML against the answers schema.
 *
 * An empty document (null) is treated as an empty answers file.
 */
export function validateAnswers(data: unknown): AnswersValidationResult {
  const candidate = data === null || data === undefined ? {} : data;

  if (validate(candidate)) {
    return { valid: true, answers: candidate };
  }

  const errors: SchemaIssue[] = (validate.errors ?? []).map((error: ErrorObject) => ({
    path: error.instancePath || '/',
    message: error.message ?? 'Unknown validation error',
  }));
  return { valid: false, errors };
}

/**
 * Format schema issues one per line.
 */
export function formatSchemaIssues(errors: SchemaIssue[]): string {
  return errors.map((error) => `  - ${error.path}: ${error.message}`).join('\n');
}
