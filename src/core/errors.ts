/**
 * Error Types for homelab-setup
 *
 * Custom error classes with error codes for structured error handling.
 * Lower layers throw these; each layer boundary (store → step → orchestrator)
 * wraps with context through `cause` rather than replacing the error.
 */

/**
 * Error codes for all homelab-setup errors
 */
export type ErrorCode =
  | 'VALIDATION_FAILED'
  | 'KEY_NOT_FOUND'
  | 'IO_ERROR'
  | 'ADDRESS_SPACE_EXHAUSTED'
  | 'EXTERNAL_COMMAND_FAILED'
  | 'STEP_FAILED'
  | 'PRECONDITION_FAILED'
  | 'PROMPT_CANCELLED'
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID_YAML'
  | 'CONFIG_VALIDATION_FAILED';

/**
 * Mapping of error codes to exit codes.
 *
 * 1 = the operator can fix the input, 2 = the system or environment failed.
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  VALIDATION_FAILED: 1,
  KEY_NOT_FOUND: 1,
  IO_ERROR: 2,
  ADDRESS_SPACE_EXHAUSTED: 1,
  EXTERNAL_COMMAND_FAILED: 2,
  STEP_FAILED: 2,
  PRECONDITION_FAILED: 1,
  PROMPT_CANCELLED: 130,
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID_YAML: 1,
  CONFIG_VALIDATION_FAILED: 1,
};

/**
 * Base error class for all homelab-setup errors.
 *
 * Provides structured error information with codes and suggestions.
 */
export class SetupError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SetupError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, SetupError.prototype);
  }

  /**
   * Get the exit code for this error.
   */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /**
   * Format the error for display.
   */
  format(): string {
    let output = `Error: ${this.message}`;
    if (this.suggestion) {
      output += `\n\nFix: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * Bad operator input: a CIDR, port, key, marker name or similar.
 * Always caller-correctable; never retried.
 */
export class ValidationError extends SetupError {
  constructor(
    message: string,
    public readonly field?: string,
    suggestion?: string
  ) {
    super(message, 'VALIDATION_FAILED', suggestion);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * A configuration key was read but never stored.
 */
export class NotFoundError extends SetupError {
  constructor(public readonly key: string) {
    super(`Configuration key not found: ${key}`, 'KEY_NOT_FOUND');
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Filesystem failure while reading or writing configuration, markers or
 * generated files.
 */
export class IOError extends SetupError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(`${message}: ${path}${describeCause(cause)}`, 'IO_ERROR', undefined, { cause });
    this.name = 'IOError';
    Object.setPrototypeOf(this, IOError.prototype);
  }
}

/**
 * The subnet has no host addresses left for a new peer.
 */
export class AddressSpaceExhaustedError extends SetupError {
  constructor(public readonly cidr: string) {
    super(
      `No available addresses remaining in ${cidr}`,
      'ADDRESS_SPACE_EXHAUSTED',
      'Resize the interface subnet (for example from /24 to /23) and re-run add-peer.'
    );
    this.name = 'AddressSpaceExhaustedError';
    Object.setPrototypeOf(this, AddressSpaceExhaustedError.prototype);
  }
}

/**
 * An external program (wg, systemctl, useradd, ...) failed or could not be
 * started. Captured output is kept for diagnostics.
 */
export class ExternalCommandError extends SetupError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly args: readonly string[],
    public readonly commandExitCode: number | null,
    public readonly stdout: string,
    public readonly stderr: string,
    cause?: unknown
  ) {
    super(message, 'EXTERNAL_COMMAND_FAILED', undefined, { cause });
    this.name = 'ExternalCommandError';
    Object.setPrototypeOf(this, ExternalCommandError.prototype);
  }
}

/**
 * A setup step failed. Wraps the underlying error with the step's name.
 */
export class StepFailureError extends SetupError {
  constructor(
    public readonly stepName: string,
    public readonly shortName: string,
    cause: unknown
  ) {
    super(
      `Step '${stepName}' failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      'STEP_FAILED',
      isSetupError(cause) ? cause.suggestion : undefined,
      { cause }
    );
    this.name = 'StepFailureError';
    Object.setPrototypeOf(this, StepFailureError.prototype);
  }

  override get exitCode(): number {
    return getExitCode(this.cause);
  }
}

/**
 * A prerequisite is missing: a required tool, or a value an earlier step
 * should have stored.
 */
export class PreflightError extends SetupError {
  constructor(
    message: string,
    suggestion?: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message, 'PRECONDITION_FAILED', suggestion);
    this.name = 'PreflightError';
    Object.setPrototypeOf(this, PreflightError.prototype);
  }
}

/**
 * The operator aborted an interactive prompt (Ctrl-C / Esc).
 */
export class PromptCancelledError extends SetupError {
  constructor(public readonly prompt: string) {
    super(`Prompt cancelled: ${prompt}`, 'PROMPT_CANCELLED');
    this.name = 'PromptCancelledError';
    Object.setPrototypeOf(this, PromptCancelledError.prototype);
  }
}

/**
 * Error for answers-file problems.
 */
export class ConfigError extends SetupError {
  constructor(
    message: string,
    code: 'CONFIG_NOT_FOUND' | 'CONFIG_INVALID_YAML' | 'CONFIG_VALIDATION_FAILED',
    suggestion?: string,
    public readonly path?: string,
    public readonly validationErrors?: Array<{
      path: string;
      message: string;
    }>
  ) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.validationErrors && this.validationErrors.length > 0) {
      output += '\n\nValidation errors:';
      for (const error of this.validationErrors) {
        output += `\n  - ${error.path}: ${error.message}`;
      }
    }
    return output;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error && cause.message) {
    return ` (${cause.message})`;
  }
  return '';
}

/**
 * Check if an error is a SetupError.
 */
export function isSetupError(error: unknown): error is SetupError {
  return error instanceof SetupError;
}

/**
 * Check whether a Node.js system error carries the given errno code.
 */
export function hasErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isSetupError(error)) {
    return error.exitCode;
  }
  // Default to system error for unknown errors
  return 2;
}

/**
 * One-line description of any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
