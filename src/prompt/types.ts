/**
 * Prompt Capability
 *
 * Interface through which steps ask the operator for input. Production code
 * uses ClackPrompter; --non-interactive runs use NonInteractivePrompter.
 */

/**
 * Options for a free-text prompt
 */
export interface InputOptions {
  /** Returned when the operator submits an empty answer */
  defaultValue?: string;
  /** Hint shown in an empty field */
  placeholder?: string;
}

/**
 * Interactive prompt capability.
 */
export interface Prompter {
  /** Yes/no question */
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
  /** Free text; an empty answer yields the default */
  input(message: string, options?: InputOptions): Promise<string>;
  /** Hidden input */
  password(message: string): Promise<string>;
  /** Single choice; resolves to the chosen option */
  select(message: string, options: readonly string[], defaultIndex?: number): Promise<string>;
  /** Multiple choice; resolves to the chosen options in list order */
  multiSelect(
    message: string,
    options: readonly string[],
    defaults?: readonly string[]
  ): Promise<string[]>;
}
