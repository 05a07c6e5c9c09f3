/**
 * Logger for homelab-setup
 *
 * Supports human-readable and JSON output modes.
 */

import type { SetupError } from '../core/errors.js';

/**
 * Output mode for the logger
 */
export type OutputMode = 'human' | 'json';

/**
 * JSON output structure for commands
 */
export interface JsonOutput {
  success: boolean;
  command?: string;
  data?: Record<string, unknown>;
  error?: {
    code: string;
    message: string;
    suggestion?: string;
  };
}

/**
 * Options accepted by {@link Logger.fromOptions}.
 */
export interface LoggerOptions {
  json?: boolean;
  verbose?: boolean;
}

/**
 * Logger class supporting human-readable and JSON output modes.
 *
 * Human mode outputs text with symbols.
 * JSON mode collects all output and emits a single JSON object at the end.
 */
export class Logger {
  private mode: OutputMode;
  private readonly verbose: boolean;
  private jsonBuffer: JsonOutput;
  private indentLevel: number = 0;

  constructor(mode: OutputMode = 'human', verbose: boolean = false) {
    this.mode = mode;
    this.verbose = verbose;
    this.jsonBuffer = { success: true };
  }

  /**
   * Get the current output mode.
   */
  getMode(): OutputMode {
    return this.mode;
  }

  /**
   * Increase indent level for nested output.
   */
  indent(): void {
    this.indentLevel++;
  }

  /**
   * Decrease indent level.
   */
  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  private getIndent(): string {
    return '  '.repeat(this.indentLevel);
  }

  /**
   * Print a section header, underlined.
   */
  header(title: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}${title}`);
      console.log(`${this.getIndent()}${'='.repeat(title.length)}`);
    }
  }

  /**
   * Announce the start of a setup step.
   */
  step(name: string, description?: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}▶ ${name}`);
      if (description) {
        console.log(`${this.getIndent()}  ${description}`);
      }
    }
  }

  /**
   * Log a success message.
   */
  success(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}✓ ${message}`);
    }
  }

  /**
   * Log an error message.
   */
  error(message: string, error?: SetupError): void {
    if (this.mode === 'human') {
      console.error(`${this.getIndent()}✗ ${message}`);
      if (error?.suggestion) {
        console.error(`${this.getIndent()}  Fix: ${error.suggestion}`);
      }
    } else {
      this.jsonBuffer.success = false;
      this.jsonBuffer.error = {
        code: error?.code ?? 'UNKNOWN',
        message,
        suggestion: error?.suggestion,
      };
    }
  }

  /**
   * Log an info message.
   */
  info(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}${message}`);
    }
  }

  /**
   * Log a warning message.
   */
  warning(message: string): void {
    if (this.mode === 'human') {
      console.warn(`${this.getIndent()}⚠ ${message}`);
    }
  }

  /**
   * Log a debug message. Only shown with --verbose.
   */
  debug(message: string): void {
    if (this.mode === 'human' && this.verbose) {
      console.error(`${this.getIndent()}· ${message}`);
    }
  }

  /**
   * Log a table of data.
   */
  table(headers: string[], rows: string[][]): void {
    if (this.mode === 'human') {
      const widths = headers.map((h, i) => {
        const maxRowWidth = Math.max(0, ...rows.map((r) => (r[i] ?? '').length));
        return Math.max(h.length, maxRowWidth);
      });

      const headerLine = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join('  ');
      console.log(`${this.getIndent()}${headerLine.trimEnd()}`);

      for (const row of rows) {
        const rowLine = row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ');
        console.log(`${this.getIndent()}${rowLine.trimEnd()}`);
      }
    }
  }

  /**
   * Print raw text (a rendered config or QR code) without indentation.
   */
  raw(text: string): void {
    if (this.mode === 'human') {
      console.log(text);
    }
  }

  /**
   * Print a blank line.
   */
  newline(): void {
    if (this.mode === 'human') {
      console.log();
    }
  }

  /**
   * Set the command name for JSON output.
   */
  setCommand(command: string): void {
    this.jsonBuffer.command = command;
  }

  /**
   * Set data for JSON output.
   */
  setData(data: Record<string, unknown>): void {
    this.jsonBuffer.data = data;
  }

  /**
   * Add data to the JSON output (merges with existing data).
   */
  addData(key: string, value: unknown): void {
    if (!this.jsonBuffer.data) {
      this.jsonBuffer.data = {};
    }
    this.jsonBuffer.data[key] = value;
  }

  /**
   * Set success status for JSON output.
   */
  setSuccess(success: boolean): void {
    this.jsonBuffer.success = success;
  }

  /**
   * Flush JSON output to stdout.
   *
   * Only does something in JSON mode.
   */
  flush(): void {
    if (this.mode === 'json') {
      console.log(JSON.stringify(this.jsonBuffer, null, 2));
    }
  }

  /**
   * Get the JSON buffer (for testing).
   */
  getJsonBuffer(): JsonOutput {
    return this.jsonBuffer;
  }

  /**
   * Create a logger from CLI options.
   */
  static fromOptions(options: LoggerOptions): Logger {
    return new Logger(options.json ? 'json' : 'human', options.verbose ?? false);
  }
}
