/**
 * Spinner - Progress feedback on stderr
 *
 * Spinners and status lines write to stderr so that report output on
 * stdout stays machine-readable.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';

export type SpinnerColor = 'black' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white' | 'gray';

export interface SpinnerOptions {
  text?: string;
  color?: SpinnerColor;
  /** Whether to animate; off in CI and when stderr is not a terminal */
  enabled?: boolean;
}

/**
 * Spinner wrapper for consistent CLI feedback
 */
export class Spinner {
  private spinner: Ora;

  constructor(options: SpinnerOptions = {}) {
    const enabled = options.enabled ?? (!process.env['CI'] && Boolean(process.stderr.isTTY));
    const baseOptions = {
      color: options.color ?? 'cyan',
      isEnabled: enabled,
      stream: process.stderr,
    } as const;

    this.spinner = options.text ? ora({ ...baseOptions, text: options.text }) : ora(baseOptions);
  }

  start(): this {
    this.spinner.start();
    return this;
  }

  succeed(text?: string): this {
    this.spinner.succeed(text);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }
}

export function createSpinner(text: string): Spinner {
  return new Spinner({ text });
}

/**
 * Run an async operation with a spinner; a null spinner runs it silently
 */
export async function withSpinner<T>(
  spinner: Spinner | null,
  operation: () => Promise<T>,
  successText?: (result: T) => string
): Promise<T> {
  spinner?.start();
  try {
    const result = await operation();
    spinner?.succeed(successText?.(result));
    return result;
  } catch (error) {
    spinner?.fail(error instanceof Error ? error.message : String(error));
    throw error;
  }
}

/**
 * Status indicators for non-spinner output
 */
export const status = {
  success(message: string): void {
    console.error(chalk.green('✔'), message);
  },

  error(message: string): void {
    console.error(chalk.red('✖'), message);
  },

  warning(message: string): void {
    console.error(chalk.yellow('⚠'), message);
  },
};
