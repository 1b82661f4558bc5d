import chalk from 'chalk';
import { YamlRunnerError, isConfigError } from '../errors.js';

/** Process exit codes */
export const ExitCode = {
  SUCCESS: 0,
  STEP_FAILED: 1,
  INTERRUPTED: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Wrap a CLI command handler with centralized error handling.
 * Catches all errors, prints user-friendly output and sets the exit code.
 */
export function withErrorHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err) {
      if (err instanceof YamlRunnerError) {
        // Multi-issue messages already carry a marker per line
        console.error(chalk.red(err.message.startsWith('✗') ? err.message : `✗ ${err.message}`));
        if (err.hint) {
          console.error(chalk.dim(`  ${err.hint}`));
        }
        // Load, selection and resolution errors get exit code 3
        process.exitCode = isConfigError(err) ? ExitCode.CONFIG_ERROR : ExitCode.STEP_FAILED;
        return;
      }
      if (err instanceof Error) {
        console.error(chalk.red(`✗ ${err.message}`));
      } else {
        console.error(chalk.red('✗ An unexpected error occurred'));
      }
      process.exitCode = ExitCode.STEP_FAILED;
    }
  };
}
