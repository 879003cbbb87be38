import chalk from 'chalk';

import {
  isAcmeRegistrationError,
  isRegistrationError,
  isTermsNotAcceptedError,
} from '../../index.js';

/** Render an error raised by a CLI command on stderr. */
export function handleError(error: unknown): void {
  if (isTermsNotAcceptedError(error)) {
    console.error(chalk.yellow('Terms of Service not accepted:'), error.message);
    console.error(chalk.gray('Re-run with --agree-tos to accept them.'));
  } else if (isRegistrationError(error)) {
    console.error(chalk.red('Registration failed:'), error.message);
    if (error.problem?.instance) {
      console.error(chalk.gray(`See ${error.problem.instance}`));
    }
  } else if (isAcmeRegistrationError(error)) {
    console.error(chalk.red('Error:'), error.message);
    if (error.cause instanceof Error) {
      console.error(chalk.gray(`Caused by: ${error.cause.message}`));
    }
  } else if (error instanceof Error) {
    console.error(chalk.red('Error:'), error.message);
  } else {
    console.error('Unknown error:', error);
  }
}
