import chalk from 'chalk';
import ora from 'ora';
import type { Ora } from 'ora';

export interface SpinnerHandle {
  start(text: string): SpinnerHandle;
  update(text: string): SpinnerHandle;
  succeed(text?: string): SpinnerHandle;
  fail(text?: string): SpinnerHandle;
  stop(): void;
}

/**
 * Simple wrapper around ora providing chainable API and consistent colors.
 */
export function createSpinner(): SpinnerHandle {
  let spinner: Ora | undefined;

  function ensure(text: string) {
    if (!spinner) spinner = ora(text).start();
    else spinner.text = text;
  }

  return {
    start(text: string) {
      ensure(text);
      return this;
    },
    update(text: string) {
      if (spinner) spinner.text = text;
      return this;
    },
    succeed(text?: string) {
      spinner?.succeed(text && chalk.green(text));
      return this;
    },
    fail(text?: string) {
      spinner?.fail(text && chalk.red(text));
      return this;
    },
    stop() {
      spinner?.stop();
    },
  };
}

export const symbols = {
  success: chalk.green('✔'),
  fail: chalk.red('✖'),
  warn: chalk.yellow('⚠'),
  info: chalk.cyan('ℹ'),
};

export function heading(title: string) {
  console.log('\n' + chalk.bold.blue(title));
}

export function kv(label: string, value: string) {
  console.log('  ' + chalk.gray(label + ':') + ' ' + chalk.white(value));
}

/** Lightweight render helpers to avoid scattered console.log formatting */
export const render = {
  info(msg: string) {
    console.log(symbols.info + ' ' + chalk.cyan(msg));
  },
  warn(msg: string) {
    console.log(symbols.warn + ' ' + chalk.yellow(msg));
  },
};
