import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

function debugEnabled(): boolean {
  return Boolean(process.env.COMMITSMITH_DEBUG);
}

/**
 * Console logger. Debug lines go to stderr and only when COMMITSMITH_DEBUG is set,
 * so hook runs stay silent unless asked.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[commitsmith:${scope}]`;

  return {
    debug(message) {
      if (debugEnabled()) {
        console.error(chalk.gray(`${prefix} ${message}`));
      }
    },
    info(message) {
      console.log(message);
    },
    warn(message) {
      console.error(chalk.yellow(message));
    },
    error(message) {
      console.error(chalk.red(message));
    }
  };
}
