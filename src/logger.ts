import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
}

function debugEnabled(): boolean {
  return process.env.DEBUG === '1';
}

/**
 * Console logger tagged with a component name. Debug lines only appear
 * when DEBUG=1 is set, and go to stderr.
 */
export function createLogger(component: string): Logger {
  return {
    debug(message: string): void {
      if (!debugEnabled()) return;
      console.error(chalk.gray(`[DEBUG] [${component}] ${message}`));
    },
    warn(message: string): void {
      console.warn(chalk.yellow(`[${component}] ${message}`));
    },
  };
}
