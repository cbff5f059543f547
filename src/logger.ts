import chalk from "chalk";

export interface Logger {
  /** Per-item progress; dropped when quiet. */
  progress(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  quiet?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return {
    progress(message) {
      if (options.quiet) return;
      console.log(message);
    },
    info(message) {
      console.log(message);
    },
    warn(message) {
      console.error(chalk.yellow(`Warning: ${message}`));
    },
    error(message) {
      console.error(chalk.red(message));
    },
  };
}
