import chalk from "chalk";

export interface ILogger {
  info(message: string): void;
  warn(message: string): void;
  debug(message: string): void;
  success(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Print debug lines. Defaults to true when RULESETBOT_DEBUG is set. */
  debug?: boolean;
}

/**
 * Console logger used by the CLI and as the default for every component.
 */
export class Logger implements ILogger {
  private readonly debugEnabled: boolean;

  constructor(options?: LoggerOptions) {
    this.debugEnabled =
      options?.debug ?? Boolean(process.env.RULESETBOT_DEBUG);
  }

  info(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.log(chalk.yellow(`⚠️  ${message}`));
  }

  debug(message: string): void {
    if (this.debugEnabled) {
      console.log(chalk.gray(`[debug] ${message}`));
    }
  }

  success(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  }

  error(message: string): void {
    console.error(chalk.red(`✗ ${message}`));
  }
}

export const logger = new Logger();
