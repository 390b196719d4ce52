import chalk from 'chalk';

/**
 * Where pipeline components write progress. The CLI passes the console
 * logger; tests pass their own.
 */
export interface ProvisionLogger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type Clock = () => Date;

/**
 * Console logger that prefixes every line with an ISO timestamp
 */
export class ConsoleLogger implements ProvisionLogger {
  constructor(private readonly clock: Clock = () => new Date()) {}

  info(message: string): void {
    console.log(`${this.stamp()} ${message}`);
  }

  success(message: string): void {
    console.log(`${this.stamp()} ${chalk.green(message)}`);
  }

  warn(message: string): void {
    console.warn(`${this.stamp()} ${chalk.yellow(message)}`);
  }

  error(message: string): void {
    console.error(`${this.stamp()} ${chalk.red(message)}`);
  }

  private stamp(): string {
    return chalk.gray(`[${this.clock().toISOString()}]`);
  }
}
