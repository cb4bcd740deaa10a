import chalk from 'chalk';

type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug';

const LOG_PREFIXES: Record<LogLevel, string> = {
  info: chalk.blue('ℹ'),
  success: chalk.green('✓'),
  warn: chalk.yellow('⚠'),
  error: chalk.red('✗'),
  debug: chalk.gray('⋯'),
};

/**
 * Tagged console logger. Messages read `[Tag] message`; debug output only
 * appears in verbose mode.
 */
export class Logger {
  constructor(
    private readonly tag?: string,
    private readonly state: { verbose: boolean } = { verbose: false }
  ) {}

  setVerbose(verbose: boolean): void {
    this.state.verbose = verbose;
  }

  isVerbose(): boolean {
    return this.state.verbose;
  }

  /**
   * Logger sharing this one's verbosity under a different tag
   */
  child(tag: string): Logger {
    return new Logger(tag, this.state);
  }

  info(message: string, ...args: unknown[]): void {
    console.log(`${LOG_PREFIXES.info} ${this.format(message)}`, ...args);
  }

  success(message: string, ...args: unknown[]): void {
    console.log(`${LOG_PREFIXES.success} ${chalk.green(this.format(message))}`, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(`${LOG_PREFIXES.warn} ${chalk.yellow(this.format(message))}`, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(`${LOG_PREFIXES.error} ${chalk.red(this.format(message))}`, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.isVerbose()) {
      console.log(`${LOG_PREFIXES.debug} ${chalk.gray(this.format(message))}`, ...args);
    }
  }

  divider(): void {
    console.log(chalk.gray('─'.repeat(60)));
  }

  header(title: string): void {
    console.log();
    console.log(chalk.bold.cyan(title));
    this.divider();
  }

  private format(message: string): string {
    return this.tag ? `[${this.tag}] ${message}` : message;
  }
}

export const logger = new Logger();
