import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

let currentLogLevel: LogLevel = 'info';

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Set the minimum level that reaches the console
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

/**
 * Get the minimum level that reaches the console
 */
export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

function shouldLog(level: LogLevel): boolean {
  return levelPriority[level] >= levelPriority[currentLogLevel];
}

/**
 * Console logger for the agentnet CLI
 */
export const logger = {
  /**
   * Network and agent progress; shown under --verbose
   */
  debug(message: string, ...args: unknown[]): void {
    if (shouldLog('debug')) {
      console.log(chalk.gray(`[debug] ${message}`), ...args);
    }
  },

  info(message: string, ...args: unknown[]): void {
    if (shouldLog('info')) {
      console.log(message, ...args);
    }
  },

  /**
   * Log a completed step in green
   */
  success(message: string, ...args: unknown[]): void {
    if (shouldLog('info')) {
      console.log(chalk.green(`✓ ${message}`), ...args);
    }
  },

  warn(message: string, ...args: unknown[]): void {
    if (shouldLog('warn')) {
      console.warn(chalk.yellow(`⚠ ${message}`), ...args);
    }
  },

  error(message: string, ...args: unknown[]): void {
    if (shouldLog('error')) {
      console.error(chalk.red(`✗ ${message}`), ...args);
    }
  },

  /**
   * Log a section header
   */
  section(title: string): void {
    if (shouldLog('info')) {
      console.log();
      console.log(chalk.bold.blue(title));
      console.log(chalk.blue('─'.repeat(title.length)));
    }
  },

  /**
   * Log an indented `key: value` line, e.g. one agent's observation.
   * Values other than strings and numbers are printed as JSON.
   */
  keyValue(key: string, value: unknown): void {
    if (shouldLog('info')) {
      const text =
        typeof value === 'string' || typeof value === 'number'
          ? String(value)
          : JSON.stringify(value);
      console.log(`  ${chalk.dim(key + ':')} ${text}`);
    }
  },

  /**
   * Log an empty line
   */
  blank(): void {
    if (shouldLog('info')) {
      console.log();
    }
  },
};
