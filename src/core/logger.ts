import chalk from 'chalk';

/**
 * Scoped, leveled logger.
 *
 * Everything goes to stderr: stdout belongs to CLI output (tables, JSON)
 * and to the MCP stdio transport.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_LABEL: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: chalk.dim('DEBUG'),
  info: chalk.cyan('INFO '),
  warn: chalk.yellow('WARN '),
  error: chalk.red('ERROR'),
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

// Until config is loaded, honor LOG_LEVEL directly so early messages respect it
const envLevel = process.env.LOG_LEVEL?.toLowerCase();
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export type LogContext = Record<string, unknown>;

export class Logger {
  constructor(public readonly scope: string) {}

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[currentLevel]) return;

    const parts = [
      chalk.dim(new Date().toISOString()),
      LEVEL_LABEL[level],
      chalk.magenta(`[${this.scope}]`),
      message,
    ];
    if (context && Object.keys(context).length > 0) {
      parts.push(chalk.dim(JSON.stringify(context)));
    }
    console.error(parts.join(' '));
  }
}

export function createLogger(scope: string): Logger {
  return new Logger(scope);
}
