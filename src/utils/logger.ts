import { config, type LogLevel } from '../config';

// ANSI colors for console output
const colors = {
  reset: '\x1b[0m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  gray: '\x1b[90m',
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_COLOR: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: colors.gray,
  info: colors.green,
  warn: colors.yellow,
  error: colors.red,
};

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

function timestamp(): string {
  return new Date().toISOString().split('T')[1].slice(0, 12);
}

function formatFields(fields: LogFields | undefined): string {
  if (!fields) return '';
  const parts = Object.entries(fields).map(([key, value]) => {
    if (value instanceof Error) return `${key}=${value.message}`;
    return `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`;
  });
  return parts.length > 0 ? ` ${colors.gray}${parts.join(' ')}${colors.reset}` : '';
}

/**
 * Scoped console logger
 */
class ConsoleLogger implements Logger {
  constructor(
    private scope: string,
    private level: () => LogLevel
  ) {}

  private write(level: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level()]) return;

    const line =
      `${colors.gray}[${timestamp()}]${colors.reset} ` +
      `${LEVEL_COLOR[level]}${level.toUpperCase().padEnd(5)}${colors.reset} ` +
      `${colors.cyan}${this.scope}${colors.reset} ${message}${formatFields(fields)}`;

    if (level === 'error' || level === 'warn') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  debug(message: string, fields?: LogFields): void {
    this.write('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write('error', message, fields);
  }
}

export function createLogger(scope: string, level?: LogLevel): Logger {
  return new ConsoleLogger(scope, () => level ?? config.logging.level);
}
