import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LineKind = LogLevel | 'success';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

interface LineStyle {
  threshold: LogLevel;
  label: string;
  paint: (text: string) => string;
}

const STYLES: Record<LineKind, LineStyle> = {
  debug: { threshold: 'debug', label: chalk.cyan('debug'), paint: chalk.gray },
  info: { threshold: 'info', label: chalk.blue('info'), paint: text => text },
  success: { threshold: 'info', label: chalk.green('done'), paint: chalk.green },
  warn: { threshold: 'warn', label: chalk.yellow('warn'), paint: chalk.yellow },
  error: { threshold: 'error', label: chalk.red('error'), paint: chalk.red },
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

/**
 * Diagnostic output goes to stderr; stdout is reserved for command results
 * such as release listings. Lines carry a timestamp only at debug level.
 */
export class Logger {
  private static instance: Logger;
  private logLevel: LogLevel = 'info';

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }

  debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  /** Completion of a user-visible step, such as an install. */
  success(message: string, meta?: unknown): void {
    this.write('success', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }

  private write(kind: LineKind, message: string, meta: unknown): void {
    const style = STYLES[kind];
    if (LEVELS[style.threshold] < LEVELS[this.logLevel]) {
      return;
    }

    const stamp = this.logLevel === 'debug' ? `${chalk.gray(new Date().toISOString())} ` : '';
    console.error(`${stamp}pyroost ${style.label}: ${style.paint(message)}${describe(meta)}`);
  }
}

function describe(meta: unknown): string {
  if (meta === undefined || meta === null) {
    return '';
  }
  if (meta instanceof Error) {
    return chalk.red(` (${meta.message})`);
  }
  if (typeof meta === 'string') {
    return chalk.gray(` (${meta})`);
  }

  try {
    return chalk.gray(` (${JSON.stringify(meta)})`);
  } catch {
    return chalk.gray(` (${String(meta)})`);
  }
}

export const logger = Logger.getInstance();
