/**
 * Diagnostic logger
 * Writes to the console's error-side streams so that progress output on stdout stays clean
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogContext {
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  gray: '\x1b[90m',
  cyan: '\x1b[36m',
  blue: '\x1b[34m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
  green: '\x1b[32m',
} as const;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

let minimumLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL)
  ? process.env.LOG_LEVEL
  : 'warn';

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];
}

class Logger {
  private prefix: string;

  constructor(prefix: string = '') {
    this.prefix = prefix;
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    context?: LogContext
  ): string {
    const timestamp = new Date().toISOString();
    const prefixStr = this.prefix ? `[${this.prefix}] ` : '';
    const contextStr = context ? `\n${JSON.stringify(context, null, 2)}` : '';

    let levelColor: string;
    let levelLabel: string;

    switch (level) {
      case 'debug':
        levelColor = colors.gray;
        levelLabel = 'DEBUG';
        break;
      case 'info':
        levelColor = colors.cyan;
        levelLabel = 'INFO';
        break;
      case 'warn':
        levelColor = colors.yellow;
        levelLabel = 'WARN';
        break;
      case 'error':
        levelColor = colors.red;
        levelLabel = 'ERROR';
        break;
    }

    return `${colors.gray}[${timestamp}]${colors.reset} ${levelColor}[${levelLabel}]${colors.reset} ${colors.magenta}${prefixStr}${colors.reset}${message}${colors.green}${contextStr}${colors.reset}`;
  }

  debug(message: string, context?: LogContext): void {
    if (!isEnabled('debug')) return;
    console.debug(this.formatMessage('debug', message, context));
  }

  info(message: string, context?: LogContext): void {
    if (!isEnabled('info')) return;
    // console.info goes to stdout; keep it beside the other diagnostics
    console.error(this.formatMessage('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    if (!isEnabled('warn')) return;
    console.warn(this.formatMessage('warn', message, context));
  }

  private formatError(error: Error | unknown): string {
    if (!(error instanceof Error)) {
      return `\n${colors.red}Error details:${colors.reset}\n${JSON.stringify(error, null, 2)}`;
    }

    let output = `\n${colors.red}${error.name}: ${error.message}${colors.reset}`;

    // Add stack trace (skip first line which is the error message)
    if (error.stack) {
      const stackLines = error.stack.split('\n').slice(1);
      output += `\n${colors.gray}${stackLines.join('\n')}${colors.reset}`;
    }

    // Handle error cause chain
    if ('cause' in error && error.cause) {
      output += `\n\n${colors.yellow}Caused by:${colors.reset}`;
      output += this.formatError(error.cause);
    }

    return output;
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    if (!isEnabled('error')) return;

    const timestamp = new Date().toISOString();
    const prefixStr = this.prefix ? `[${this.prefix}] ` : '';

    let output = `${colors.gray}[${timestamp}]${colors.reset} ${colors.red}[ERROR]${colors.reset} ${colors.magenta}${prefixStr}${colors.reset}${message}`;

    // Merge context with ExtendedError details if present
    let mergedContext: LogContext = { ...context };
    if (
      error &&
      typeof error === 'object' &&
      'details' in error &&
      typeof error.details === 'object' &&
      error.details !== null
    ) {
      mergedContext = {
        ...mergedContext,
        ...error.details,
      };
    }

    if (Object.keys(mergedContext).length > 0) {
      output += `\n${colors.green}Context:${colors.reset}\n${JSON.stringify(mergedContext, null, 2)}`;
    }

    if (error) {
      output += this.formatError(error);
    }

    console.error(output);
  }
}

export type { Logger };

// Helper to create logger with specific prefix
export function createLogger(prefix: string): Logger {
  return new Logger(prefix);
}
