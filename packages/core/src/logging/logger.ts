/**
 * Logger - Diagnostic logging for the engine
 *
 * Progress and failures go to stderr so that stdout only carries
 * visitor reports.
 */

import chalk from 'chalk';

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

/**
 * Anything with a `write` method, typically process.stderr
 */
export interface LogStream {
  write(chunk: string): unknown;
}

export interface ConsoleLoggerOptions {
  /** Emit debug messages */
  verbose?: boolean;
  /** Destination stream (default: process.stderr) */
  stream?: LogStream;
  /** Line prefix (default: [surveyor]) */
  prefix?: string;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const stream = options.stream ?? process.stderr;
  const prefix = options.prefix ?? '[surveyor]';
  const verbose = options.verbose ?? false;

  const line = (text: string): void => {
    stream.write(`${text}\n`);
  };

  return {
    error: (msg) => line(chalk.red(`${prefix} ${msg}`)),
    warn: (msg) => line(chalk.yellow(`${prefix} ${msg}`)),
    info: (msg) => line(`${chalk.dim(prefix)} ${msg}`),
    debug: (msg) => {
      if (verbose) {
        line(chalk.dim(`${prefix} DEBUG: ${msg}`));
      }
    },
  };
}

export function createSilentLogger(): Logger {
  const noop = (): void => undefined;
  return { error: noop, warn: noop, info: noop, debug: noop };
}
