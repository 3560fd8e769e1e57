/**
 * Console Logger - prefixed, colored output lines
 *
 * Every line starts with the program tag and carries no timestamp. Errors
 * are red, warnings yellow; debug lines only appear in verbose mode.
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import type { Logger } from 'optassert-core';

/** Tag prefixed to every output line */
export const PROGRAM_TAG = 'optassert: ';

/**
 * Anything lines can be written to
 */
export interface OutputStream {
  write(text: string): unknown;
}

export interface ConsoleLoggerOptions {
  /** Show debug lines */
  verbose?: boolean | undefined;
  /** Destination, stdout by default */
  stream?: OutputStream | undefined;
  /** Force colors on or off; detected from the terminal otherwise */
  color?: boolean | undefined;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const stream = options.stream ?? process.stdout;
  const verbose = options.verbose ?? false;
  let colors: ChalkInstance = chalk;
  if (options.color !== undefined) {
    colors = new Chalk({ level: options.color ? 1 : 0 });
  }

  const writeLine = (message: string): void => {
    stream.write(`${PROGRAM_TAG}${message}\n`);
  };

  return {
    error: (message) => writeLine(colors.red(message)),
    warn: (message) => writeLine(colors.yellow(message)),
    info: (message) => writeLine(message),
    debug: (message) => {
      if (verbose) {
        writeLine(colors.dim(message));
      }
    },
  };
}
