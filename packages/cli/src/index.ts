/**
 * optassert CLI
 *
 * Usage: optassert -f <compiler output> [-p <source root>] [--no-fail]
 */

import { Command, CommanderError } from 'commander';

import { EXIT_OK, EXIT_VIOLATIONS, executeCheck, type CheckCommandOptions } from './commands/check.js';
import { createConsoleLogger, type OutputStream } from './ui/console-logger.js';

export const VERSION = '0.1.0';

/**
 * Where the CLI writes. Defaults to the process streams.
 */
export interface CliIO {
  stdout?: OutputStream | undefined;
  stderr?: OutputStream | undefined;
  /** Force colors on or off */
  color?: boolean | undefined;
}

/** Long flags also accepted with a single dash */
const SINGLE_DASH_FLAGS = ['-pkg', '-no-fail'];

const TRUE_VALUES = ['1', 't', 'T', 'true', 'TRUE', 'True'];
const FALSE_VALUES = ['0', 'f', 'F', 'false', 'FALSE', 'False'];

/**
 * Rewrite `-pkg` and `-no-fail` (with or without `=value`) to their
 * double-dash spelling so commander can parse them. An explicit boolean on
 * `--no-fail` is resolved here: true keeps the flag, false drops it.
 */
export function normalizeArgs(args: readonly string[]): string[] {
  return args.flatMap((arg) => {
    const [flag = arg, value] = arg.split(/=(.*)/s, 2);
    const normalized = SINGLE_DASH_FLAGS.includes(flag) ? `-${arg}` : arg;

    if (value !== undefined && (flag === '-no-fail' || flag === '--no-fail')) {
      if (TRUE_VALUES.includes(value)) {return ['--no-fail'];}
      if (FALSE_VALUES.includes(value)) {return [];}
    }
    return [normalized];
  });
}

/**
 * Build the program. `onExit` receives the exit code of the action.
 */
export function createProgram(io: CliIO = {}, onExit: (code: number) => void = () => undefined): Command {
  const stdout = io.stdout ?? process.stdout;
  const stderr = io.stderr ?? process.stderr;

  const program = new Command('optassert')
    .description('Check performance annotations against compiler optimization diagnostics')
    .version(VERSION)
    .option('-f, --file <path>', 'Path to the compiler output file')
    .option('-p, --pkg <path>', 'Path to the package directory', '.')
    .option('--no-fail', 'Exit with status code 0 even if errors are found (--no-fail=false keeps failing)')
    .option('-c, --config <path>', 'Path to a config file (default: <pkg>/.optassert/config.json)')
    .option('-v, --verbose', 'Print debug output')
    .configureOutput({
      writeOut: (text) => stdout.write(text),
      writeErr: (text) => stderr.write(text),
    })
    .exitOverride();

  program.action((options: CheckCommandOptions) => {
    const logger = createConsoleLogger({ verbose: options.verbose, stream: stdout, color: io.color });

    if (!options.file) {
      logger.error('error: compiler output file is required');
      program.outputHelp({ error: true });
      onExit(EXIT_VIOLATIONS);
      return;
    }

    onExit(executeCheck({ ...options, file: options.file }, logger));
  });

  return program;
}

/**
 * Parse `args` (without the node and script entries), run, and return the
 * exit code.
 */
export function runCli(args: readonly string[], io: CliIO = {}): number {
  let exitCode = EXIT_OK;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    program.parse(normalizeArgs(args), { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
