import { parseArgs } from 'util';

import { UsageException } from './usage.exception';

export interface CliOptions {
  once: boolean;
  debug: boolean;
  help: boolean;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = [
  'Usage: ticker-sheet-sync [options]',
  '',
  'Writes ticker prices and an exchange rate to a Google spreadsheet during market hours.',
  '',
  'Options:',
  '  --once       run a single update cycle regardless of market hours, then exit',
  '  --debug      log at debug level',
  '  -h, --help   show this message',
].join('\n');

export function parseCliOptions(argv: readonly string[]): CliOptions {
  try {
    const { values } = parseArgs({
      args: [...argv],
      options: {
        once: { type: 'boolean', default: false },
        debug: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
      strict: true,
      allowPositionals: false,
    });

    return {
      once: values.once ?? false,
      debug: values.debug ?? false,
      help: values.help ?? false,
    };
  } catch (error) {
    throw new UsageException(
      error instanceof Error ? error.message : String(error),
    );
  }
}

export interface CliOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

export type CliResolution =
  | { action: 'run'; options: CliOptions }
  | { action: 'exit'; exitCode: number };

const processOutput: CliOutput = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

/**
 * Parses `argv` and settles the cases that end before the application
 * starts: a usage error (exit 2, message on stderr) and `--help` (exit 0).
 */
export function resolveCliOptions(
  argv: readonly string[],
  output: CliOutput = processOutput,
): CliResolution {
  let options: CliOptions;
  try {
    options = parseCliOptions(argv);
  } catch (error) {
    if (error instanceof UsageException) {
      output.stderr(`${error.message}\n\n${USAGE}\n`);
      return { action: 'exit', exitCode: EXIT_USAGE };
    }
    throw error;
  }

  if (options.help) {
    output.stdout(`${USAGE}\n`);
    return { action: 'exit', exitCode: EXIT_OK };
  }

  return { action: 'run', options };
}
