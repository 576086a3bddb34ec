/**
 * echo - Print the value of --echo
 */

import type { Logger } from '@devsim/logger';
import {
  EXIT_SUCCESS,
  formatHelp,
  parseArgs,
  reportUsageError,
  type CliIO,
  type FlagTable,
} from './cli-utils.js';

export const ECHO_NAME = 'echo';

export const ECHO_FLAGS = {
  echo: {
    kind: 'string',
    names: ['--echo', '-ec'],
    metavar: 'ECHO',
    required: true,
    description: 'text to print',
  },
} as const satisfies FlagTable;

export interface EchoDeps {
  io: CliIO;
  logger: Logger;
}

export function echo(argv: readonly string[], deps: EchoDeps): number {
  const { io, logger } = deps;
  const args = parseArgs(argv, ECHO_FLAGS);

  if (args.help) {
    io.stdout(formatHelp(ECHO_NAME, 'Print the given text', ECHO_FLAGS));
    return EXIT_SUCCESS;
  }

  const [firstError] = args.errors;
  if (firstError !== undefined) {
    return reportUsageError(io, ECHO_NAME, ECHO_FLAGS, firstError);
  }

  const text = args.strings.get('echo') ?? '';
  logger.debug('Echoing text', { length: text.length });
  io.stdout(`${text}\n`);
  return EXIT_SUCCESS;
}
