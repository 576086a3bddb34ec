/**
 * add - Add two integers and print a JSON result
 *
 * OUTPUT (stdout, one line):
 *   {"success":true,"sum":12}
 *   {"error":"invalid integer: 'ten'","success":false}
 *
 * EXIT CODES:
 *   0 - Sum printed
 *   1 - A value was not an integer, or arguments were missing
 */

import type { Logger } from '@devsim/logger';
import {
  EXIT_FAILURE,
  EXIT_SUCCESS,
  formatHelp,
  parseArgs,
  reportUsageError,
  type CliIO,
  type FlagTable,
} from './cli-utils.js';
import { CliError, CliErrorCode, errorMessage } from './errors.js';

export const ADD_NAME = 'add';

export const ADD_FLAGS = {
  num1: {
    kind: 'string',
    names: ['--num1', '-N1'],
    metavar: 'NUM1',
    required: true,
    description: 'first number',
  },
  num2: {
    kind: 'string',
    names: ['--num2', '-N2'],
    metavar: 'NUM2',
    required: true,
    description: 'second number',
  },
} as const satisfies FlagTable;

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

export type AddResult = { success: true; sum: number } | { error: string; success: false };

/**
 * Parses a base-10 integer literal. Surrounding whitespace and a leading
 * sign are allowed; the value must be a safe integer.
 *
 * @throws CliError with code INVALID_NUMBER
 */
export function parseInteger(text: string): number {
  if (!INTEGER_PATTERN.test(text)) {
    throw new CliError(CliErrorCode.INVALID_NUMBER, `invalid integer: '${text}'`, { value: text });
  }

  const value = Number(text.trim());
  if (!Number.isSafeInteger(value)) {
    throw new CliError(CliErrorCode.INVALID_NUMBER, `integer out of range: '${text}'`, {
      value: text,
    });
  }

  return value;
}

/**
 * Sum of two integer literals
 *
 * @throws CliError with code INVALID_NUMBER
 */
export function addIntegers(num1: string, num2: string): number {
  const sum = parseInteger(num1) + parseInteger(num2);
  if (!Number.isSafeInteger(sum)) {
    throw new CliError(CliErrorCode.INVALID_NUMBER, 'sum out of range', { num1, num2 });
  }
  return sum;
}

export interface AddDeps {
  io: CliIO;
  logger: Logger;
}

export function add(argv: readonly string[], deps: AddDeps): number {
  const { io, logger } = deps;
  const args = parseArgs(argv, ADD_FLAGS);

  if (args.help) {
    io.stdout(formatHelp(ADD_NAME, 'Add two numbers', ADD_FLAGS));
    return EXIT_SUCCESS;
  }

  const [firstError] = args.errors;
  if (firstError !== undefined) {
    return reportUsageError(io, ADD_NAME, ADD_FLAGS, firstError);
  }

  const num1 = args.strings.get('num1') ?? '';
  const num2 = args.strings.get('num2') ?? '';

  let result: AddResult;
  try {
    result = { success: true, sum: addIntegers(num1, num2) };
  } catch (error) {
    const message = errorMessage(error);
    logger.debug('Addition failed', { num1, num2, error: message, result: 'error' });

    io.stderr(`Error: ${message}\n`);
    result = { error: message, success: false };
    io.stdout(`${JSON.stringify(result)}\n`);
    return EXIT_FAILURE;
  }

  logger.debug('Addition succeeded', { num1, num2, result: 'success' });
  io.stdout(`${JSON.stringify(result)}\n`);
  return EXIT_SUCCESS;
}
