/**
 * run-command - Mock network-device command runner
 *
 * Prints what a device would answer to `-command`, without connecting to
 * anything. `-device_ip` is only used to name the file written by `-save`.
 *
 * STREAMS:
 * - stdout carries the device output and nothing else
 * - stderr carries save notices, errors and log lines
 *
 * EXIT CODES:
 *   0 - Output printed (even if -save failed), -list, --help, or SIGINT
 *   1 - Usage error or unexpected failure
 */

import {
  createDefaultContext,
  executeMockCommand,
  isMockCommand,
  listMockCommands,
  type GeneratorContext,
} from '@devsim/mock-device';
import { measureSync, type Logger } from '@devsim/logger';
import {
  EXIT_FAILURE,
  EXIT_SUCCESS,
  formatHelp,
  parseArgs,
  reportUsageError,
  type CliIO,
  type FlagTable,
} from './cli-utils.js';
import { errorMessage } from './errors.js';
import { buildOutputFilename, saveOutput } from './save-output.js';
import type { ScriptsConfig } from './config/index.js';

export const RUN_COMMAND_NAME = 'run-command';

export const DEFAULT_COMMAND = 'show version';

export const INTERRUPT_MESSAGE = '\n\n% Command interrupted\n';

export const RUN_COMMAND_FLAGS = {
  device_ip: {
    kind: 'string',
    names: ['-device_ip'],
    metavar: 'DEVICE_IP',
    description: 'IP address of the device',
  },
  command: {
    kind: 'string',
    names: ['-command'],
    metavar: 'COMMAND',
    default: DEFAULT_COMMAND,
    description: `Command to execute (default: ${DEFAULT_COMMAND})`,
  },
  save: {
    kind: 'boolean',
    names: ['-save'],
    description: 'Save output to file',
  },
  list: {
    kind: 'boolean',
    names: ['-list'],
    description: 'List all available commands',
  },
} as const satisfies FlagTable;

const EPILOG = `
Examples:
  run-command -device_ip 1.1.1.1 -command "show version"
  run-command -device_ip 192.168.1.1 -command "show version" -save
  run-command -list
`;

export interface RunCommandDeps {
  io: CliIO;
  config: ScriptsConfig;
  logger: Logger;
  /** Randomness and clock for generation and the saved file's timestamp */
  context?: GeneratorContext;
}

/**
 * Runs one invocation and returns its exit code.
 *
 * @example
 * const code = runCommand(['-device_ip', '10.0.0.1'], { io, config, logger });
 */
export function runCommand(argv: readonly string[], deps: RunCommandDeps): number {
  const { io, config, logger } = deps;
  const ctx = deps.context ?? createDefaultContext();
  const args = parseArgs(argv, RUN_COMMAND_FLAGS);

  if (args.help) {
    io.stdout(
      formatHelp(RUN_COMMAND_NAME, 'Network device command simulator', RUN_COMMAND_FLAGS, EPILOG)
    );
    return EXIT_SUCCESS;
  }

  // -list wins over anything else on the line, including malformed flags
  if (args.booleans.has('list')) {
    for (const name of listMockCommands()) {
      io.stdout(`${name}\n`);
    }
    return EXIT_SUCCESS;
  }

  const [firstError] = args.errors;
  if (firstError !== undefined) {
    return reportUsageError(io, RUN_COMMAND_NAME, RUN_COMMAND_FLAGS, firstError);
  }

  const deviceIp = args.strings.get('device_ip');
  if (!deviceIp) {
    return reportUsageError(
      io,
      RUN_COMMAND_NAME,
      RUN_COMMAND_FLAGS,
      '-device_ip is required (unless using -list)'
    );
  }

  const command = args.strings.get('command') ?? DEFAULT_COMMAND;
  const log = logger.child({ device_ip: deviceIp, command });

  let output: string;
  try {
    const { result, duration_ms } = measureSync(() => executeMockCommand(command, ctx));
    output = result;
    log.debug('Generated mock output', {
      known: isMockCommand(command),
      duration_ms,
      result: 'success',
    });
  } catch (error) {
    log.debug('Mock command failed', { error: errorMessage(error), result: 'error' });
    io.stderr(`\n% Error: ${errorMessage(error)}\n`);
    return EXIT_FAILURE;
  }

  io.stdout(`${output}\n`);

  if (args.booleans.has('save')) {
    const filename = buildOutputFilename(deviceIp, command, ctx.now());
    try {
      const filePath = saveOutput(config.output.saveDir, filename, output);
      io.stderr(`\nOutput saved to ${filePath}\n`);
      log.info('Output saved', { path: filePath, result: 'success' });
    } catch (error) {
      // The device output is already on stdout; a failed save does not fail the run.
      // Logged at debug only, the ERROR line above is the report.
      io.stderr(`\nERROR: Failed to save file: ${errorMessage(error)}\n`);
      log.debug('Failed to save output', { filename, error: errorMessage(error), result: 'error' });
    }
  }

  return EXIT_SUCCESS;
}
