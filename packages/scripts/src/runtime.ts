/**
 * Process wiring shared by the bin/ entry points
 */

import { attachGlobalHandlers, createChildLogger, createLogger, type Logger } from '@devsim/logger';
import { EXIT_FAILURE, EXIT_SUCCESS, processIO, type CliIO } from './cli-utils.js';
import { getConfigSummary, loadConfig, type ScriptsConfig } from './config/index.js';
import { errorMessage } from './errors.js';

export interface ScriptDeps {
  io: CliIO;
  config: ScriptsConfig;
  logger: Logger;
}

export type ScriptMain = (argv: readonly string[], deps: ScriptDeps) => number;

export interface StartOptions {
  /** Text written to stderr on SIGINT before exiting 0. Omit to keep Node's default. */
  interruptMessage?: string;
  argv?: readonly string[];
  io?: CliIO;
}

/**
 * Loads config, creates the logger, installs process handlers and runs
 * `main`, storing its result in process.exitCode.
 */
export function startScript(name: string, main: ScriptMain, options: StartOptions = {}): void {
  const io = options.io ?? processIO;
  const argv = options.argv ?? process.argv.slice(2);

  let config: ScriptsConfig;
  try {
    config = loadConfig();
  } catch (error) {
    io.stderr(`\n% Error: ${errorMessage(error)}\n`);
    process.exitCode = EXIT_FAILURE;
    return;
  }

  const logger = createChildLogger(
    createLogger({
      level: config.logging.level,
      json: config.logging.format === 'json',
      filePath: config.logging.filePath,
    }),
    { component: name }
  );

  attachGlobalHandlers(logger);
  logger.debug('Configuration loaded', getConfigSummary(config));

  const { interruptMessage } = options;
  if (interruptMessage !== undefined) {
    process.once('SIGINT', () => {
      io.stderr(interruptMessage);
      process.exit(EXIT_SUCCESS);
    });
  }

  try {
    process.exitCode = main(argv, { io, config, logger });
  } catch (error) {
    logger.debug('Unexpected failure', { error: errorMessage(error) });
    io.stderr(`\n% Error: ${errorMessage(error)}\n`);
    process.exitCode = EXIT_FAILURE;
  }
}
