/**
 * @devsim/scripts
 *
 * Entry logic for the run-command, add and echo scripts. The bin/ files are
 * thin wrappers around these functions.
 */

export {
  EXIT_SUCCESS,
  EXIT_FAILURE,
  processIO,
  parseArgs,
  formatUsage,
  formatHelp,
  reportUsageError,
} from './cli-utils.js';
export type { CliIO, FlagSpec, FlagTable, ParsedArgs } from './cli-utils.js';

export { CliError, CliErrorCode, errorMessage, wrapError } from './errors.js';

export { loadConfig, getConfigSummary } from './config/index.js';
export type { ScriptsConfig } from './config/index.js';

export { buildOutputFilename, saveOutput } from './save-output.js';

export {
  runCommand,
  RUN_COMMAND_FLAGS,
  RUN_COMMAND_NAME,
  DEFAULT_COMMAND,
  INTERRUPT_MESSAGE,
} from './run-command.js';
export type { RunCommandDeps } from './run-command.js';

export { add, addIntegers, parseInteger, ADD_FLAGS, ADD_NAME } from './add.js';
export type { AddDeps, AddResult } from './add.js';

export { echo, ECHO_FLAGS, ECHO_NAME } from './echo.js';
export type { EchoDeps } from './echo.js';

export { startScript } from './runtime.js';
export type { ScriptDeps, ScriptMain, StartOptions } from './runtime.js';
