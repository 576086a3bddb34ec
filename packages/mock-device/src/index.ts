/**
 * @devsim/mock-device
 *
 * Canned, randomized replies to network-device commands. Nothing here talks
 * to a real device.
 *
 * @example
 * ```typescript
 * import { executeMockCommand, listMockCommands } from '@devsim/mock-device';
 *
 * listMockCommands();                  // → ['show version']
 * executeMockCommand('show version');  // → "Cisco IOS XE Software, Version 17.3.4a\n..."
 * executeMockCommand('show bogus');    // → "% Invalid input detected at '^' marker."
 * ```
 */

export type {
  RandomSource,
  GeneratorContext,
  MockCommand,
  MockCommandName,
  Uptime,
  MemorySizes,
  ShowVersionFields,
} from './types.js';

export {
  INVALID_INPUT_MESSAGE,
  createDefaultContext,
  executeMockCommand,
  getMockCommand,
  isMockCommand,
  listMockCommands,
} from './registry.js';

export { mathRandomSource, randomInt, choice, randomString } from './random.js';

export {
  VERSION_SUFFIXES,
  SERIAL_ALPHABET,
  SERIAL_LENGTH,
  PROCESSOR_MEMORY_KB,
  IO_MEMORY_KB,
  NVRAM_KB,
  PHYSICAL_MEMORY_KB,
  VIRTUAL_DISK_KB,
  CONFIG_REGISTERS,
  COMPILE_AGE_DAYS,
  generateVersion,
  generateUptime,
  generateSerial,
  generateMac,
  generateMemory,
  generateCompileDate,
} from './fields.js';

export { formatUptime, formatCompileDate, formatFileTimestamp } from './format.js';

export {
  generateShowVersionFields,
  renderShowVersion,
  showVersionCommand,
} from './commands/show-version.js';
