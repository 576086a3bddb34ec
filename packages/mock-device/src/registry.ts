/**
 * Command registry and dispatch
 *
 * The registry is keyed by the MockCommandName union, so every name must
 * map to a generator and nothing else may be added. It is frozen at load.
 */

import type { GeneratorContext, MockCommand, MockCommandName } from './types.js';
import { showVersionCommand } from './commands/show-version.js';
import { mathRandomSource } from './random.js';

/**
 * Reply for any command the mock device does not know
 */
export const INVALID_INPUT_MESSAGE = "% Invalid input detected at '^' marker.";

const REGISTRY: Readonly<Record<MockCommandName, MockCommand>> = Object.freeze({
  'show version': showVersionCommand,
});

const COMMAND_NAMES: readonly MockCommandName[] = Object.freeze(
  Object.keys(REGISTRY).filter(isMockCommand)
);

/**
 * Context used when the caller does not supply one: Math.random and the
 * wall clock.
 */
export function createDefaultContext(): GeneratorContext {
  return {
    random: mathRandomSource,
    now: () => new Date(),
  };
}

export function isMockCommand(name: string): name is MockCommandName {
  return Object.prototype.hasOwnProperty.call(REGISTRY, name);
}

/**
 * Registered command names, in registration order
 */
export function listMockCommands(): readonly MockCommandName[] {
  return COMMAND_NAMES;
}

export function getMockCommand(name: MockCommandName): MockCommand {
  return REGISTRY[name];
}

/**
 * Runs `command` against the mock device.
 *
 * Matching is exact. Unknown commands return INVALID_INPUT_MESSAGE rather
 * than throwing.
 *
 * @example
 * ```typescript
 * executeMockCommand('show version');   // full banner
 * executeMockCommand('show versoin');   // "% Invalid input detected at '^' marker."
 * ```
 */
export function executeMockCommand(
  command: string,
  ctx: GeneratorContext = createDefaultContext()
): string {
  if (!isMockCommand(command)) {
    return INVALID_INPUT_MESSAGE;
  }
  return REGISTRY[command].generate(ctx);
}
