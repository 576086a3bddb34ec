/**
 * Core types for the mock device response generator
 */

/**
 * Source of uniformly distributed floats in [0, 1).
 *
 * The default is backed by Math.random(); tests supply fixed sequences.
 */
export interface RandomSource {
  next(): number;
}

/**
 * Everything a response generator may depend on besides its own constants
 */
export interface GeneratorContext {
  random: RandomSource;
  now: () => Date;
}

/**
 * Names of the commands the mock device answers.
 * Adding a name here without a registry entry does not compile.
 */
export type MockCommandName = 'show version';

/**
 * A registered mock command
 */
export interface MockCommand {
  readonly name: MockCommandName;
  readonly description: string;
  generate(ctx: GeneratorContext): string;
}

/**
 * Uptime as (weeks, days, hours, minutes)
 */
export interface Uptime {
  weeks: number;
  days: number;
  hours: number;
  minutes: number;
}

/**
 * Processor and I/O memory, in kilobytes
 */
export interface MemorySizes {
  processor: number;
  io: number;
}

/**
 * Every randomized value substituted into the `show version` banner
 */
export interface ShowVersionFields {
  /** e.g. "17.3.4a" */
  version: string;
  uptime: Uptime;
  /** 11 uppercase alphanumerics, e.g. "9FKLJWM5EB0" */
  serial: string;
  memory: MemorySizes;
  compiledAt: Date;
  nvramKb: number;
  physicalMemoryKb: number;
  virtualDiskKb: number;
  /** e.g. "0x2102" */
  configRegister: string;
}
