/**
 * Randomized field generators for mock device output
 *
 * Each generator draws from its own fixed domain with uniform probability.
 * The candidate lists are values seen on real CSR1000V / IOS-XE routers.
 */

import type { MemorySizes, RandomSource, Uptime } from './types.js';
import { choice, randomInt, randomString } from './random.js';

/** Three empty entries out of six: half of all versions carry no suffix */
export const VERSION_SUFFIXES = ['', '', '', 'a', 'b', 'c'] as const;

export const SERIAL_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const SERIAL_LENGTH = 11;

export const PROCESSOR_MEMORY_KB = [1024000, 2048000, 4096000, 8192000] as const;
export const IO_MEMORY_KB = [3075, 6147, 12291] as const;
export const NVRAM_KB = [32768, 65536, 131072, 262144] as const;
export const PHYSICAL_MEMORY_KB = [3984776, 7969552, 15939104] as const;
export const VIRTUAL_DISK_KB = [6139904, 12279808, 24559616] as const;
export const CONFIG_REGISTERS = ['0x2102', '0x2142', '0x2100'] as const;

/** Compile dates fall between one month and three years before generation */
export const COMPILE_AGE_DAYS = { min: 30, max: 1095 } as const;

/**
 * IOS-XE style version, e.g. "17.3.4a" or "16.12.5".
 * major ∈ [15,17], minor ∈ [1,12], patch ∈ [1,9].
 */
export function generateVersion(rng: RandomSource): string {
  const major = randomInt(rng, 15, 17);
  const minor = randomInt(rng, 1, 12);
  const patch = randomInt(rng, 1, 9);
  const suffix = choice(rng, VERSION_SUFFIXES);

  return `${major}.${minor}.${patch}${suffix}`;
}

export function generateUptime(rng: RandomSource): Uptime {
  return {
    weeks: randomInt(rng, 0, 52),
    days: randomInt(rng, 0, 6),
    hours: randomInt(rng, 0, 23),
    minutes: randomInt(rng, 0, 59),
  };
}

/**
 * Processor board ID, e.g. "9FKLJWM5EB0"
 */
export function generateSerial(rng: RandomSource): string {
  return randomString(rng, SERIAL_ALPHABET, SERIAL_LENGTH);
}

/**
 * MAC address in dotted hex groups, e.g. "0050.56bf.1234"
 */
export function generateMac(rng: RandomSource): string {
  const octets = Array.from({ length: 6 }, () => randomInt(rng, 0x00, 0xff));
  const groups: string[] = [];

  for (let i = 0; i < octets.length; i += 2) {
    const high = octets[i] ?? 0;
    const low = octets[i + 1] ?? 0;
    groups.push(((high << 8) + low).toString(16).padStart(4, '0'));
  }

  return groups.join('.');
}

export function generateMemory(rng: RandomSource): MemorySizes {
  return {
    processor: choice(rng, PROCESSOR_MEMORY_KB),
    io: choice(rng, IO_MEMORY_KB),
  };
}

/**
 * A wall-clock date 30 to 1095 days before `now`, keeping the time of day.
 */
export function generateCompileDate(rng: RandomSource, now: Date): Date {
  const daysAgo = randomInt(rng, COMPILE_AGE_DAYS.min, COMPILE_AGE_DAYS.max);
  const compiled = new Date(now.getTime());
  compiled.setDate(compiled.getDate() - daysAgo);
  return compiled;
}
