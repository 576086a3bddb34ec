import { describe, it, expect } from 'vitest';
import {
  generateShowVersionFields,
  renderShowVersion,
  showVersionCommand,
} from '../src/commands/show-version.js';
import { CONFIG_REGISTERS, SERIAL_ALPHABET } from '../src/fields.js';
import { createDefaultContext } from '../src/registry.js';
import type { GeneratorContext } from '../src/types.js';
import {
  constantRandom,
  pickIndex,
  pickInt,
  pickString,
  sequenceRandom,
} from './helpers/stub-random.js';

const NOW = new Date(2024, 5, 15, 9, 30);

function lowestContext(): GeneratorContext {
  return { random: constantRandom(0), now: () => NOW };
}

describe('generateShowVersionFields', () => {
  it('should draw every field in a fixed order', () => {
    const rng = sequenceRandom([
      // version 17.3.4a
      pickInt(17, 15, 17),
      pickInt(3, 1, 12),
      pickInt(4, 1, 9),
      pickIndex(3, 6),
      // uptime 2 weeks, 0 days, 1 hour, 5 minutes
      pickInt(2, 0, 52),
      pickInt(0, 0, 6),
      pickInt(1, 0, 23),
      pickInt(5, 0, 59),
      ...pickString('9FKLJWM5EB0', SERIAL_ALPHABET),
      // memory 4096000K / 6147K
      pickIndex(2, 4),
      pickIndex(1, 3),
      // compiled 100 days ago
      pickInt(100, 30, 1095),
      pickIndex(3, 4),
      pickIndex(1, 3),
      pickIndex(2, 3),
      pickIndex(1, 3),
    ]);

    const fields = generateShowVersionFields({ random: rng, now: () => NOW });

    expect(fields).toEqual({
      version: '17.3.4a',
      uptime: { weeks: 2, days: 0, hours: 1, minutes: 5 },
      serial: '9FKLJWM5EB0',
      memory: { processor: 4096000, io: 6147 },
      compiledAt: new Date(2024, 2, 7, 9, 30),
      nvramKb: 262144,
      physicalMemoryKb: 7969552,
      virtualDiskKb: 24559616,
      configRegister: '0x2142',
    });
    expect(rng.remaining()).toBe(0);
  });
});

describe('renderShowVersion', () => {
  const output = showVersionCommand.generate(lowestContext());
  const lines = output.split('\n');

  it('should open with the version banner', () => {
    expect(lines[0]).toBe('Cisco IOS XE Software, Version 15.1.1');
    expect(lines[1]).toBe(
      'Cisco IOS Software [Amsterdam], Virtual XE Software (X86_64_LINUX_IOSD-UNIVERSALK9-M), Version 15.1.1, RELEASE SOFTWARE (fc3)'
    );
  });

  it('should substitute the compile date', () => {
    expect(lines[4]).toBe('Compiled Thu 16-May-24 09:30 by mcpre');
  });

  it('should show the same uptime on both uptime lines', () => {
    expect(lines).toContain('Router uptime is 0 hours, 0 minutes');
    expect(lines).toContain('Uptime for this control processor is 0 hours, 0 minutes');
  });

  it('should substitute hardware fields', () => {
    expect(lines).toContain(
      'cisco CSR1000V (VXE) processor (revision VXE) with 1024000K/3075K bytes of memory.'
    );
    expect(lines).toContain('Processor board ID AAAAAAAAAAA');
    expect(lines).toContain('32768K bytes of non-volatile configuration memory.');
    expect(lines).toContain('3984776K bytes of physical memory.');
    expect(lines).toContain('6139904K bytes of virtual hard disk at bootflash:.');
  });

  it('should end with the config register and no trailing newline', () => {
    expect(lines).toHaveLength(33);
    expect(lines[32]).toBe('Configuration register is 0x2102');
    expect(output.endsWith('\n')).toBe(false);
  });

  it('should render fields without drawing randomness itself', () => {
    const fields = generateShowVersionFields(lowestContext());
    expect(renderShowVersion(fields)).toBe(output);
  });
});

describe('show version with Math.random', () => {
  const runs = Array.from({ length: 200 }, () => showVersionCommand.generate(createDefaultContext()));

  it('should contain exactly one config register line with a known value', () => {
    for (const output of runs) {
      const registerLines = output.split('\n').filter((line) => line.startsWith('Configuration register is'));
      expect(registerLines).toHaveLength(1);

      const value = registerLines[0]?.slice('Configuration register is '.length);
      expect(CONFIG_REGISTERS).toContain(value);
    }
  });

  it('should never show zero weeks or zero days', () => {
    for (const output of runs) {
      expect(output).not.toMatch(/\b0 weeks?\b/);
      expect(output).not.toMatch(/\b0 days?\b/);
    }
  });

  it('should always end the uptime with hours and minutes, pluralized correctly', () => {
    for (const output of runs) {
      const uptimeLine = output.split('\n').find((line) => line.startsWith('Router uptime is '));
      expect(uptimeLine).toBeDefined();

      const uptime = (uptimeLine ?? '').slice('Router uptime is '.length);
      expect(uptime).toMatch(/(^|, )\d+ hours?, \d+ minutes?$/);

      for (const [, count, , suffix] of uptime.matchAll(/(\d+) (week|day|hour|minute)(s?)/g)) {
        expect(suffix).toBe(count === '1' ? '' : 's');
      }
    }
  });
});
