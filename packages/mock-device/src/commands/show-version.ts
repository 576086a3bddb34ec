/**
 * `show version` for a virtual CSR1000V running IOS-XE
 */

import type { GeneratorContext, MockCommand, ShowVersionFields } from '../types.js';
import {
  CONFIG_REGISTERS,
  NVRAM_KB,
  PHYSICAL_MEMORY_KB,
  VIRTUAL_DISK_KB,
  generateCompileDate,
  generateMemory,
  generateSerial,
  generateUptime,
  generateVersion,
} from '../fields.js';
import { choice } from '../random.js';
import { formatCompileDate, formatUptime } from '../format.js';

/**
 * Draws every randomized field. Draw order is fixed so a stubbed
 * RandomSource yields a predictable banner.
 */
export function generateShowVersionFields(ctx: GeneratorContext): ShowVersionFields {
  const rng = ctx.random;

  const version = generateVersion(rng);
  const uptime = generateUptime(rng);
  const serial = generateSerial(rng);
  const memory = generateMemory(rng);
  const compiledAt = generateCompileDate(rng, ctx.now());

  return {
    version,
    uptime,
    serial,
    memory,
    compiledAt,
    nvramKb: choice(rng, NVRAM_KB),
    physicalMemoryKb: choice(rng, PHYSICAL_MEMORY_KB),
    virtualDiskKb: choice(rng, VIRTUAL_DISK_KB),
    configRegister: choice(rng, CONFIG_REGISTERS),
  };
}

/**
 * Substitutes `fields` into the banner. Everything else is fixed text.
 */
export function renderShowVersion(fields: ShowVersionFields): string {
  const { version, serial, memory } = fields;
  const uptime = formatUptime(fields.uptime);
  const compiled = formatCompileDate(fields.compiledAt);

  return `Cisco IOS XE Software, Version ${version}
Cisco IOS Software [Amsterdam], Virtual XE Software (X86_64_LINUX_IOSD-UNIVERSALK9-M), Version ${version}, RELEASE SOFTWARE (fc3)
Technical Support: http://www.cisco.com/techsupport
Copyright (c) 1986-2021 by Cisco Systems, Inc.
Compiled ${compiled} by mcpre

Cisco IOS-XE software, Copyright (c) 2005-2021 by cisco Systems, Inc.
All rights reserved.  Certain components of Cisco IOS-XE software are
licensed under the GNU General Public License ("GPL") Version 2.0.

ROM: IOS-XE ROMMON
BOOTLDR: Virtual XE ROM

Router uptime is ${uptime}
Uptime for this control processor is ${uptime}
System returned to ROM by reload
System image file is "bootflash:packages.conf"
Last reload reason: reload

This product contains cryptographic features and is subject to United
States and local country laws governing import, export, transfer and
use. Delivery of Cisco cryptographic products does not imply
third-party authority to import, export, distribute or use encryption.

cisco CSR1000V (VXE) processor (revision VXE) with ${memory.processor}K/${memory.io}K bytes of memory.
Processor board ID ${serial}
Router operating mode: Autonomous
4 Gigabit Ethernet interfaces
${fields.nvramKb}K bytes of non-volatile configuration memory.
${fields.physicalMemoryKb}K bytes of physical memory.
${fields.virtualDiskKb}K bytes of virtual hard disk at bootflash:.

Configuration register is ${fields.configRegister}`;
}

export const showVersionCommand: MockCommand = {
  name: 'show version',
  description: 'System hardware and software status',
  generate: (ctx) => renderShowVersion(generateShowVersionFields(ctx)),
};
