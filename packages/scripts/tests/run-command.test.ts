import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  generateShowVersionFields,
  renderShowVersion,
  type GeneratorContext,
} from '@devsim/mock-device';
import { runCommand, type RunCommandDeps } from '../src/run-command.js';
import { loadConfig } from '../src/config/index.js';
import { captureIO, silentLogger, type CapturedIO } from './helpers/capture.js';

const NOW = new Date(2024, 2, 5, 14, 7, 9);

function fixedContext(): GeneratorContext {
  return { random: { next: () => 0 }, now: () => NOW };
}

const EXPECTED_BANNER = renderShowVersion(generateShowVersionFields(fixedContext()));

const USAGE = 'usage: run-command [-h] [-device_ip DEVICE_IP] [-command COMMAND] [-save] [-list]';

describe('runCommand', () => {
  let io: CapturedIO;
  let tmpDir: string;
  let deps: RunCommandDeps;

  beforeEach(() => {
    io = captureIO();
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'devsim-run-'));
    deps = {
      io,
      config: loadConfig({ DEVSIM_SAVE_DIR: tmpDir }),
      logger: silentLogger(),
      context: fixedContext(),
    };
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('-list', () => {
    it('should print every registered command, one per line', () => {
      expect(runCommand(['-list'], deps)).toBe(0);
      expect(io.stdoutText()).toBe('show version\n');
      expect(io.stderrText()).toBe('');
    });

    it('should ignore every other argument, malformed or not', () => {
      expect(runCommand(['-bogus', '-device_ip', '10.0.0.1', '-list', 'stray', '-command'], deps)).toBe(0);
      expect(io.stdoutText()).toBe('show version\n');
    });
  });

  describe('generation', () => {
    it('should run show version by default', () => {
      expect(runCommand(['-device_ip', '10.0.0.1'], deps)).toBe(0);
      expect(io.stdoutText()).toBe(`${EXPECTED_BANNER}\n`);
      expect(io.stderrText()).toBe('');
    });

    it('should accept the command as a separate argument', () => {
      expect(runCommand(['-device_ip=10.0.0.1', '-command', 'show version'], deps)).toBe(0);
      expect(io.stdoutText()).toBe(`${EXPECTED_BANNER}\n`);
    });

    it('should print the sentinel for unknown commands and still succeed', () => {
      expect(runCommand(['-device_ip', '10.0.0.1', '-command', 'show bogus'], deps)).toBe(0);
      expect(io.stdoutText()).toBe("% Invalid input detected at '^' marker.\n");
    });

    it('should report generator failures on stderr and exit 1', () => {
      deps.context = {
        random: {
          next: () => {
            throw new Error('entropy unavailable');
          },
        },
        now: () => NOW,
      };

      expect(runCommand(['-device_ip', '10.0.0.1'], deps)).toBe(1);
      expect(io.stdoutText()).toBe('');
      expect(io.stderrText()).toBe('\n% Error: entropy unavailable\n');
    });
  });

  describe('usage errors', () => {
    it('should require -device_ip without -list', () => {
      expect(runCommand([], deps)).toBe(1);
      expect(io.stdoutText()).toBe('');
      expect(io.stderrText()).toBe(
        `${USAGE}\nrun-command: error: -device_ip is required (unless using -list)\n`
      );
    });

    it('should reject unknown flags', () => {
      expect(runCommand(['-device_ip', '10.0.0.1', '-verbose'], deps)).toBe(1);
      expect(io.stdoutText()).toBe('');
      expect(io.stderrText()).toBe(`${USAGE}\nrun-command: error: unrecognized arguments: -verbose\n`);
    });

    it('should reject a flag without its value', () => {
      expect(runCommand(['-device_ip', '10.0.0.1', '-command'], deps)).toBe(1);
      expect(io.stderrText()).toBe(
        `${USAGE}\nrun-command: error: argument -command: expected one argument\n`
      );
    });
  });

  describe('--help', () => {
    it('should print help to stdout and exit 0', () => {
      expect(runCommand(['--help'], deps)).toBe(0);
      expect(io.stdoutText().startsWith(`${USAGE}\n\nNetwork device command simulator\n`)).toBe(true);
      expect(io.stdoutText()).toContain('  run-command -list\n');
    });
  });

  describe('-save', () => {
    const filename = '10.0.0.1_show_version_20240305_140709.txt';

    it('should write exactly the printed output to a timestamped file', () => {
      expect(runCommand(['-device_ip', '10.0.0.1', '-save'], deps)).toBe(0);

      const filePath = path.join(tmpDir, filename);
      expect(fs.readFileSync(filePath, 'utf-8')).toBe(EXPECTED_BANNER);
      expect(io.stdoutText()).toBe(`${EXPECTED_BANNER}\n`);
      expect(io.stderrText()).toBe(`\nOutput saved to ${filePath}\n`);
    });

    it('should save the sentinel for unknown commands', () => {
      runCommand(['-device_ip', '10.0.0.1', '-command', 'show bogus', '-save'], deps);

      const filePath = path.join(tmpDir, '10.0.0.1_show_bogus_20240305_140709.txt');
      expect(fs.readFileSync(filePath, 'utf-8')).toBe("% Invalid input detected at '^' marker.");
    });

    it('should still print the output and exit 0 when the file cannot be written', () => {
      deps.config = loadConfig({ DEVSIM_SAVE_DIR: path.join(tmpDir, 'missing', 'nested') });

      expect(runCommand(['-device_ip', '10.0.0.1', '-save'], deps)).toBe(0);
      expect(io.stdoutText()).toBe(`${EXPECTED_BANNER}\n`);
      expect(io.err).toHaveLength(1);
      expect(io.stderrText()).toMatch(
        /^\nERROR: Failed to save file: ENOENT: no such file or directory, open '.+'\n$/
      );
    });
  });
});
