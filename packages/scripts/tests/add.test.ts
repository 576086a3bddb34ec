import { describe, it, expect, beforeEach } from 'vitest';
import { add, addIntegers, parseInteger } from '../src/add.js';
import { CliError, CliErrorCode } from '../src/errors.js';
import { captureIO, silentLogger, type CapturedIO } from './helpers/capture.js';

describe('parseInteger', () => {
  it.each([
    ['42', 42],
    [' 42 ', 42],
    ['+7', 7],
    ['-15', -15],
    ['007', 7],
  ])('should parse %j', (text, expected) => {
    expect(parseInteger(text)).toBe(expected);
  });

  it.each(['', 'ten', '1.5', '1e3', '0x10', '--1'])('should reject %j', (text) => {
    expect(() => parseInteger(text)).toThrow(`invalid integer: '${text}'`);
  });

  it('should reject values outside the safe integer range', () => {
    expect(() => parseInteger('9007199254740993')).toThrow(
      "integer out of range: '9007199254740993'"
    );
  });

  it('should raise INVALID_NUMBER', () => {
    try {
      parseInteger('ten');
      expect.fail('parseInteger should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(CliError);
      expect(error).toHaveProperty('code', CliErrorCode.INVALID_NUMBER);
    }
  });
});

describe('addIntegers', () => {
  it('should add the first number to the second', () => {
    expect(addIntegers('10', '2')).toBe(12);
    expect(addIntegers('-5', '3')).toBe(-2);
  });

  it('should reject a sum beyond the safe integer range', () => {
    expect(() => addIntegers('9007199254740991', '1')).toThrow('sum out of range');
  });
});

describe('add', () => {
  let io: CapturedIO;
  const logger = silentLogger();

  beforeEach(() => {
    io = captureIO();
  });

  it('should print the sum as JSON', () => {
    expect(add(['--num1', '10', '--num2', '2'], { io, logger })).toBe(0);
    expect(io.stdoutText()).toBe('{"success":true,"sum":12}\n');
    expect(io.stderrText()).toBe('');
  });

  it('should accept short flags and negative values', () => {
    expect(add(['-N1', '-5', '-N2', '3'], { io, logger })).toBe(0);
    expect(io.stdoutText()).toBe('{"success":true,"sum":-2}\n');
  });

  it('should accept inline values', () => {
    expect(add(['--num1=7', '--num2= 8 '], { io, logger })).toBe(0);
    expect(io.stdoutText()).toBe('{"success":true,"sum":15}\n');
  });

  it('should report invalid integers on both streams and exit 1', () => {
    expect(add(['-N1', 'ten', '-N2', '2'], { io, logger })).toBe(1);
    expect(io.stderrText()).toBe("Error: invalid integer: 'ten'\n");
    expect(io.stdoutText()).toBe('{"error":"invalid integer: \'ten\'","success":false}\n');
  });

  it('should require both numbers', () => {
    expect(add(['--num1', '1'], { io, logger })).toBe(1);
    expect(io.stdoutText()).toBe('');
    expect(io.stderrText()).toBe(
      'usage: add [-h] --num1 NUM1 --num2 NUM2\nadd: error: the following arguments are required: --num2/-N2\n'
    );
  });

  it('should print help', () => {
    expect(add(['-h'], { io, logger })).toBe(0);
    expect(io.stdoutText()).toContain('  --num1 NUM1, -N1 NUM1  first number\n');
  });
});
