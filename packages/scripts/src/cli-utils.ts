/**
 * Shared CLI utilities for @devsim/scripts
 *
 * This module provides what every script needs:
 * - Argument parsing against a declared flag table
 * - Usage and help text generated from that table
 * - Usage-error reporting with a consistent exit code
 * - A small I/O seam so tests can capture stdout and stderr
 *
 * Flags keep the spelling the scripts have always used, which includes
 * single-dash long names such as `-device_ip`. `name=value` is accepted as
 * well as `name value`.
 */

/** Exit code for a successful run, -list, --help and SIGINT */
export const EXIT_SUCCESS = 0;

/** Exit code for usage errors and any failure of the run itself */
export const EXIT_FAILURE = 1;

const HELP_FLAGS = ['-h', '--help'];

/**
 * One command-line flag.
 * - `string` flags take exactly one value
 * - `boolean` flags take none and are true when present
 */
export type FlagSpec =
  | {
      kind: 'string';
      /** Every spelling, the first one is used in messages */
      names: readonly string[];
      description: string;
      /** Placeholder shown in usage text, e.g. DEVICE_IP */
      metavar: string;
      required?: boolean;
      default?: string;
    }
  | {
      kind: 'boolean';
      names: readonly string[];
      description: string;
    };

export type FlagTable = Readonly<Record<string, FlagSpec>>;

/**
 * Result of parsing argv against a FlagTable. Flags are addressed by their
 * table key, not their spelling.
 */
export interface ParsedArgs {
  help: boolean;
  strings: Map<string, string>;
  booleans: Set<string>;
  /** Problems found while parsing; empty when argv was valid */
  errors: string[];
}

/**
 * Where a script writes. Production uses the process streams.
 */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

function findFlag(flags: FlagTable, name: string): [string, FlagSpec] | undefined {
  return Object.entries(flags).find(([, spec]) => spec.names.includes(name));
}

function isKnownFlag(flags: FlagTable, token: string): boolean {
  const name = token.split('=', 1)[0] ?? token;
  return HELP_FLAGS.includes(name) || findFlag(flags, name) !== undefined;
}

function flagLabel(spec: FlagSpec): string {
  return spec.names.join('/');
}

/**
 * Parse command-line arguments
 *
 * Never throws. Unknown flags, stray positionals and string flags without a
 * value are collected in `errors`, as are missing `required` flags; the
 * caller decides what to do with them.
 *
 * @param argv - Typically process.argv.slice(2)
 *
 * @example
 * const args = parseArgs(['-device_ip', '10.0.0.1', '-save'], RUN_COMMAND_FLAGS);
 * args.strings.get('device_ip'); // '10.0.0.1'
 * args.booleans.has('save');     // true
 */
export function parseArgs(argv: readonly string[], flags: FlagTable): ParsedArgs {
  const args: ParsedArgs = {
    help: false,
    strings: new Map(),
    booleans: new Set(),
    errors: [],
  };
  const seen = new Set<string>();
  const unrecognized: string[] = [];

  for (const [key, spec] of Object.entries(flags)) {
    if (spec.kind === 'string' && spec.default !== undefined) {
      args.strings.set(key, spec.default);
    }
  }

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i] ?? '';

    if (HELP_FLAGS.includes(token)) {
      args.help = true;
      continue;
    }

    const eq = token.indexOf('=');
    const name = token.startsWith('-') && eq > 0 ? token.slice(0, eq) : token;
    const inlineValue = name === token ? undefined : token.slice(eq + 1);
    const match = token.startsWith('-') ? findFlag(flags, name) : undefined;

    if (!match) {
      unrecognized.push(token);
      continue;
    }

    const [key, spec] = match;
    seen.add(key);

    if (spec.kind === 'boolean') {
      if (inlineValue !== undefined) {
        args.errors.push(`argument ${flagLabel(spec)}: ignored explicit argument '${inlineValue}'`);
      } else {
        args.booleans.add(key);
      }
      continue;
    }

    if (inlineValue !== undefined) {
      args.strings.set(key, inlineValue);
      continue;
    }

    const next = argv[i + 1];
    if (next === undefined || isKnownFlag(flags, next)) {
      args.errors.push(`argument ${flagLabel(spec)}: expected one argument`);
      continue;
    }

    args.strings.set(key, next);
    i += 1;
  }

  const missing = Object.entries(flags)
    .filter(([key, spec]) => spec.kind === 'string' && spec.required === true && !seen.has(key))
    .map(([, spec]) => flagLabel(spec));

  if (missing.length > 0) {
    args.errors.push(`the following arguments are required: ${missing.join(', ')}`);
  }

  if (unrecognized.length > 0) {
    args.errors.push(`unrecognized arguments: ${unrecognized.join(' ')}`);
  }

  return args;
}

/**
 * One-line usage summary
 *
 * @example
 * formatUsage('echo', ECHO_FLAGS); // 'usage: echo [-h] --echo ECHO'
 */
export function formatUsage(commandName: string, flags: FlagTable): string {
  const parts = Object.values(flags).map((spec) => {
    const primary = spec.names[0] ?? '';
    if (spec.kind === 'boolean') {
      return `[${primary}]`;
    }
    const text = `${primary} ${spec.metavar}`;
    return spec.required === true ? text : `[${text}]`;
  });

  return `usage: ${commandName} [-h] ${parts.join(' ')}`;
}

/**
 * Full help text: usage, description, one line per flag and an optional
 * epilog with examples.
 */
export function formatHelp(
  commandName: string,
  description: string,
  flags: FlagTable,
  epilog?: string
): string {
  const rows: Array<[string, string]> = [['-h, --help', 'show this help message and exit']];

  for (const spec of Object.values(flags)) {
    const names = spec.kind === 'string' ? spec.names.map((n) => `${n} ${spec.metavar}`) : spec.names;
    rows.push([names.join(', '), spec.description]);
  }

  const width = Math.max(...rows.map(([left]) => left.length)) + 2;
  const options = rows.map(([left, right]) => `  ${left.padEnd(width)}${right}`).join('\n');

  const sections = [formatUsage(commandName, flags), description, `options:\n${options}`];
  if (epilog) {
    sections.push(epilog.trim());
  }

  return `${sections.join('\n\n')}\n`;
}

/**
 * Writes usage plus `<command>: error: <message>` to stderr and returns the
 * exit code to use.
 */
export function reportUsageError(
  io: CliIO,
  commandName: string,
  flags: FlagTable,
  message: string
): number {
  io.stderr(`${formatUsage(commandName, flags)}\n${commandName}: error: ${message}\n`);
  return EXIT_FAILURE;
}
