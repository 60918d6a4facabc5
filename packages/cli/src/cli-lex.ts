#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Implements main(), run(), parseArgs(), and readInput() for the glyph-lex binary.
 * Scans a file, stdin, inline code, or the built-in sample and prints the tokens.
 */

import * as fs from 'fs/promises';
import * as fsSync from 'fs';
import type { SourceInput } from '@glyph/core';
import {
  formatError,
  lexSource,
  SAMPLE_SOURCE,
  VERSION,
  type LexOptions,
} from './cli-shared.js';
import { explainError } from './cli-explain.js';
import {
  createDefaultConfig,
  isOutputFormat,
  loadConfig,
  type OutputFormat,
} from './config.js';

/** Where the source text comes from */
export type InputSource =
  | { kind: 'sample' }
  | { kind: 'stdin' }
  | { kind: 'file'; path: string }
  | { kind: 'inline'; code: string };

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'lex';
      input: InputSource;
      format?: OutputFormat;
      showEof?: boolean;
    }
  | { mode: 'help' | 'version' }
  | { mode: 'explain'; errorId: string };

const FLAGS_WITH_VALUE = ['--format', '--explain', '-e'];
const KNOWN_FLAGS = [
  '--help',
  '-h',
  '--version',
  '-v',
  '--no-eof',
  ...FLAGS_WITH_VALUE,
];

const USAGE = `Usage:
  glyph-lex                      Scan the built-in sample program
  glyph-lex <script.glyph>       Scan a file
  glyph-lex -                    Read source from stdin
  glyph-lex -e "<code>"          Scan inline code
  glyph-lex --explain GLY-LXXX   Show error documentation
  glyph-lex --help               Show this help message
  glyph-lex --version            Show version information

Options:
  --format <format>   Output format: text, json (default: text)
  --no-eof            Omit the EOF token from the output

Configuration:
  .glyph-lex.yaml in the working directory may set format and showEof.
  Command-line options take precedence.`;

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseArgs(argv: string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let format: OutputFormat | undefined;
  let showEof: boolean | undefined;
  let inline: string | undefined;
  const positionalArgs: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg.startsWith('-') && arg !== '-') {
      if (!KNOWN_FLAGS.includes(arg)) {
        throw new Error(`Unknown option: ${arg}`);
      }

      if (FLAGS_WITH_VALUE.includes(arg)) {
        const value = argv[i + 1];
        i++;

        if (arg === '--explain') {
          if (!value) {
            throw new Error('Missing error ID after --explain');
          }
          return { mode: 'explain', errorId: value };
        }

        if (arg === '-e') {
          if (value === undefined) {
            throw new Error('Missing code after -e');
          }
          inline = value;
        }

        if (arg === '--format') {
          if (!isOutputFormat(value)) {
            throw new Error(
              `Invalid --format value: ${String(value)}. Must be one of: text, json`
            );
          }
          format = value;
        }
      }

      if (arg === '--no-eof') {
        showEof = false;
      }
      continue;
    }

    positionalArgs.push(arg);
  }

  const inputCount = positionalArgs.length + (inline !== undefined ? 1 : 0);
  if (inputCount > 1) {
    throw new Error('Too many inputs: give one file, -, or -e "<code>"');
  }

  let input: InputSource;
  const first = positionalArgs[0];
  if (inline !== undefined) {
    input = { kind: 'inline', code: inline };
  } else if (first === undefined) {
    input = { kind: 'sample' };
  } else if (first === '-') {
    input = { kind: 'stdin' };
  } else {
    input = { kind: 'file', path: first };
  }

  return {
    mode: 'lex',
    input,
    ...(format !== undefined ? { format } : {}),
    ...(showEof !== undefined ? { showEof } : {}),
  };
}

/**
 * Read source for the scanner. Files and stdin are read as bytes so that
 * token offsets are byte offsets.
 *
 * @throws Error if the file does not exist
 */
export async function readInput(input: InputSource): Promise<SourceInput> {
  switch (input.kind) {
    case 'sample':
      return SAMPLE_SOURCE;
    case 'inline':
      return input.code;
    case 'stdin':
      // Read from stdin (must use sync API for stdin)
      return fsSync.readFileSync(0);
    case 'file':
      try {
        await fs.access(input.path);
      } catch {
        throw new Error(`File not found: ${input.path}`);
      }
      return fs.readFile(input.path);
  }
}

/**
 * Merge defaults, the configuration file, and command-line options,
 * in increasing order of precedence.
 */
export function resolveOptions(
  parsed: { format?: OutputFormat; showEof?: boolean },
  cwd: string
): LexOptions {
  const config = loadConfig(cwd) ?? createDefaultConfig();
  return {
    format: parsed.format ?? config.format,
    showEof: parsed.showEof ?? config.showEof,
  };
}

/**
 * Run glyph-lex with the given arguments and working directory.
 * Writes tokens to stdout and diagnostics to stderr.
 *
 * @returns the process exit code
 */
export async function run(argv: string[], cwd: string): Promise<0 | 1> {
  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return 0;

      case 'version':
        console.log(VERSION);
        return 0;

      case 'explain': {
        const documentation = explainError(parsed.errorId);
        if (documentation === null) {
          console.error(`Invalid error ID: ${parsed.errorId}`);
          console.error(
            'Error ID must be in format GLY-L{3-digit}, e.g., GLY-L002'
          );
          return 1;
        }
        console.log(documentation);
        return 0;
      }

      case 'lex': {
        const options = resolveOptions(parsed, cwd);
        const source = await readInput(parsed.input);
        const output = lexSource(source, options);

        if (output.stdout !== '') {
          console.log(output.stdout);
        }
        if (output.stderr !== undefined) {
          console.error(output.stderr);
        }
        return output.exitCode;
      }
    }
  } catch (err) {
    console.error(
      formatError(err instanceof Error ? err : new Error(String(err)))
    );
    return 1;
  }
}

/**
 * Entry point for the glyph-lex binary
 */
export async function main(): Promise<void> {
  process.exit(await run(process.argv.slice(2), process.cwd()));
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
