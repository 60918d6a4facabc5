/**
 * CLI Shared Utilities
 * Token and error formatting for glyph-lex
 */

import {
  scan,
  tokenLexeme,
  TOKEN_TYPES,
  toSourceText,
  VERSION,
} from '@glyph/core';
import type { LexerError, SourceInput, Token } from '@glyph/core';
import type { OutputFormat } from './config.js';

/**
 * Program scanned when no input is given
 */
export const SAMPLE_SOURCE = `fn on_step(mob: Mob) {
    if (mob.hp <= 0.5 and mob.flags & 2 != 0) {
        say("ouch\\n");
    }
    mob.x += 1;
    mob.steps++;
}`;

export interface LexOptions {
  readonly format: OutputFormat;
  readonly showEof: boolean;
}

/** Result of running the lexer for the CLI: what to print and how to exit */
export interface LexOutput {
  readonly stdout: string;
  readonly stderr?: string | undefined;
  readonly exitCode: 0 | 1;
}

/**
 * Describe one token on a single line:
 * `<TYPE> on line <line> in pos <start>-<end> <lexeme> <literal|null>`
 */
export function formatToken(text: string, token: Token): string {
  const { start, end } = token.span;
  const lexeme = tokenLexeme(text, token);
  return `${token.type} on line ${start.line} in pos ${start.offset}-${end.offset} ${lexeme} ${token.literal ?? 'null'}`;
}

interface TokenJson {
  type: string;
  line: number;
  start: number;
  end: number;
  lexeme: string;
  literal?: string;
}

function tokenToJson(text: string, token: Token): TokenJson {
  const json: TokenJson = {
    type: token.type,
    line: token.span.start.line,
    start: token.span.start.offset,
    end: token.span.end.offset,
    lexeme: tokenLexeme(text, token),
  };
  if (token.literal !== undefined) {
    json.literal = token.literal;
  }
  return json;
}

/**
 * Format a token list for stdout in the requested format.
 * Byte sources are decoded once, not per token.
 */
export function formatTokens(
  source: SourceInput,
  tokens: Token[],
  options: LexOptions
): string {
  const text = toSourceText(source);
  const shown = options.showEof
    ? tokens
    : tokens.filter((t) => t.type !== TOKEN_TYPES.EOF);

  if (options.format === 'json') {
    return JSON.stringify(
      shown.map((t) => tokenToJson(text, t)),
      null,
      2
    );
  }
  return shown.map((t) => formatToken(text, t)).join('\n');
}

/**
 * Format a lexer error: the pointer diagnostic for text output, an
 * LSP-style object for JSON output.
 */
export function formatLexerError(
  error: LexerError,
  source: SourceInput,
  format: OutputFormat
): string {
  if (format === 'json') {
    return JSON.stringify(
      {
        errorId: error.errorId,
        kind: error.kind,
        message: error.detail,
        line: error.location.line,
        column: error.location.column,
        source: 'glyph',
      },
      null,
      2
    );
  }
  return error.render(source);
}

/**
 * Scan source and produce CLI output. Tokens recognized before a lexer
 * error are not printed.
 */
export function lexSource(source: SourceInput, options: LexOptions): LexOutput {
  const text = toSourceText(source);
  const result = scan(text);

  if (result.error) {
    return {
      stdout: '',
      stderr: formatLexerError(result.error, text, options.format),
      exitCode: 1,
    };
  }

  return {
    stdout: formatTokens(text, result.tokens, options),
    exitCode: 0,
  };
}

/**
 * Format a non-lexer failure for stderr output
 */
export function formatError(err: Error): string {
  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

export { VERSION };
