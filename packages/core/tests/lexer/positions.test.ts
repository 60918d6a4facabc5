/**
 * Glyph Lexer Tests: Positions and Spans
 * Line tracking, span round-trip, byte input, and scan isolation
 */

import { describe, expect, it } from 'vitest';
import {
  createLexerState,
  nextToken,
  renderDiagnostic,
  scan,
  tokenize,
  tokenLexeme,
  TOKEN_TYPES,
} from '@glyph/core';

const PROGRAM = `fn hit(mob) {
  mob.hp -= 2.5;
  say("ow\\t!");
  mob.flags |= 1 << 3;
}`;

describe('Glyph Lexer: Positions', () => {
  it('tracks lines across newlines', () => {
    const tokens = tokenize('a\nb');

    expect(tokens[0]?.span.start.line).toBe(1);
    expect(tokens[1]?.span.start.line).toBe(2);
    expect(tokens[1]?.span.start.column).toBe(1);
  });

  it('skips carriage returns and tabs', () => {
    const tokens = tokenize('a\r\n\tb');

    expect(tokens.map((t) => t.type)).toEqual([
      'IDENTIFIER',
      'IDENTIFIER',
      'EOF',
    ]);
    expect(tokens[1]?.span.start).toEqual({ line: 2, column: 2, offset: 4 });
  });

  it('records the first character of a token as span start', () => {
    const tokens = tokenize('  <<= x');

    expect(tokens[0]?.span.start).toEqual({ line: 1, column: 3, offset: 2 });
    expect(tokens[0]?.span.end).toEqual({ line: 1, column: 6, offset: 5 });
  });

  it('places EOF at the end of input with an empty span', () => {
    const tokens = tokenize('ab\n');
    const eof = tokens[tokens.length - 1];

    expect(eof?.type).toBe(TOKEN_TYPES.EOF);
    expect(eof?.span.start).toEqual({ line: 2, column: 1, offset: 3 });
    expect(eof?.span.end).toEqual(eof?.span.start);
    expect(eof?.literal).toBeUndefined();
  });

  it('yields only EOF for empty input', () => {
    const tokens = tokenize('');

    expect(tokens).toEqual([
      {
        type: 'EOF',
        span: {
          start: { line: 1, column: 1, offset: 0 },
          end: { line: 1, column: 1, offset: 0 },
        },
      },
    ]);
  });

  it('round-trips every non-string token through its span', () => {
    const tokens = tokenize(PROGRAM);
    const lexemes = tokens
      .filter((t) => t.type !== TOKEN_TYPES.STRING)
      .map((t) => tokenLexeme(PROGRAM, t));

    expect(lexemes).toEqual([
      'fn', 'hit', '(', 'mob', ')', '{',
      'mob', '.', 'hp', '-=', '2.5', ';',
      'say', '(', ')', ';',
      'mob', '.', 'flags', '|=', '1', '<<', '3', ';',
      '}', '',
    ]);
  });

  it('keeps the raw string text in the span and the decoded text in the literal', () => {
    const string = tokenize(PROGRAM).find(
      (t) => t.type === TOKEN_TYPES.STRING
    );

    expect(string?.span.start.line).toBe(3);
    expect(string?.literal).toBe('ow\t!');
    expect(string && tokenLexeme(PROGRAM, string)).toBe('"ow\\t!"');
  });

  it('scans bytes with byte offsets', () => {
    const bytes = new TextEncoder().encode('x = 1;\ny');
    const tokens = tokenize(bytes);

    expect(tokens.map((t) => t.type)).toEqual([
      'IDENTIFIER',
      'ASSIGN',
      'INTEGER',
      'SEMICOLON',
      'IDENTIFIER',
      'EOF',
    ]);
    expect(tokens[4]?.span.start).toEqual({ line: 2, column: 1, offset: 7 });
  });

  it('rejects a non-ASCII byte outside a string', () => {
    const bytes = new TextEncoder().encode('a é');
    const result = scan(bytes);

    // é is two bytes in UTF-8; the first one fails
    expect(result.error?.kind).toBe('UnexpectedSymbol');
    expect(result.error?.location.offset).toBe(2);
  });

  it('steps a caller-owned state one token at a time', () => {
    const state = createLexerState('a+');

    expect(nextToken(state).type).toBe(TOKEN_TYPES.IDENTIFIER);
    expect(nextToken(state).type).toBe(TOKEN_TYPES.PLUS);
    expect(nextToken(state).type).toBe(TOKEN_TYPES.EOF);
    expect(nextToken(state).type).toBe(TOKEN_TYPES.EOF);
  });

  describe('isolation', () => {
    it('returns equal results for repeated scans', () => {
      const first = scan(PROGRAM);
      const second = scan(PROGRAM);

      expect(second).toEqual(first);
      expect(second.tokens).not.toBe(first.tokens);
    });

    it('returns identical diagnostics for repeated failing scans', () => {
      const source = 'a\n"open';
      const first = scan(source);
      const second = scan(source);

      expect(renderDiagnostic(second.error, source)).toBe(
        renderDiagnostic(first.error, source)
      );
    });

    it('does not leak tokens between scans', () => {
      scan('a b c');
      expect(tokenize('d').map((t) => t.type)).toEqual(['IDENTIFIER', 'EOF']);
    });
  });
});
