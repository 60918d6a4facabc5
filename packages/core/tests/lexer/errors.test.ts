/**
 * Glyph Lexer Tests: Lexical Errors
 * First-error abort, error kinds, and failure locations
 */

import { describe, expect, it } from 'vitest';
import { LexerError, scan, tokenize, TOKEN_TYPES } from '@glyph/core';

describe('Glyph Lexer: Errors', () => {
  describe('UnexpectedSymbol', () => {
    it('rejects a second decimal point', () => {
      const result = scan('1.2.3');

      expect(result.success).toBe(false);
      expect(result.tokens).toEqual([]);
      expect(result.error?.kind).toBe('UnexpectedSymbol');
      expect(result.error?.errorId).toBe('GLY-L002');
      expect(result.error?.location).toEqual({
        line: 1,
        column: 4,
        offset: 3,
      });
      expect(result.error?.message).toBe("Unexpected symbol '.' at 1:4");
    });

    it('rejects a number running into a name', () => {
      const result = scan('12abc');

      expect(result.error?.kind).toBe('UnexpectedSymbol');
      expect(result.error?.location).toEqual({
        line: 1,
        column: 3,
        offset: 2,
      });
    });

    it('rejects a number running into an underscore', () => {
      expect(scan('3_').error?.kind).toBe('UnexpectedSymbol');
    });

    it('rejects a character outside the language', () => {
      const result = scan('a @ b');

      expect(result.tokens.map((t) => t.type)).toEqual(['IDENTIFIER']);
      expect(result.error?.kind).toBe('UnexpectedSymbol');
      expect(result.error?.location).toEqual({
        line: 1,
        column: 3,
        offset: 2,
      });
      expect(result.error?.context).toEqual({ char: '@' });
    });

    it('reports the column relative to the failing line', () => {
      const result = scan('a\n  b $');

      expect(result.tokens.map((t) => t.type)).toEqual([
        'IDENTIFIER',
        'IDENTIFIER',
      ]);
      expect(result.error?.location).toEqual({
        line: 2,
        column: 5,
        offset: 6,
      });
    });
  });

  describe('UnexpectedEndOfFile', () => {
    it('fails on a string with no closing quote', () => {
      const result = scan('"unterminated');

      expect(result.tokens).toEqual([]);
      expect(result.error?.kind).toBe('UnexpectedEndOfFile');
      expect(result.error?.errorId).toBe('GLY-L001');
      expect(result.error?.location).toEqual({
        line: 1,
        column: 14,
        offset: 13,
      });
    });

    it('fails on a backslash at end of input', () => {
      const result = scan('"abc\\');

      expect(result.error?.kind).toBe('UnexpectedEndOfFile');
      expect(result.error?.location.offset).toBe(5);
    });
  });

  describe('InvalidEscapeCharacter', () => {
    it('fails on a backslash followed by a space', () => {
      const result = scan('"bad\\ escape"');

      expect(result.tokens).toEqual([]);
      expect(result.error?.kind).toBe('InvalidEscapeCharacter');
      expect(result.error?.errorId).toBe('GLY-L003');
      expect(result.error?.location).toEqual({
        line: 1,
        column: 6,
        offset: 5,
      });
      expect(result.error?.message).toBe(
        "Invalid escape sequence '\\ ' at 1:6"
      );
    });

    it('rejects escapes outside the table', () => {
      expect(scan('"\\x41"').error?.kind).toBe('InvalidEscapeCharacter');
      expect(scan('"\\u0041"').error?.kind).toBe('InvalidEscapeCharacter');
    });
  });

  describe('UnexpectedEndOfLine', () => {
    it('fails at a raw newline inside a string', () => {
      const result = scan('x = "ab\ncd"');

      expect(result.tokens.map((t) => t.type)).toEqual(['IDENTIFIER', 'ASSIGN']);
      expect(result.error?.kind).toBe('UnexpectedEndOfLine');
      expect(result.error?.errorId).toBe('GLY-L004');
      expect(result.error?.location).toEqual({
        line: 1,
        column: 8,
        offset: 7,
      });
    });
  });

  describe('first-error abort', () => {
    it('appends no EOF token after a failure', () => {
      const result = scan('a b # c d');

      expect(result.tokens.map((t) => t.type)).toEqual([
        'IDENTIFIER',
        'IDENTIFIER',
      ]);
      expect(
        result.tokens.some((t) => t.type === TOKEN_TYPES.EOF)
      ).toBe(false);
    });

    it('records only the first of several errors', () => {
      const result = scan('1.2.3 @');
      expect(result.error?.location.column).toBe(4);
    });

    it('tokenize throws the LexerError', () => {
      expect(() => tokenize('a @')).toThrow(LexerError);
      expect(() => tokenize('a @')).toThrow("Unexpected symbol '@' at 1:3");
    });

    it('reports success with no error on valid input', () => {
      const result = scan('a');
      expect(result.success).toBe(true);
      expect(result.error).toBeUndefined();
    });
  });
});
