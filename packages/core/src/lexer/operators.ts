/**
 * Lookup Tables
 * Operators are matched longest first, so every prefix of an entry is
 * itself a valid operator.
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Three-character operator lookup table */
export const THREE_CHAR_OPERATORS: Record<string, TokenType> = {
  '<<=': TOKEN_TYPES.SHIFT_LEFT_ASSIGN,
  '>>=': TOKEN_TYPES.SHIFT_RIGHT_ASSIGN,
};

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  '<<': TOKEN_TYPES.SHIFT_LEFT,
  '>>': TOKEN_TYPES.SHIFT_RIGHT,
  '<=': TOKEN_TYPES.LE,
  '>=': TOKEN_TYPES.GE,
  '==': TOKEN_TYPES.EQ,
  '!=': TOKEN_TYPES.NE,
  '++': TOKEN_TYPES.INCREMENT,
  '--': TOKEN_TYPES.DECREMENT,
  '+=': TOKEN_TYPES.PLUS_ASSIGN,
  '-=': TOKEN_TYPES.MINUS_ASSIGN,
  '*=': TOKEN_TYPES.STAR_ASSIGN,
  '/=': TOKEN_TYPES.SLASH_ASSIGN,
  '%=': TOKEN_TYPES.PERCENT_ASSIGN,
  '&=': TOKEN_TYPES.AMPERSAND_ASSIGN,
  '|=': TOKEN_TYPES.PIPE_ASSIGN,
  '^=': TOKEN_TYPES.CARET_ASSIGN,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '!': TOKEN_TYPES.BANG,
  '=': TOKEN_TYPES.ASSIGN,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '%': TOKEN_TYPES.PERCENT,
  '&': TOKEN_TYPES.AMPERSAND,
  '|': TOKEN_TYPES.PIPE_BAR,
  '^': TOKEN_TYPES.CARET,
  '\\': TOKEN_TYPES.BACKSLASH,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  '.': TOKEN_TYPES.DOT,
  ',': TOKEN_TYPES.COMMA,
  ';': TOKEN_TYPES.SEMICOLON,
  ':': TOKEN_TYPES.COLON,
};

/** String escape table: character after the backslash to decoded text */
export const ESCAPE_SEQUENCES: Record<string, string> = {
  a: '\x07',
  b: '\b',
  e: '\x1b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
  '\\': '\\',
  "'": "'",
  '"': '"',
  '?': '?',
};
