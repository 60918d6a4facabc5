import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Comparison and assignment
  BANG: 'BANG', // !
  ASSIGN: 'ASSIGN', // =
  LT: 'LT', // <
  GT: 'GT', // >
  NE: 'NE', // !=
  EQ: 'EQ', // ==
  LE: 'LE', // <=
  GE: 'GE', // >=

  // Arithmetic operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  SLASH: 'SLASH', // /
  STAR: 'STAR', // *
  PERCENT: 'PERCENT', // %
  PLUS_ASSIGN: 'PLUS_ASSIGN', // +=
  MINUS_ASSIGN: 'MINUS_ASSIGN', // -=
  SLASH_ASSIGN: 'SLASH_ASSIGN', // /=
  STAR_ASSIGN: 'STAR_ASSIGN', // *=
  PERCENT_ASSIGN: 'PERCENT_ASSIGN', // %=
  INCREMENT: 'INCREMENT', // ++
  DECREMENT: 'DECREMENT', // --

  // Bitwise operators
  AMPERSAND: 'AMPERSAND', // &
  PIPE_BAR: 'PIPE_BAR', // |
  CARET: 'CARET', // ^
  SHIFT_LEFT: 'SHIFT_LEFT', // <<
  SHIFT_RIGHT: 'SHIFT_RIGHT', // >>
  AMPERSAND_ASSIGN: 'AMPERSAND_ASSIGN', // &=
  PIPE_ASSIGN: 'PIPE_ASSIGN', // |=
  CARET_ASSIGN: 'CARET_ASSIGN', // ^=
  SHIFT_LEFT_ASSIGN: 'SHIFT_LEFT_ASSIGN', // <<=
  SHIFT_RIGHT_ASSIGN: 'SHIFT_RIGHT_ASSIGN', // >>=

  // Literals
  INTEGER: 'INTEGER',
  FLOAT: 'FLOAT',
  STRING: 'STRING',

  // Identifiers
  IDENTIFIER: 'IDENTIFIER',

  // Delimiters
  BACKSLASH: 'BACKSLASH', // \
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  DOT: 'DOT', // .
  COMMA: 'COMMA', // ,
  SEMICOLON: 'SEMICOLON', // ;
  COLON: 'COLON', // :

  // Special
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  /** start is the first character of the lexeme, end is one past its last */
  readonly span: SourceSpan;
  /** Escape-decoded text, STRING tokens only */
  readonly literal?: string | undefined;
}
