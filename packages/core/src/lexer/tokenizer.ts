/**
 * Tokenizer
 * Main tokenization logic
 */

import type { SourceInput, Token } from '../types.js';
import { TOKEN_TYPES, toSourceText } from '../types.js';
import { displayChar, LexerError, lexerError } from './errors.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import {
  SINGLE_CHAR_OPERATORS,
  THREE_CHAR_OPERATORS,
  TWO_CHAR_OPERATORS,
} from './operators.js';
import { readIdentifier, readNumber, readString } from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
} from './state.js';

/** Skip whitespace and line breaks; neither produces a token */
function skipTrivia(state: LexerState): void {
  while (!isAtEnd(state)) {
    const ch = peek(state);
    if (!isWhitespace(ch) && ch !== '\n') {
      return;
    }
    advance(state);
  }
}

export function nextToken(state: LexerState): Token {
  skipTrivia(state);

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  if (ch === '"') {
    return readString(state);
  }

  if (isDigit(ch)) {
    return readNumber(state);
  }

  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  // Maximal munch: longest operator first
  const threeChar = peekString(state, 3);
  const threeCharType = THREE_CHAR_OPERATORS[threeChar];
  if (threeCharType) {
    return advanceAndMakeToken(state, 3, threeCharType, start);
  }

  const twoChar = peekString(state, 2);
  const twoCharType = TWO_CHAR_OPERATORS[twoChar];
  if (twoCharType) {
    return advanceAndMakeToken(state, 2, twoCharType, start);
  }

  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return advanceAndMakeToken(state, 1, singleCharType, start);
  }

  throw lexerError('UnexpectedSymbol', start, { char: displayChar(ch) });
}

export interface ScanResult {
  /** Tokens recognized so far; ends with EOF only when success is true */
  readonly tokens: Token[];
  readonly error: LexerError | undefined;
  readonly success: boolean;
}

/**
 * Scan a whole source buffer. Stops at the first lexical error and
 * returns the tokens recognized before it.
 */
export function scan(source: SourceInput): ScanResult {
  const state = createLexerState(toSourceText(source));
  const tokens: Token[] = [];

  try {
    let token: Token;
    do {
      token = nextToken(state);
      tokens.push(token);
    } while (token.type !== TOKEN_TYPES.EOF);
  } catch (err) {
    if (err instanceof LexerError) {
      return { tokens, error: err, success: false };
    }
    throw err;
  }

  return { tokens, error: undefined, success: true };
}

/** Scan and return the full token stream, throwing the first LexerError */
export function tokenize(source: SourceInput): Token[] {
  const result = scan(source);
  if (result.error) {
    throw result.error;
  }
  return result.tokens;
}

/**
 * Raw source text of a token. Byte sources are decoded on every call;
 * pass the result of `toSourceText` when slicing many tokens.
 */
export function tokenLexeme(source: SourceInput, token: Token): string {
  return toSourceText(source).slice(
    token.span.start.offset,
    token.span.end.offset
  );
}
