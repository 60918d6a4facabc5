/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { displayChar, lexerError } from './errors.js';
import {
  isDigit,
  isIdentifierChar,
  isIdentifierStart,
  makeToken,
} from './helpers.js';
import { ESCAPE_SEQUENCES } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/** Process escape sequence (backslash already consumed) and return the decoded text */
function processEscape(state: LexerState): string {
  if (isAtEnd(state)) {
    throw lexerError('UnexpectedEndOfFile', currentLocation(state));
  }

  const location = currentLocation(state);
  const escaped = advance(state);
  const decoded = ESCAPE_SEQUENCES[escaped];
  if (decoded === undefined) {
    throw lexerError('InvalidEscapeCharacter', location, {
      char: displayChar(escaped),
    });
  }
  return decoded;
}

export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening "

  let value = '';
  while (peek(state) !== '"') {
    if (isAtEnd(state)) {
      throw lexerError('UnexpectedEndOfFile', currentLocation(state));
    }

    // Raw line break: report at the newline itself, without consuming it
    if (peek(state) === '\n') {
      throw lexerError('UnexpectedEndOfLine', currentLocation(state));
    }

    if (peek(state) === '\\') {
      advance(state); // consume backslash
      value += processEscape(state);
    } else {
      value += advance(state);
    }
  }

  advance(state); // consume closing "

  return makeToken(TOKEN_TYPES.STRING, start, currentLocation(state), value);
}

/** Digits with at most one decimal point; a trailing name character is an error */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let dotSeen = false;

  while (!isAtEnd(state)) {
    const ch = peek(state);
    if (ch === '.') {
      if (dotSeen) {
        throw lexerError('UnexpectedSymbol', currentLocation(state), {
          char: ch,
        });
      }
      dotSeen = true;
      advance(state);
    } else if (isDigit(ch)) {
      advance(state);
    } else {
      break;
    }
  }

  if (isIdentifierStart(peek(state))) {
    throw lexerError('UnexpectedSymbol', currentLocation(state), {
      char: peek(state),
    });
  }

  const type = dotSeen ? TOKEN_TYPES.FLOAT : TOKEN_TYPES.INTEGER;
  return makeToken(type, start, currentLocation(state));
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    advance(state);
  }

  return makeToken(TOKEN_TYPES.IDENTIFIER, start, currentLocation(state));
}
