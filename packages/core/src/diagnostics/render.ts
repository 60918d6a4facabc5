/**
 * Diagnostic Renderer
 * Pointer-annotated text for a recorded lexer error
 */

import type { LexerError } from '../lexer/errors.js';
import { toSourceText, type SourceInput } from '../types.js';

/** Width the line number is right-justified to */
const LINE_NUMBER_WIDTH = 5;

/**
 * Extract the full text of the line containing `offset`, given the
 * 1-based column of that offset. Stops at the next newline or end of input.
 */
export function sourceLineAt(
  source: string,
  offset: number,
  column: number
): string {
  const lineStart = Math.max(0, offset - (column - 1));
  const newline = source.indexOf('\n', lineStart);
  return source.slice(lineStart, newline === -1 ? source.length : newline);
}

/**
 * Render a lexer error as a three-line diagnostic:
 *
 * ```
 * UnexpectedSymbol at 2:5
 *     2| a = @b
 *            ^
 * ```
 *
 * The caret is indented by `6 + column` spaces so it sits under the
 * failing character after the `"<line>| "` prefix.
 *
 * @throws {TypeError} when there is no error to render
 */
export function renderDiagnostic(
  error: LexerError | undefined,
  source: SourceInput
): string {
  if (!error) {
    throw new TypeError('No lexer error to render');
  }

  const { line, column, offset } = error.location;
  const text = sourceLineAt(toSourceText(source), offset, column);
  const lineNumber = String(line).padStart(LINE_NUMBER_WIDTH, ' ');

  return [
    `${error.kind} at ${line}:${column}`,
    `${lineNumber}| ${text}`,
    `${' '.repeat(LINE_NUMBER_WIDTH + 1 + column)}^`,
  ].join('\n');
}
