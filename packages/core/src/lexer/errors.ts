/**
 * Lexer Errors
 */

import { renderDiagnostic } from '../diagnostics/render.js';
import {
  ERROR_REGISTRY,
  GlyphError,
  LEXER_ERROR_IDS,
  registryMessage,
  type LexErrorKind,
  type SourceInput,
  type SourceLocation,
} from '../types.js';

export class LexerError extends GlyphError {
  // Lexer errors always have a location
  override readonly location: SourceLocation;
  readonly kind: LexErrorKind;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }

    super({ errorId, message, location, context });

    this.name = 'LexerError';
    this.location = location;
    this.kind = definition.kind;
  }

  /** Pointer diagnostic against the source this error came from */
  render(source: SourceInput): string {
    return renderDiagnostic(this, source);
  }
}

/** Printable form of a character for error messages */
export function displayChar(ch: string): string {
  return JSON.stringify(ch).slice(1, -1);
}

export function lexerError(
  kind: LexErrorKind,
  location: SourceLocation,
  context: Record<string, unknown> = {}
): LexerError {
  const errorId = LEXER_ERROR_IDS[kind];
  return new LexerError(
    errorId,
    registryMessage(errorId, context),
    location,
    context
  );
}
