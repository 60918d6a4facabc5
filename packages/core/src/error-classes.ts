/**
 * Glyph Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import { ERROR_REGISTRY, renderMessage } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface GlyphErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Render the registry message for an error ID.
 *
 * @throws TypeError if errorId is not found in registry
 */
export function registryMessage(
  errorId: string,
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

/**
 * Create an error from its registry definition.
 *
 * @example
 * createError("GLY-L002", { char: "@" }, location)
 * // GlyphError: "Unexpected symbol '@' at 1:7"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): GlyphError {
  return new GlyphError({
    errorId,
    message: registryMessage(errorId, context),
    location,
    context,
  });
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Glyph errors.
 * `message` carries a ` at line:column` suffix when a location is known;
 * `detail` is the message without it.
 */
export class GlyphError extends Error {
  readonly errorId: string;
  readonly detail: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: GlyphErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(
      data.location
        ? `${data.message} at ${data.location.line}:${data.location.column}`
        : data.message
    );
    this.name = 'GlyphError';
    this.errorId = data.errorId;
    this.detail = data.message;
    this.location = data.location;
    this.context = data.context;
  }

  toData(): GlyphErrorData {
    return {
      errorId: this.errorId,
      message: this.detail,
      location: this.location,
      context: this.context,
    };
  }

  /** `[GLY-L002] Unexpected symbol '@' at 1:3`, or the host formatter's output */
  format(formatter?: (data: GlyphErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return `[${this.errorId}] ${this.message}`;
  }
}
