/**
 * Glyph Module
 * Exports the lexer, diagnostics, and token types
 */

export {
  createLexerState,
  LexerError,
  nextToken,
  scan,
  tokenize,
  tokenLexeme,
  type LexerState,
  type ScanResult,
} from './lexer/index.js';
export { renderDiagnostic, sourceLineAt } from './diagnostics/render.js';
export { VERSION } from './version.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorDefinition,
  type ErrorExample,
  type LexErrorKind,
  ERROR_REGISTRY,
  LEXER_ERROR_IDS,
  renderMessage,
  createError,
} from './types.js';

export * from './types.js';
