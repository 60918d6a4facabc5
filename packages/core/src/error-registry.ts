/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR KINDS
// ============================================================

/** Closed set of lexical failure kinds */
export type LexErrorKind =
  | 'UnexpectedEndOfFile'
  | 'UnexpectedSymbol'
  | 'InvalidEscapeCharacter'
  | 'UnexpectedEndOfLine';

/** Registry ID for each lexical failure kind */
export const LEXER_ERROR_IDS = {
  UnexpectedEndOfFile: 'GLY-L001',
  UnexpectedSymbol: 'GLY-L002',
  InvalidEscapeCharacter: 'GLY-L003',
  UnexpectedEndOfLine: 'GLY-L004',
} as const satisfies Record<LexErrorKind, string>;

/**
 * Example demonstrating an error condition.
 * Used by --explain to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: GLY-L{3-digit} (e.g., GLY-L001) */
  readonly errorId: string;
  readonly kind: LexErrorKind;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  {
    errorId: LEXER_ERROR_IDS.UnexpectedEndOfFile,
    kind: 'UnexpectedEndOfFile',
    description: 'Unexpected end of file',
    messageTemplate: 'Unexpected end of file',
    cause:
      'Input ended in the middle of a token, usually a string literal that was never closed.',
    resolution:
      'Add the closing quote. A backslash at the very end of a string also needs a character after it.',
    examples: [
      {
        description: 'Missing closing quote at end of file',
        code: 'say("hello',
      },
      {
        description: 'Dangling backslash at end of file',
        code: '"path\\',
      },
    ],
  },
  {
    errorId: LEXER_ERROR_IDS.UnexpectedSymbol,
    kind: 'UnexpectedSymbol',
    description: 'Unexpected symbol',
    messageTemplate: "Unexpected symbol '{char}'",
    cause:
      'Character is not part of Glyph syntax, a number has a second decimal point, or a number runs into a name.',
    resolution:
      'Remove the character, keep one decimal point per number, and separate numbers from names with a space or operator.',
    examples: [
      {
        description: 'Character outside the language',
        code: 'score @ 2',
      },
      {
        description: 'Two decimal points',
        code: 'speed = 1.2.3',
      },
      {
        description: 'Number followed by a name',
        code: 'move 3tiles',
      },
    ],
  },
  {
    errorId: LEXER_ERROR_IDS.InvalidEscapeCharacter,
    kind: 'InvalidEscapeCharacter',
    description: 'Invalid escape sequence',
    messageTemplate: "Invalid escape sequence '\\{char}'",
    cause: 'Backslash followed by an unsupported character in a string literal.',
    resolution:
      'Use one of \\a \\b \\e \\f \\n \\r \\t \\v \\\\ \\\' \\" \\?. For a literal backslash, write \\\\.',
    examples: [
      {
        description: 'Backslash followed by a space',
        code: '"bad\\ escape"',
      },
    ],
  },
  {
    errorId: LEXER_ERROR_IDS.UnexpectedEndOfLine,
    kind: 'UnexpectedEndOfLine',
    description: 'Unterminated string literal',
    messageTemplate: 'Unexpected end of line in string literal',
    cause: 'String literal contains a raw line break before its closing quote.',
    resolution:
      'Close the string on the same line, or write the line break as \\n.',
    examples: [
      {
        description: 'Line break inside a string',
        code: 'say("hello\nworld")',
      },
    ],
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// MESSAGE RENDERING
// ============================================================

/**
 * Renders a message template by replacing {placeholder} with context values.
 * Missing values render as empty string; an unclosed brace returns the
 * template unchanged.
 *
 * @example
 * renderMessage("Unexpected symbol '{char}'", { char: "@" })
 * // Returns: "Unexpected symbol '@'"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template[i + 1] !== '{') {
      let j = i + 1;
      while (j < template.length && template[j] !== '}') {
        j++;
      }

      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += String(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
