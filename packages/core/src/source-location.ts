// ============================================================
// SOURCE LOCATION
// ============================================================

/** 1-based line and column, 0-based offset into the source */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

// ============================================================
// SOURCE TEXT
// ============================================================

/** Source accepted by the scanner: text, or raw bytes read as Latin-1 */
export type SourceInput = string | Uint8Array;

/**
 * Normalize scanner input to a string whose offsets are byte offsets.
 * Bytes map one-to-one onto code units 0x00-0xFF.
 */
export function toSourceText(source: SourceInput): string {
  if (typeof source === 'string') {
    return source;
  }
  return Buffer.from(
    source.buffer,
    source.byteOffset,
    source.byteLength
  ).toString('latin1');
}
