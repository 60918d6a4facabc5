/**
 * CLI Error Explanation
 * Renders registry documentation for --explain
 */

import { ERROR_REGISTRY, type ErrorDefinition } from '@glyph/core';

/** Error ID format: GLY-L followed by three digits */
export const ERROR_ID_PATTERN = /^GLY-L\d{3}$/;

function indent(text: string, width: number): string[] {
  const pad = ' '.repeat(width);
  return text.split('\n').map((line) => `${pad}${line}`);
}

function section(title: string, body: string[]): string[] {
  return [`${title}:`, ...body, ''];
}

function exampleLines(definition: ErrorDefinition): string[] {
  return (definition.examples ?? []).flatMap((example) => [
    ...indent(example.description, 2),
    '',
    ...indent(example.code, 4),
    '',
  ]);
}

/**
 * Render full documentation for an error ID:
 *
 * ```
 * GLY-L003 (InvalidEscapeCharacter): Invalid escape sequence
 *
 * Message:
 *   Invalid escape sequence '\{char}'
 * ...
 * ```
 *
 * @returns null if errorId is malformed or not in the registry
 */
export function explainError(errorId: string): string | null {
  if (!ERROR_ID_PATTERN.test(errorId)) {
    return null;
  }

  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    return null;
  }

  const lines = [
    `${definition.errorId} (${definition.kind}): ${definition.description}`,
    '',
    ...section('Message', indent(definition.messageTemplate, 2)),
  ];
  if (definition.cause) {
    lines.push(...section('Cause', indent(definition.cause, 2)));
  }
  if (definition.resolution) {
    lines.push(...section('Resolution', indent(definition.resolution, 2)));
  }
  const examples = exampleLines(definition);
  if (examples.length > 0) {
    lines.push('Examples:', ...examples);
  }

  return lines.join('\n').trimEnd();
}
