/**
 * CLI Error Explanation
 * Renders registry documentation for `lox --explain`
 */

import { ERROR_ID_PATTERN, ERROR_REGISTRY } from '@loxkit/core';

/**
 * Render full error documentation for --explain command.
 *
 * Sections without content in the registry are left out.
 *
 * @param errorId - Error identifier (format: LOX-{L|P}{3-digit})
 * @returns Formatted documentation, or null if errorId is malformed or unknown
 *
 * @example
 * explainError('LOX-P002')
 * // "LOX-P002: Expected expression\n\nCause:\n  ..."
 */
export function explainError(errorId: string): string | null {
  if (!ERROR_ID_PATTERN.test(errorId)) {
    return null;
  }

  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    return null;
  }

  const sections: string[] = [];

  sections.push(`${definition.errorId}: ${definition.description}`);
  sections.push('');

  if (definition.cause) {
    sections.push('Cause:');
    sections.push(`  ${definition.cause}`);
    sections.push('');
  }

  if (definition.resolution) {
    sections.push('Resolution:');
    sections.push(`  ${definition.resolution}`);
    sections.push('');
  }

  if (definition.examples && definition.examples.length > 0) {
    sections.push('Examples:');
    for (const example of definition.examples) {
      sections.push(`  ${example.description}`);
      sections.push('');
      for (const line of example.code.split('\n')) {
        sections.push(`    ${line}`);
      }
      sections.push('');
    }
  }

  return sections.join('\n').trimEnd();
}
