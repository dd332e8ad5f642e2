/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES AND SEVERITY
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse';

/**
 * Example demonstrating an error condition.
 * Used by `lox --explain` to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: LOX-{category}{3-digit} (e.g., LOX-P002) */
  readonly errorId: string;
  readonly category: ErrorCategory;
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
 * Lookup table for all error definitions.
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
  // Lexer Errors (LOX-L0xx)
  {
    errorId: 'LOX-L001',
    category: 'lexer',
    description: 'Unterminated string',
    messageTemplate: 'Unterminated string.',
    cause: 'A string was opened with a double quote but never closed.',
    resolution:
      'Add the closing double quote. Strings may span several lines but must end before the end of the file.',
    examples: [
      {
        description: 'Missing closing quote',
        code: 'print "hello;',
      },
    ],
  },
  {
    errorId: 'LOX-L002',
    category: 'lexer',
    description: 'Unexpected character',
    messageTemplate: 'Unexpected character: {char}',
    cause: 'Character is not part of any Lox token.',
    resolution:
      'Remove or replace the character. Common causes are operators Lox lacks (%, &, |) or characters pasted from rich text.',
    examples: [
      {
        description: 'Modulo operator',
        code: 'print 10 % 3;',
      },
      {
        description: 'Hash comment instead of //',
        code: '# not a comment',
      },
    ],
  },

  // Parse Errors (LOX-P0xx)
  {
    errorId: 'LOX-P001',
    category: 'parse',
    description: 'Expected token',
    messageTemplate: 'Expect {description}.',
    cause: 'A required token is missing at this point of the grammar.',
    resolution:
      'Insert the missing token. The most frequent case is a missing semicolon at the end of the previous statement.',
    examples: [
      {
        description: 'Missing semicolon',
        code: 'var a = 1\nprint a;',
      },
      {
        description: 'Unclosed parenthesis',
        code: 'print (1 + 2;',
      },
    ],
  },
  {
    errorId: 'LOX-P002',
    category: 'parse',
    description: 'Expected expression',
    messageTemplate: 'Expect expression.',
    cause: 'An operand is missing where an expression must start.',
    resolution: 'Complete the expression or remove the dangling operator.',
    examples: [
      {
        description: 'Dangling binary operator',
        code: 'print 1 + ;',
      },
    ],
  },
  {
    errorId: 'LOX-P003',
    category: 'parse',
    description: 'Too many arguments',
    messageTemplate: "Can't have more than {limit} arguments.",
    cause: 'A call passes more arguments than the configured limit.',
    resolution:
      'Pass fewer arguments, for example by grouping related values into an instance.',
  },
  {
    errorId: 'LOX-P004',
    category: 'parse',
    description: 'Invalid assignment target',
    messageTemplate: 'Invalid assignment target.',
    cause:
      'The left side of "=" is not a variable or a property access.',
    resolution: 'Assign to a variable name or to an instance field.',
    examples: [
      {
        description: 'Assigning to an arithmetic result',
        code: 'a + b = c;',
      },
    ],
  },
  {
    errorId: 'LOX-P005',
    category: 'parse',
    description: 'Too many parameters',
    messageTemplate: "Can't have more than {limit} parameters.",
    cause: 'A function declares more parameters than the configured limit.',
    resolution: 'Declare fewer parameters.',
  },
  {
    errorId: 'LOX-P006',
    category: 'parse',
    description: 'Nesting too deep',
    messageTemplate: "Can't nest more than {limit} levels.",
    cause:
      'Parentheses, calls, unary operators, assignments, blocks or functions are nested past the parser limit.',
    resolution:
      'Split the expression or statement into smaller parts held in variables or functions.',
  },
];

/** Registry of every lexer and parse error, keyed by error ID */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

/** Pattern every registered error ID follows */
export const ERROR_ID_PATTERN = /^LOX-[LP]\d{3}$/;

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Replace `{name}` placeholders with values from context.
 *
 * Missing values render as empty strings. An unclosed brace returns the
 * template unchanged.
 *
 * @example
 * renderMessage('Unexpected character: {char}', { char: '$' })
 * // Returns: "Unexpected character: $"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }
      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
