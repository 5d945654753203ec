/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'config';

/**
 * Example demonstrating an error condition.
 * Used by `clex --explain` to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: CLEX-{category}{3-digit} (e.g., CLEX-L001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

/** Lexer error ids by failure kind */
export const LEXER_ERROR_IDS = {
  UNTERMINATED_STRING_LITERAL: 'CLEX-L001',
  UNTERMINATED_CHAR_LITERAL: 'CLEX-L002',
  UNKNOWN_ESCAPE_SEQUENCE: 'CLEX-L003',
  UNKNOWN_TOKEN: 'CLEX-L004',
  NUMERIC_LITERAL_OVERFLOW: 'CLEX-L005',
} as const;

export type LexerErrorId =
  (typeof LEXER_ERROR_IDS)[keyof typeof LEXER_ERROR_IDS];

export const CONFIG_ERROR_IDS = {
  INVALID_CONFIG: 'CLEX-C001',
  UNREADABLE_CONFIG: 'CLEX-C002',
} as const;

export type ConfigErrorId =
  (typeof CONFIG_ERROR_IDS)[keyof typeof CONFIG_ERROR_IDS];

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (CLEX-L0xx)
  {
    errorId: LEXER_ERROR_IDS.UNTERMINATED_STRING_LITERAL,
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause: 'String opened with a double quote but the file ended first.',
    resolution: 'Add the closing double quote.',
    examples: [
      { description: 'Missing closing quote', code: 'char *s = "hello;' },
      { description: 'Escaped closing quote', code: '"path\\"' },
    ],
  },
  {
    errorId: LEXER_ERROR_IDS.UNTERMINATED_CHAR_LITERAL,
    category: 'lexer',
    description: 'Unterminated character literal',
    messageTemplate: 'Unterminated character literal',
    cause:
      'Character literal is empty, holds more than one character, or is not closed by a single quote.',
    resolution:
      'Write exactly one character or escape sequence between single quotes.',
    examples: [
      { description: 'Empty literal', code: "char c = '';" },
      { description: 'Two characters', code: "char c = 'ab';" },
    ],
  },
  {
    errorId: LEXER_ERROR_IDS.UNKNOWN_ESCAPE_SEQUENCE,
    category: 'lexer',
    description: 'Unknown escape sequence',
    messageTemplate: 'Unknown escape sequence {sequence}',
    cause: 'Backslash followed by an unsupported character.',
    resolution:
      'Use one of \\a \\b \\e \\f \\v \\? \\n \\r \\t \\\' \\" \\\\. Numeric escapes are not supported.',
    examples: [
      { description: 'Unsupported letter', code: '"\\q"' },
      { description: 'Hex escape', code: '"\\x41"' },
    ],
  },
  {
    errorId: LEXER_ERROR_IDS.UNKNOWN_TOKEN,
    category: 'lexer',
    description: 'Unknown token',
    messageTemplate: 'Unknown token {char}',
    cause:
      'Character matches no token class, or = is directly followed by a character that cannot start an operand.',
    resolution:
      'Remove the character, or separate = from the following symbol with a space.',
    examples: [
      { description: 'Unsupported symbol', code: 'int a @ b;' },
      { description: 'Assignment glued to a symbol', code: 'x =(1);' },
    ],
  },
  {
    errorId: LEXER_ERROR_IDS.NUMERIC_LITERAL_OVERFLOW,
    category: 'lexer',
    description: 'Numeric literal overflow',
    messageTemplate: 'Integer literal {value} does not fit in 32 bits',
    cause: 'Decimal literal is greater than 2147483647.',
    resolution: 'Use a smaller literal.',
    examples: [{ description: 'One past the maximum', code: '2147483648' }],
  },

  // Config Errors (CLEX-C0xx)
  {
    errorId: CONFIG_ERROR_IDS.INVALID_CONFIG,
    category: 'config',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration: {reason}',
    cause: 'Configuration file has an unknown key or a value of the wrong type.',
    resolution:
      'Allowed keys: strictAssign (boolean), format (human, json, compact), maxErrors (positive integer).',
  },
  {
    errorId: CONFIG_ERROR_IDS.UNREADABLE_CONFIG,
    category: 'config',
    description: 'Unreadable configuration file',
    messageTemplate: 'Cannot read configuration {path}: {reason}',
    cause: 'Configuration file could not be read or is not valid YAML.',
    resolution: 'Check the file path and YAML syntax.',
  },
];

/** All error definitions indexed by error ID */
export const ERROR_REGISTRY: ReadonlyMap<string, ErrorDefinition> = new Map(
  ERROR_DEFINITIONS.map((def): [string, ErrorDefinition] => [def.errorId, def])
);

/** Placeholder names a template expects in its context, in order */
export function templatePlaceholders(template: string): string[] {
  return Array.from(
    template.matchAll(/\{(\w+)\}/g),
    (match) => match[1] ?? ''
  );
}

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Missing context values render as empty string.
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Unknown token {char}", { char: "@" })
 * // Returns: "Unknown token @"
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
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
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
