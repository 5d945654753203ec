import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  IDENTIFIER: 'IDENTIFIER',
  INT: 'INT',
  FLOAT: 'FLOAT', // reserved, not produced by the scanner
  CHAR: 'CHAR',
  STRING: 'STRING',

  // Arithmetic operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // *
  SLASH: 'SLASH', // /
  PERCENT: 'PERCENT', // %

  // Bitwise operators
  AMPERSAND: 'AMPERSAND', // &
  PIPE: 'PIPE', // |
  CARET: 'CARET', // ^
  TILDE: 'TILDE', // ~
  SHIFT_LEFT: 'SHIFT_LEFT', // <<
  SHIFT_RIGHT: 'SHIFT_RIGHT', // >>

  // Assignment
  ASSIGN: 'ASSIGN', // =

  // Comparison operators
  EQ: 'EQ', // ==
  NE: 'NE', // !=
  LT: 'LT', // <
  LE: 'LE', // <=
  GT: 'GT', // >
  GE: 'GE', // >=

  // Logical operators
  AND: 'AND', // &&
  OR: 'OR', // ||
  BANG: 'BANG', // !

  // Increment / decrement
  PLUS_PLUS: 'PLUS_PLUS', // ++
  MINUS_MINUS: 'MINUS_MINUS', // --

  // Compound assignment
  PLUS_EQUAL: 'PLUS_EQUAL', // +=
  MINUS_EQUAL: 'MINUS_EQUAL', // -=
  STAR_EQUAL: 'STAR_EQUAL', // *=
  SLASH_EQUAL: 'SLASH_EQUAL', // /=
  PERCENT_EQUAL: 'PERCENT_EQUAL', // %=
  AMPERSAND_EQUAL: 'AMPERSAND_EQUAL', // &=
  PIPE_EQUAL: 'PIPE_EQUAL', // |=
  CARET_EQUAL: 'CARET_EQUAL', // ^=
  SHIFT_LEFT_EQUAL: 'SHIFT_LEFT_EQUAL', // <<=
  SHIFT_RIGHT_EQUAL: 'SHIFT_RIGHT_EQUAL', // >>=

  // Separators
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  COMMA: 'COMMA', // ,
  SEMICOLON: 'SEMICOLON', // ;
  ARROW: 'ARROW', // ->

  // Special
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

/** Kinds that carry a decoded payload */
export type ValueTokenType =
  | typeof TOKEN_TYPES.IDENTIFIER
  | typeof TOKEN_TYPES.INT
  | typeof TOKEN_TYPES.FLOAT
  | typeof TOKEN_TYPES.CHAR
  | typeof TOKEN_TYPES.STRING;

/** Operators, separators and EOF */
export type SimpleTokenType = Exclude<TokenType, ValueTokenType>;

interface BaseToken {
  /** Raw lexeme as it appears in the source */
  readonly text: string;
  readonly span: SourceSpan;
}

export interface IdentifierToken extends BaseToken {
  readonly type: typeof TOKEN_TYPES.IDENTIFIER;
  readonly value: string;
}

export interface IntToken extends BaseToken {
  readonly type: typeof TOKEN_TYPES.INT;
  readonly value: number;
}

export interface FloatToken extends BaseToken {
  readonly type: typeof TOKEN_TYPES.FLOAT;
  readonly value: number;
}

export interface CharToken extends BaseToken {
  readonly type: typeof TOKEN_TYPES.CHAR;
  readonly value: string;
}

export interface StringToken extends BaseToken {
  readonly type: typeof TOKEN_TYPES.STRING;
  readonly value: string;
}

export interface SimpleToken extends BaseToken {
  readonly type: SimpleTokenType;
}

export type ValueToken =
  | IdentifierToken
  | IntToken
  | FloatToken
  | CharToken
  | StringToken;

export type Token = ValueToken | SimpleToken;

// ============================================================
// TOKEN COMPARISON
// ============================================================

export function tokenKind(token: Token): TokenType {
  return token.type;
}

/** Payload of a literal or identifier token, undefined for the rest */
export function tokenValue(token: Token): string | number | undefined {
  return 'value' in token ? token.value : undefined;
}

/** Kind-only match used by grammar code: payload and span are ignored */
export function isKind(token: Token, kind: TokenType): boolean {
  return tokenKind(token) === kind;
}

export function sameKind(a: Token, b: Token): boolean {
  return tokenKind(a) === tokenKind(b);
}

/** Structural equality on kind and payload (span ignored) */
export function tokensEqual(a: Token, b: Token): boolean {
  return sameKind(a, b) && tokenValue(a) === tokenValue(b);
}

/**
 * Display form of a token.
 *
 * @example
 * formatToken(identifier) // 'IDENTIFIER("main")'
 * formatToken(int)        // 'INT(42)'
 * formatToken(plus)       // 'PLUS'
 */
export function formatToken(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.INT:
    case TOKEN_TYPES.FLOAT:
      return `${token.type}(${token.value})`;
    case TOKEN_TYPES.IDENTIFIER:
    case TOKEN_TYPES.CHAR:
    case TOKEN_TYPES.STRING:
      return `${token.type}(${JSON.stringify(token.value)})`;
    default:
      return token.type;
  }
}
