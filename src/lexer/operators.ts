/**
 * Operator Lookup Tables
 * Longest match wins: three-character entries are tried first.
 */

import type { SimpleTokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Three-character operator lookup table */
export const THREE_CHAR_OPERATORS: Record<string, SimpleTokenType> = {
  '<<=': TOKEN_TYPES.SHIFT_LEFT_EQUAL,
  '>>=': TOKEN_TYPES.SHIFT_RIGHT_EQUAL,
};

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Record<string, SimpleTokenType> = {
  '==': TOKEN_TYPES.EQ,
  '!=': TOKEN_TYPES.NE,
  '<=': TOKEN_TYPES.LE,
  '>=': TOKEN_TYPES.GE,
  '<<': TOKEN_TYPES.SHIFT_LEFT,
  '>>': TOKEN_TYPES.SHIFT_RIGHT,
  '&&': TOKEN_TYPES.AND,
  '||': TOKEN_TYPES.OR,
  '++': TOKEN_TYPES.PLUS_PLUS,
  '--': TOKEN_TYPES.MINUS_MINUS,
  '+=': TOKEN_TYPES.PLUS_EQUAL,
  '-=': TOKEN_TYPES.MINUS_EQUAL,
  '*=': TOKEN_TYPES.STAR_EQUAL,
  '/=': TOKEN_TYPES.SLASH_EQUAL,
  '%=': TOKEN_TYPES.PERCENT_EQUAL,
  '&=': TOKEN_TYPES.AMPERSAND_EQUAL,
  '|=': TOKEN_TYPES.PIPE_EQUAL,
  '^=': TOKEN_TYPES.CARET_EQUAL,
  '->': TOKEN_TYPES.ARROW,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, SimpleTokenType> = {
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '%': TOKEN_TYPES.PERCENT,
  '&': TOKEN_TYPES.AMPERSAND,
  '|': TOKEN_TYPES.PIPE,
  '^': TOKEN_TYPES.CARET,
  '~': TOKEN_TYPES.TILDE,
  '!': TOKEN_TYPES.BANG,
  '=': TOKEN_TYPES.ASSIGN,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  ',': TOKEN_TYPES.COMMA,
  ';': TOKEN_TYPES.SEMICOLON,
};

/** Character following a backslash mapped to the character it stands for */
export const ESCAPE_SEQUENCES: Record<string, string> = {
  a: '\x07',
  b: '\b',
  e: '\x1b',
  f: '\f',
  v: '\v',
  '?': '?',
  n: '\n',
  r: '\r',
  t: '\t',
  "'": "'",
  '"': '"',
  '\\': '\\',
};
