/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { SimpleToken, SimpleTokenType, SourceLocation } from '../types.js';
import { advance, currentLocation, type LexerState } from './state.js';

const ALPHABETIC = /^\p{Alphabetic}$/u;
const NUMERIC = /^\p{N}$/u;
// Unicode White_Space: includes U+0085, excludes U+FEFF
const WHITESPACE = /^\p{White_Space}$/u;

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isIdentifierStart(ch: string): boolean {
  return ch === '_' || ALPHABETIC.test(ch);
}

/** Continuation also takes any Unicode number, not only ASCII digits */
export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || NUMERIC.test(ch);
}

export function isWhitespace(ch: string): boolean {
  return WHITESPACE.test(ch);
}

export function makeToken(
  type: SimpleTokenType,
  text: string,
  start: SourceLocation,
  end: SourceLocation
): SimpleToken {
  return { type, text, span: { start, end } };
}

/** Advance n times and return a token */
export function advanceAndMakeToken(
  state: LexerState,
  n: number,
  type: SimpleTokenType,
  text: string,
  start: SourceLocation
): SimpleToken {
  for (let i = 0; i < n; i++) advance(state);
  return makeToken(type, text, start, currentLocation(state));
}
