/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token, TokenType } from '../types.js';
import { LEXER_ERROR_IDS, TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierChar,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import {
  SINGLE_CHAR_OPERATORS,
  THREE_CHAR_OPERATORS,
  TWO_CHAR_OPERATORS,
} from './operators.js';
import {
  readChar,
  readIdentifier,
  readNumber,
  readString,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerOptions,
  type LexerState,
  peek,
  peekString,
} from './state.js';

function skipWhitespace(state: LexerState): void {
  while (!isAtEnd(state) && isWhitespace(peek(state))) {
    advance(state);
  }
}

/** Bare `=` may only be followed by whitespace, an operand or another `=` */
function checkAssign(state: LexerState): void {
  if (!state.strictAssign) return;
  const next = peek(state, 1);
  if (next === '' || isWhitespace(next) || isIdentifierChar(next)) return;
  throw new LexerError(LEXER_ERROR_IDS.UNKNOWN_TOKEN, currentLocation(state), {
    char: `=${next}`,
  });
}

export function nextToken(state: LexerState): Token {
  skipWhitespace(state);

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  if (isDigit(ch)) {
    return readNumber(state);
  }

  if (ch === "'") {
    return readChar(state);
  }

  if (ch === '"') {
    return readString(state);
  }

  const threeChar = peekString(state, 3);
  const threeCharType = THREE_CHAR_OPERATORS[threeChar];
  if (threeCharType) {
    return advanceAndMakeToken(state, 3, threeCharType, threeChar, start);
  }

  const twoChar = peekString(state, 2);
  const twoCharType = TWO_CHAR_OPERATORS[twoChar];
  if (twoCharType) {
    return advanceAndMakeToken(state, 2, twoCharType, twoChar, start);
  }

  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    if (singleCharType === TOKEN_TYPES.ASSIGN) checkAssign(state);
    return advanceAndMakeToken(state, 1, singleCharType, ch, start);
  }

  throw new LexerError(LEXER_ERROR_IDS.UNKNOWN_TOKEN, start, { char: ch });
}

/**
 * Consume one token and return it if its kind matches, null otherwise.
 * The token is consumed either way.
 */
export function expectToken(state: LexerState, kind: TokenType): Token | null {
  const token = nextToken(state);
  return token.type === kind ? token : null;
}

/** Drop one character; drivers call this to continue past an error */
export function skipChar(state: LexerState): void {
  if (!isAtEnd(state)) advance(state);
}

export function tokenize(
  source: string,
  filepath?: string,
  options?: LexerOptions
): Token[] {
  const state = createLexerState(source, filepath, options);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}

export interface TokenizeResult {
  readonly tokens: Token[];
  readonly errors: LexerError[];
}

export interface RecoveryOptions extends LexerOptions {
  /** Stop after this many errors; the EOF token is then omitted */
  maxErrors?: number;
}

/**
 * Tokenize, collecting lexical errors instead of throwing.
 * After each error one character is skipped and scanning resumes.
 */
export function tokenizeWithRecovery(
  source: string,
  filepath?: string,
  options: RecoveryOptions = {}
): TokenizeResult {
  const state = createLexerState(source, filepath, options);
  const tokens: Token[] = [];
  const errors: LexerError[] = [];
  const maxErrors = options.maxErrors ?? Infinity;

  for (;;) {
    let token: Token;
    try {
      token = nextToken(state);
    } catch (err) {
      if (!(err instanceof LexerError)) throw err;
      errors.push(err);
      if (errors.length >= maxErrors) break;
      skipChar(state);
      continue;
    }
    tokens.push(token);
    if (token.type === TOKEN_TYPES.EOF) break;
  }

  return { tokens, errors };
}
