/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type {
  CharToken,
  IdentifierToken,
  IntToken,
  StringToken,
} from '../types.js';
import { LEXER_ERROR_IDS, TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import { isDigit, isIdentifierChar } from './helpers.js';
import { ESCAPE_SEQUENCES } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

const INT32_MAX = 2147483647;

/**
 * Decode the escape sequence at the cursor (which sits on the backslash).
 * Returns null when the input ends right after the backslash.
 */
function readEscape(state: LexerState): string | null {
  const location = currentLocation(state);
  advance(state); // consume backslash
  if (isAtEnd(state)) return null;

  const escaped = advance(state);
  const decoded = ESCAPE_SEQUENCES[escaped];
  if (decoded === undefined) {
    throw new LexerError(LEXER_ERROR_IDS.UNKNOWN_ESCAPE_SEQUENCE, location, {
      sequence: `\\${escaped}`,
    });
  }
  return decoded;
}

export function readString(state: LexerState): StringToken {
  const start = currentLocation(state);
  advance(state); // consume opening "

  let value = '';
  for (;;) {
    if (isAtEnd(state)) {
      throw new LexerError(LEXER_ERROR_IDS.UNTERMINATED_STRING_LITERAL, start);
    }

    const ch = peek(state);
    if (ch === '"') break;

    if (ch === '\\') {
      const decoded = readEscape(state);
      if (decoded === null) {
        throw new LexerError(
          LEXER_ERROR_IDS.UNTERMINATED_STRING_LITERAL,
          start
        );
      }
      value += decoded;
    } else {
      value += advance(state);
    }
  }

  advance(state); // consume closing "
  const end = currentLocation(state);
  return {
    type: TOKEN_TYPES.STRING,
    text: state.source.slice(start.offset, end.offset),
    value,
    span: { start, end },
  };
}

/** Exactly one literal or escaped character between single quotes */
export function readChar(state: LexerState): CharToken {
  const start = currentLocation(state);
  advance(state); // consume opening '

  const ch = peek(state);
  let value: string | null;
  if (ch === '' || ch === "'" || ch === '\n') {
    value = null;
  } else if (ch === '\\') {
    value = readEscape(state);
  } else {
    value = advance(state);
  }

  if (value === null || peek(state) !== "'") {
    // Stop on the closing quote of this line so one skipped character
    // resumes scanning after the bad literal
    while (!isAtEnd(state) && peek(state) !== "'" && peek(state) !== '\n') {
      advance(state);
    }
    throw new LexerError(LEXER_ERROR_IDS.UNTERMINATED_CHAR_LITERAL, start);
  }

  advance(state); // consume closing '
  const end = currentLocation(state);
  return {
    type: TOKEN_TYPES.CHAR,
    text: state.source.slice(start.offset, end.offset),
    value,
    span: { start, end },
  };
}

/** Base-10 digit run parsed as a signed 32-bit integer */
export function readNumber(state: LexerState): IntToken {
  const start = currentLocation(state);
  let text = '';

  while (!isAtEnd(state) && isDigit(peek(state))) {
    text += advance(state);
  }

  const value = Number.parseInt(text, 10);
  if (value > INT32_MAX) {
    throw new LexerError(LEXER_ERROR_IDS.NUMERIC_LITERAL_OVERFLOW, start, {
      value: text,
    });
  }

  return {
    type: TOKEN_TYPES.INT,
    text,
    value,
    span: { start, end: currentLocation(state) },
  };
}

export function readIdentifier(state: LexerState): IdentifierToken {
  const start = currentLocation(state);
  let text = '';

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    text += advance(state);
  }

  return {
    type: TOKEN_TYPES.IDENTIFIER,
    text,
    value: text,
    span: { start, end: currentLocation(state) },
  };
}
