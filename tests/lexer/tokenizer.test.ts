/**
 * Lexer Tests: Token Classification
 * Whitespace, identifiers, integers, positions and unknown characters
 */

import { describe, expect, it } from 'vitest';
import { LexerError, tokenize, tokenValue } from '../../src/index.js';
import { LEXER_ERROR_IDS, TOKEN_TYPES } from '../../src/types.js';

function types(source: string): string[] {
  return tokenize(source).map((t) => t.type);
}

function captureError(fn: () => unknown): LexerError {
  try {
    fn();
  } catch (err) {
    if (err instanceof LexerError) return err;
    throw err;
  }
  throw new Error('Expected LexerError');
}

describe('Lexer: Token Classification', () => {
  describe('Whitespace and EOF', () => {
    it('returns only EOF for empty input', () => {
      const tokens = tokenize('');
      expect(tokens).toHaveLength(1);
      expect(tokens[0]!.type).toBe(TOKEN_TYPES.EOF);
      expect(tokens[0]!.text).toBe('');
    });

    it('returns only EOF for whitespace-only input', () => {
      expect(types(' \t\n  \r\n\f\v ')).toEqual([TOKEN_TYPES.EOF]);
    });

    it('treats non-ASCII whitespace as a separator', () => {
      expect(types('a\u00a0b')).toEqual([
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.EOF,
      ]);
    });

    it('treats NEL (U+0085) as whitespace', () => {
      expect(types('a\u0085b')).toEqual([
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.EOF,
      ]);
    });

    it('rejects a byte order mark, which is not whitespace', () => {
      const err = captureError(() => tokenize('\ufeffa'));
      expect(err.errorId).toBe(LEXER_ERROR_IDS.UNKNOWN_TOKEN);
      expect(err.context).toEqual({ char: '\ufeff' });
    });
  });

  describe('Identifiers', () => {
    it('applies maximal munch to foo123 bar', () => {
      const tokens = tokenize('foo123 bar');
      expect(tokens.map((t) => t.type)).toEqual([
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.EOF,
      ]);
      expect(tokenValue(tokens[0]!)).toBe('foo123');
      expect(tokenValue(tokens[1]!)).toBe('bar');
    });

    it('accepts a leading underscore', () => {
      const tokens = tokenize('_tmp_1');
      expect(tokens[0]!.type).toBe(TOKEN_TYPES.IDENTIFIER);
      expect(tokens[0]!.text).toBe('_tmp_1');
    });

    it('accepts Unicode letters', () => {
      expect(tokenValue(tokenize('café')[0]!)).toBe('café');
    });

    it('continues an identifier with non-ASCII digits', () => {
      const tokens = tokenize('x\u0663 y');
      expect(tokenValue(tokens[0]!)).toBe('x\u0663');
      expect(tokens[1]!.type).toBe(TOKEN_TYPES.IDENTIFIER);
    });

    it('splits a digit-led run into INT then IDENTIFIER', () => {
      const tokens = tokenize('12ab');
      expect(tokens.map((t) => t.type)).toEqual([
        TOKEN_TYPES.INT,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.EOF,
      ]);
      expect(tokenValue(tokens[0]!)).toBe(12);
      expect(tokenValue(tokens[1]!)).toBe('ab');
    });
  });

  describe('Integers', () => {
    it('parses 42', () => {
      const token = tokenize('42')[0]!;
      expect(token.type).toBe(TOKEN_TYPES.INT);
      expect(tokenValue(token)).toBe(42);
    });

    it('parses leading zeros as decimal', () => {
      const token = tokenize('007')[0]!;
      expect(tokenValue(token)).toBe(7);
      expect(token.text).toBe('007');
    });

    it('accepts the largest 32-bit value', () => {
      expect(tokenValue(tokenize('2147483647')[0]!)).toBe(2147483647);
    });

    it('rejects a literal that does not fit in 32 bits', () => {
      const err = captureError(() => tokenize('x = 2147483648;'));
      expect(err.errorId).toBe(LEXER_ERROR_IDS.NUMERIC_LITERAL_OVERFLOW);
      expect(err.context).toEqual({ value: '2147483648' });
      expect(err.location.column).toBe(4);
      expect(err.detail).toBe(
        'Integer literal 2147483648 does not fit in 32 bits'
      );
    });

    it('rejects a very long digit run', () => {
      const err = captureError(() => tokenize('99999999999999999999999'));
      expect(err.errorId).toBe(LEXER_ERROR_IDS.NUMERIC_LITERAL_OVERFLOW);
    });
  });

  describe('Spans', () => {
    it('records start and end of each token', () => {
      const tokens = tokenize('int x;', 'main.c');
      expect(tokens[1]!.span).toEqual({
        start: { filepath: 'main.c', row: 0, column: 4, offset: 4 },
        end: { filepath: 'main.c', row: 0, column: 5, offset: 5 },
      });
    });

    it('places a token after a newline on the next row at column 0', () => {
      const tokens = tokenize('a\nb');
      expect(tokens[1]!.span.start).toEqual({
        filepath: '<input>',
        row: 1,
        column: 0,
        offset: 2,
      });
    });

    it('counts columns in UTF-8 bytes', () => {
      const tokens = tokenize('"\u00e9\u{1F600}" x');
      expect(tokens[1]!.span.start).toEqual({
        filepath: '<input>',
        row: 0,
        column: 9,
        offset: 6,
      });
      expect(tokens[1]!.span.end.column).toBe(10);
    });

    it('places EOF at the end of the input', () => {
      const tokens = tokenize('a\n\n');
      expect(tokens[1]!.span.start).toEqual({
        filepath: '<input>',
        row: 2,
        column: 0,
        offset: 3,
      });
    });
  });

  describe('Unknown characters', () => {
    it('fails with UnknownToken for @', () => {
      const err = captureError(() => tokenize('int a @ b;', 'main.c'));
      expect(err).toBeInstanceOf(LexerError);
      expect(err.errorId).toBe(LEXER_ERROR_IDS.UNKNOWN_TOKEN);
      expect(err.context).toEqual({ char: '@' });
      expect(err.message).toBe('Unknown token @ at main.c:1:7');
    });

    it.each(['#', '$', '`', '[', ']', '.', ':', '?'])(
      'fails with UnknownToken for %s',
      (ch) => {
        const err = captureError(() => tokenize(ch));
        expect(err.errorId).toBe(LEXER_ERROR_IDS.UNKNOWN_TOKEN);
        expect(err.context).toEqual({ char: ch });
      }
    );
  });
});
