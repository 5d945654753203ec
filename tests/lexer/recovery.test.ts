/**
 * Lexer Tests: Error Recovery
 * tokenizeWithRecovery collects every error and keeps scanning
 */

import { describe, expect, it } from 'vitest';
import { tokenizeWithRecovery } from '../../src/index.js';
import { LEXER_ERROR_IDS, TOKEN_TYPES } from '../../src/types.js';

describe('Lexer: Error Recovery', () => {
  it('returns tokens and no errors for valid input', () => {
    const result = tokenizeWithRecovery('a + b;');
    expect(result.errors).toEqual([]);
    expect(result.tokens.map((t) => t.type)).toEqual([
      TOKEN_TYPES.IDENTIFIER,
      TOKEN_TYPES.PLUS,
      TOKEN_TYPES.IDENTIFIER,
      TOKEN_TYPES.SEMICOLON,
      TOKEN_TYPES.EOF,
    ]);
  });

  it('collects several errors from one file', () => {
    const result = tokenizeWithRecovery('int @ x = "abc', 'bad.c');

    expect(result.tokens.map((t) => t.text)).toEqual(['int', 'x', '=', '']);
    expect(result.errors.map((e) => e.errorId)).toEqual([
      LEXER_ERROR_IDS.UNKNOWN_TOKEN,
      LEXER_ERROR_IDS.UNTERMINATED_STRING_LITERAL,
    ]);
    expect(result.errors.map((e) => e.location.column)).toEqual([4, 10]);
  });

  it('skips one character after an error thrown before consuming', () => {
    const result = tokenizeWithRecovery('@ # x');
    expect(result.errors.map((e) => e.context)).toEqual([
      { char: '@' },
      { char: '#' },
    ]);
    expect(result.tokens.map((t) => t.type)).toEqual([
      TOKEN_TYPES.IDENTIFIER,
      TOKEN_TYPES.EOF,
    ]);
  });

  it('reports a malformed char literal once and resumes after it', () => {
    const result = tokenizeWithRecovery("c = 'ab'; d = 1;");
    expect(result.errors.map((e) => [e.errorId, e.location.column])).toEqual([
      [LEXER_ERROR_IDS.UNTERMINATED_CHAR_LITERAL, 4],
    ]);
    expect(result.tokens.map((t) => t.text)).toEqual([
      'c', '=', ';', 'd', '=', '1', ';', '',
    ]);
  });

  it('resumes on the next line after an unclosed char literal', () => {
    const result = tokenizeWithRecovery("'ab\nx");
    expect(result.errors).toHaveLength(1);
    expect(result.tokens[0]!.span.start).toMatchObject({ row: 1, column: 0 });
  });

  it('stops after maxErrors errors', () => {
    const result = tokenizeWithRecovery('@ # x', undefined, { maxErrors: 1 });
    expect(result.errors).toHaveLength(1);
    expect(result.tokens).toEqual([]);
  });

  it('honours strictAssign', () => {
    const strict = tokenizeWithRecovery('x =(1)');
    expect(strict.errors).toHaveLength(1);

    const relaxed = tokenizeWithRecovery('x =(1)', undefined, {
      strictAssign: false,
    });
    expect(relaxed.errors).toEqual([]);
  });
});
