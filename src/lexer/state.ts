/**
 * Lexer State
 * Tracks position in source text during tokenization
 */

import type { SourceLocation } from '../types.js';

export interface LexerOptions {
  /**
   * Reject a bare `=` directly followed by a character that is not
   * whitespace, an identifier character or `=`. Defaults to true.
   */
  strictAssign?: boolean;
}

/**
 * Cursor invariant: 0 <= bol <= cur <= source.length.
 * `row` counts consumed newlines. `cur` and `bol` index the string
 * (UTF-16 units); `column` is the UTF-8 byte length of `source[bol, cur)`.
 */
export interface LexerState {
  readonly source: string;
  /** Label used only in diagnostics */
  readonly filepath: string;
  readonly strictAssign: boolean;
  /** Absolute offset of the cursor */
  cur: number;
  /** Zero-based line index */
  row: number;
  /** Offset of the first character of the current line */
  bol: number;
  /** Byte offset of the cursor within the current line */
  column: number;
}

export function createLexerState(
  source: string,
  filepath = '<input>',
  options: LexerOptions = {}
): LexerState {
  return {
    source,
    filepath,
    strictAssign: options.strictAssign ?? true,
    cur: 0,
    row: 0,
    bol: 0,
    column: 0,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return {
    filepath: state.filepath,
    row: state.row,
    column: state.column,
    offset: state.cur,
  };
}

/**
 * Character `offset` code points ahead of the cursor, or '' past the end.
 * Astral characters come back whole.
 */
export function peek(state: LexerState, offset = 0): string {
  let pos = state.cur;
  for (let i = 0; i < offset; i++) {
    const cp = state.source.codePointAt(pos);
    if (cp === undefined) return '';
    pos += cp > 0xffff ? 2 : 1;
  }
  const cp = state.source.codePointAt(pos);
  return cp === undefined ? '' : String.fromCodePoint(cp);
}

export function peekString(state: LexerState, length: number): string {
  return state.source.slice(state.cur, state.cur + length);
}

function utf8Width(ch: string): number {
  const cp = ch.codePointAt(0) ?? 0;
  if (cp < 0x80) return 1;
  if (cp < 0x800) return 2;
  return cp < 0x10000 ? 3 : 4;
}

export function advance(state: LexerState): string {
  const ch = peek(state);
  if (ch === '') return ch;
  state.cur += ch.length;
  if (ch === '\n') {
    state.row++;
    state.bol = state.cur;
    state.column = 0;
  } else {
    state.column += utf8Width(ch);
  }
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.cur >= state.source.length;
}
