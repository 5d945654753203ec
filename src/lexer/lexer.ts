/**
 * Lexer
 * Pull-based scanner over one source unit
 */

import type { SourceLocation, Token, TokenType } from '../types.js';
import { formatLocation } from '../types.js';
import {
  createLexerState,
  currentLocation,
  type LexerOptions,
  type LexerState,
} from './state.js';
import { expectToken, nextToken, skipChar } from './tokenizer.js';

/**
 * One instance per source unit. Each call consumes input; the cursor never
 * moves backwards. Once EOF is reached every further call returns EOF.
 *
 * @example
 * const lexer = new Lexer('int x;', 'main.c');
 * for (let t = lexer.nextToken(); t.type !== 'EOF'; t = lexer.nextToken()) {
 *   console.log(formatToken(t));
 * }
 */
export class Lexer {
  private readonly state: LexerState;

  constructor(source: string, filepath?: string, options?: LexerOptions) {
    this.state = createLexerState(source, filepath, options);
  }

  get filepath(): string {
    return this.state.filepath;
  }

  /** @throws LexerError on malformed input */
  nextToken(): Token {
    return nextToken(this.state);
  }

  /** Matching token, or null when the consumed token is of another kind */
  expectToken(kind: TokenType): Token | null {
    return expectToken(this.state, kind);
  }

  skipChar(): void {
    skipChar(this.state);
  }

  currentLocation(): SourceLocation {
    return currentLocation(this.state);
  }

  /** `file:row:column`, one-based */
  describeLocation(): string {
    return formatLocation(currentLocation(this.state));
  }
}
