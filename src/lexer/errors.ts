/**
 * Lexer Errors
 */

import { ClexError, renderRegisteredMessage } from '../types.js';
import type { LexerErrorId, SourceLocation } from '../types.js';

export class LexerError extends ClexError {
  // Override to make location required (lexer errors always have location)
  override readonly location: SourceLocation;
  override readonly errorId: LexerErrorId;

  constructor(
    errorId: LexerErrorId,
    location: SourceLocation,
    context: Record<string, unknown> = {}
  ) {
    super({
      errorId,
      message: renderRegisteredMessage(errorId, 'lexer', context),
      location,
      context,
    });

    this.name = 'LexerError';
    this.errorId = errorId;
    this.location = location;
  }
}
