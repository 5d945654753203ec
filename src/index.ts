/**
 * clex - lexer for a C-like language
 * Public API for host applications
 */

export {
  createLexerState,
  currentLocation,
  expectToken,
  Lexer,
  LexerError,
  nextToken,
  skipChar,
  tokenize,
  tokenizeWithRecovery,
  type LexerOptions,
  type LexerState,
  type RecoveryOptions,
  type TokenizeResult,
} from './lexer/index.js';
export * from './types.js';
