/**
 * Lexer Module
 * Converts source text into tokens
 */

export { LexerError } from './errors.js';
export { Lexer } from './lexer.js';
export {
  createLexerState,
  currentLocation,
  type LexerOptions,
  type LexerState,
} from './state.js';
export {
  expectToken,
  nextToken,
  skipChar,
  tokenize,
  tokenizeWithRecovery,
  type RecoveryOptions,
  type TokenizeResult,
} from './tokenizer.js';
