/**
 * clex Types
 * Tokens, locations and the error hierarchy
 */

export * from './source-location.js';
export * from './token-types.js';
export * from './error-registry.js';
export * from './error-classes.js';
