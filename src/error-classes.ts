/**
 * Error Classes
 * Structured error types with registry-based error codes
 */

import { formatLocation, type SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ConfigErrorId,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface ClexErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Look up a definition, check its category, and render its message.
 * @throws TypeError on an unknown id or a category mismatch
 */
export function renderRegisteredMessage(
  errorId: string,
  category: ErrorCategory,
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all clex errors.
 * Provides structured data for host applications to format as needed.
 */
export class ClexError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
  /** Message without the location suffix */
  readonly detail: string;

  constructor(data: ClexErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${formatLocation(data.location)}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'ClexError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
    this.detail = data.message;
  }

  /** Get structured error data for custom formatting */
  toData(): ClexErrorData {
    return {
      errorId: this.errorId,
      message: this.detail,
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: ClexErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Configuration loading and validation errors */
export class ConfigError extends ClexError {
  constructor(errorId: ConfigErrorId, context: Record<string, unknown>) {
    super({
      errorId,
      message: renderRegisteredMessage(errorId, 'config', context),
      context,
    });
    this.name = 'ConfigError';
  }
}
