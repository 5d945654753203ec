/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { formatLocation, formatToken, type Token } from './types.js';

/**
 * One token per line: position of its first character, then its display form.
 *
 * @example
 * formatTokenLine(token) // 'main.c:1:5 IDENTIFIER("x")'
 */
export function formatTokenLine(token: Token): string {
  return `${formatLocation(token.span.start)} ${formatToken(token)}`;
}

/**
 * Format a non-clex failure for stderr output
 */
export function formatFailure(err: unknown): string {
  if (!(err instanceof Error)) return String(err);

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/**
 * Package version from package.json, or '0.0.0' when it cannot be read
 */
export async function readVersion(): Promise<string> {
  const packageJsonPath = fileURLToPath(
    new URL('../package.json', import.meta.url)
  );
  try {
    const packageJson: unknown = JSON.parse(
      await readFile(packageJsonPath, 'utf-8')
    );
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch {
    // fall through to the placeholder version
  }
  return '0.0.0';
}
