/**
 * CLI Error Formatter
 * Format errors for human-readable, JSON, or compact output
 */

import { formatLocation, type ClexError } from './types.js';
import type { OutputFormat } from './cli-config.js';

// ============================================================
// ERROR FORMATTING
// ============================================================

/**
 * Format an error for output.
 *
 * - Human format: multi-line with snippet and caret
 * - JSON format: LSP Diagnostic compatible
 * - Compact format: single line for CI
 *
 * @param source - Source text the error points into, for the snippet
 * @throws {TypeError} Unknown format
 */
export function formatError(
  error: ClexError,
  format: OutputFormat,
  source?: string
): string {
  switch (format) {
    case 'human':
      return formatErrorHuman(error, source);
    case 'json':
      return formatErrorJson(error);
    case 'compact':
      return formatErrorCompact(error);
    default:
      throw new TypeError(`Unknown format: ${String(format)}`);
  }
}

/**
 * Output format:
 * ```
 * error[CLEX-L004]: Unknown token @
 *   --> main.c:1:7
 *    |
 *  1 | int a @ b;
 *    |       ^
 *    |
 * ```
 */
function formatErrorHuman(error: ClexError, source?: string): string {
  const lines: string[] = [`error[${error.errorId}]: ${error.detail}`];
  const location = error.location;
  if (!location) return lines.join('\n');

  lines.push(`  --> ${formatLocation(location)}`);

  const content = source?.split('\n')[location.row];
  if (content === undefined) return lines.join('\n');

  const text = content.replace(/\r$/, '');
  const lineNumStr = String(location.row + 1);
  const gutter = ' '.repeat(lineNumStr.length);

  lines.push(` ${gutter} |`);
  lines.push(` ${lineNumStr} | ${text}`);
  const caret = renderCaret(source ?? '', location.offset);
  lines.push(` ${gutter} | ${caret}`);
  lines.push(` ${gutter} |`);

  return lines.join('\n');
}

/**
 * Pad from the start of the line up to `offset`, keeping tabs so the
 * caret lines up under tab-indented code. Works on string offsets since
 * columns count UTF-8 bytes.
 */
function renderCaret(source: string, offset: number): string {
  const lineStart = source.lastIndexOf('\n', offset - 1) + 1;
  const padding = Array.from(source.slice(lineStart, offset), (ch) =>
    ch === '\t' ? '\t' : ' '
  ).join('');
  return `${padding}^`;
}

function formatErrorJson(error: ClexError): string {
  const diagnostic: {
    errorId: string;
    severity: number;
    message: string;
    file?: string;
    range?: {
      start: { line: number; character: number };
      end: { line: number; character: number };
    };
    source: string;
    code: string;
  } = {
    errorId: error.errorId,
    severity: 1, // LSP: 1 = Error
    message: error.detail,
    source: 'clex',
    code: error.errorId,
  };

  if (error.location) {
    const { filepath, row, column } = error.location;
    diagnostic.file = filepath;
    diagnostic.range = {
      start: { line: row, character: column },
      end: { line: row, character: column + 1 },
    };
  }

  return JSON.stringify(diagnostic);
}

function formatErrorCompact(error: ClexError): string {
  const parts = [`[${error.errorId}]`, error.detail];
  if (error.location) {
    parts.push(`at ${formatLocation(error.location)}`);
  }
  return parts.join(' ');
}
