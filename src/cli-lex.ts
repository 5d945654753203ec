#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Implements main(), parseArgs() and lexFile() for the clex binary.
 * Prints every token of a file and reports lexical errors without stopping
 * at the first one.
 */

import * as fs from 'fs/promises';
import { tokenizeWithRecovery, type TokenizeResult } from './lexer/index.js';
import { ClexError, TOKEN_TYPES } from './types.js';
import {
  isOutputFormat,
  loadConfig,
  OUTPUT_FORMATS,
  type ClexConfig,
  type OutputFormat,
} from './cli-config.js';
import { formatError } from './cli-error-formatter.js';
import { explainError, listErrors } from './cli-explain.js';
import { formatFailure, formatTokenLine, readVersion } from './cli-shared.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'lex';
      file: string;
      format: OutputFormat | undefined;
      relaxedAssign: boolean;
      configPath: string | undefined;
    }
  | { mode: 'explain'; errorId: string | undefined }
  | { mode: 'help' | 'version' };

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseArgs(argv: string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const explainIndex = argv.indexOf('--explain');
  if (explainIndex !== -1) {
    const next = argv[explainIndex + 1];
    const errorId =
      next === undefined || next.startsWith('-') ? undefined : next;
    return { mode: 'explain', errorId };
  }

  let file: string | undefined;
  let format: OutputFormat | undefined;
  let relaxedAssign = false;
  let configPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '--format') {
      const value = argv[++i];
      if (!isOutputFormat(value)) {
        throw new Error(
          `Invalid format: ${value ?? '(missing)'} (expected ${OUTPUT_FORMATS.join(', ')})`
        );
      }
      format = value;
    } else if (arg === '--relaxed-assign') {
      relaxedAssign = true;
    } else if (arg === '--config') {
      configPath = argv[++i];
      if (!configPath) {
        throw new Error('Missing path after --config');
      }
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    } else if (file === undefined) {
      file = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  if (file === undefined) {
    throw new Error('Missing file argument');
  }

  return { mode: 'lex', file, format, relaxedAssign, configPath };
}

export interface LexFileResult extends TokenizeResult {
  readonly source: string;
}

/**
 * Read a file and tokenize it with error recovery.
 * The path is used as given for diagnostics.
 *
 * @throws Error if the file cannot be read
 */
export async function lexFile(
  file: string,
  config: ClexConfig
): Promise<LexFileResult> {
  let source: string;
  try {
    source = await fs.readFile(file, 'utf-8');
  } catch {
    throw new Error(`File not found: ${file}`);
  }

  const result = tokenizeWithRecovery(source, file, {
    strictAssign: config.strictAssign,
    maxErrors: config.maxErrors,
  });
  return { source, ...result };
}

/**
 * Lines for stdout (tokens, EOF omitted) and stderr (errors, then a count
 * in human format).
 */
export function renderReport(
  result: LexFileResult,
  config: ClexConfig
): { stdout: string[]; stderr: string[] } {
  const stdout = result.tokens
    .filter((token) => token.type !== TOKEN_TYPES.EOF)
    .map(formatTokenLine);

  const stderr = result.errors.map((err) =>
    formatError(err, config.format, result.source)
  );

  const count = result.errors.length;
  if (count > 0 && config.format === 'human') {
    stderr.push(`${count} lexical error${count === 1 ? '' : 's'}`);
  }

  return { stdout, stderr };
}

const HELP = `Usage:
  clex <file> [options]     Print the tokens of a source file
  clex --explain [id]       Show documentation for an error ID, or list all
  clex --help               Show this help message
  clex --version            Show version information

Options:
  --format <human|json|compact>  Error output format (default: human)
  --relaxed-assign               Accept = directly followed by any symbol
  --config <path>                Configuration file (default: ./.clex.yaml)

Examples:
  clex hello.c
  clex hello.c --format compact
  clex --explain CLEX-L003`;

/**
 * Entry point for the clex binary.
 * Writes tokens to stdout and errors to stderr; exits 1 on any error.
 */
export async function main(): Promise<void> {
  try {
    const parsed = parseArgs(process.argv.slice(2));

    switch (parsed.mode) {
      case 'help':
        console.log(HELP);
        return;

      case 'version':
        console.log(await readVersion());
        return;

      case 'explain': {
        if (parsed.errorId === undefined) {
          console.log(listErrors());
          return;
        }
        const doc = explainError(parsed.errorId);
        if (doc === null) {
          console.error(`Unknown error ID: ${parsed.errorId}`);
          process.exit(1);
        }
        console.log(doc);
        return;
      }

      case 'lex': {
        const fileConfig = loadConfig(process.cwd(), parsed.configPath);
        const config: ClexConfig = {
          strictAssign: parsed.relaxedAssign ? false : fileConfig.strictAssign,
          format: parsed.format ?? fileConfig.format,
          maxErrors: fileConfig.maxErrors,
        };

        const result = await lexFile(parsed.file, config);
        const report = renderReport(result, config);
        for (const line of report.stdout) console.log(line);
        for (const line of report.stderr) console.error(line);

        process.exit(result.errors.length > 0 ? 1 : 0);
      }
    }
  } catch (err) {
    if (err instanceof ClexError) {
      console.error(formatError(err, 'human'));
    } else {
      console.error(formatFailure(err));
    }
    process.exit(1);
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  void main();
}
