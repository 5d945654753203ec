/**
 * CLI Tests: clex command
 */

import { describe, expect, it, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { lexFile, parseArgs, renderReport } from '../../src/cli-lex.js';
import { createDefaultConfig, type ClexConfig } from '../../src/cli-config.js';
import { formatFailure, readVersion } from '../../src/cli-shared.js';

describe('clex', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'clex-test-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true });
  });

  async function writeSource(name: string, content: string): Promise<string> {
    const filePath = path.join(tempDir, name);
    await fs.writeFile(filePath, content);
    return filePath;
  }

  describe('parseArgs', () => {
    it('parses a file with defaults', () => {
      expect(parseArgs(['main.c'])).toEqual({
        mode: 'lex',
        file: 'main.c',
        format: undefined,
        relaxedAssign: false,
        configPath: undefined,
      });
    });

    it('parses options in any position', () => {
      expect(
        parseArgs([
          '--format',
          'json',
          'main.c',
          '--relaxed-assign',
          '--config',
          'ci.yaml',
        ])
      ).toEqual({
        mode: 'lex',
        file: 'main.c',
        format: 'json',
        relaxedAssign: true,
        configPath: 'ci.yaml',
      });
    });

    it('parses help, version and explain', () => {
      expect(parseArgs(['--help']).mode).toBe('help');
      expect(parseArgs(['-h']).mode).toBe('help');
      expect(parseArgs(['--version']).mode).toBe('version');
      expect(parseArgs(['-v']).mode).toBe('version');
      expect(parseArgs(['--explain', 'CLEX-L001'])).toEqual({
        mode: 'explain',
        errorId: 'CLEX-L001',
      });
      expect(parseArgs(['--explain'])).toEqual({
        mode: 'explain',
        errorId: undefined,
      });
    });

    it('throws on bad usage', () => {
      expect(() => parseArgs([])).toThrow('Missing file argument');
      expect(() => parseArgs(['--unknown'])).toThrow(
        'Unknown option: --unknown'
      );
      expect(() => parseArgs(['a.c', 'b.c'])).toThrow(
        'Unexpected argument: b.c'
      );
      expect(() => parseArgs(['a.c', '--format', 'xml'])).toThrow(
        'Invalid format: xml (expected human, json, compact)'
      );
      expect(() => parseArgs(['a.c', '--config'])).toThrow(
        'Missing path after --config'
      );
    });
  });

  describe('lexFile and renderReport', () => {
    it('prints one line per token with its position', async () => {
      const file = await writeSource(
        'main.c',
        'int x = 1;\nchar *s = "hi";\n'
      );
      const config = createDefaultConfig();
      const result = await lexFile(file, config);
      const report = renderReport(result, config);

      expect(report.stdout).toEqual([
        `${file}:1:1 IDENTIFIER("int")`,
        `${file}:1:5 IDENTIFIER("x")`,
        `${file}:1:7 ASSIGN`,
        `${file}:1:9 INT(1)`,
        `${file}:1:10 SEMICOLON`,
        `${file}:2:1 IDENTIFIER("char")`,
        `${file}:2:6 STAR`,
        `${file}:2:7 IDENTIFIER("s")`,
        `${file}:2:9 ASSIGN`,
        `${file}:2:11 STRING("hi")`,
        `${file}:2:15 SEMICOLON`,
      ]);
      expect(report.stderr).toEqual([]);
    });

    it('reports errors in compact format and keeps going', async () => {
      const file = await writeSource('bad.c', 'int a @ b;');
      const config: ClexConfig = { ...createDefaultConfig(), format: 'compact' };
      const result = await lexFile(file, config);
      const report = renderReport(result, config);

      expect(report.stdout).toEqual([
        `${file}:1:1 IDENTIFIER("int")`,
        `${file}:1:5 IDENTIFIER("a")`,
        `${file}:1:9 IDENTIFIER("b")`,
        `${file}:1:10 SEMICOLON`,
      ]);
      expect(report.stderr).toEqual([
        `[CLEX-L004] Unknown token @ at ${file}:1:7`,
      ]);
    });

    it('appends an error count in human format', async () => {
      const file = await writeSource('two.c', '@\n#');
      const config = createDefaultConfig();
      const report = renderReport(await lexFile(file, config), config);

      expect(report.stderr).toHaveLength(3);
      expect(report.stderr[2]).toBe('2 lexical errors');
    });

    it('applies strictAssign from the config', async () => {
      const file = await writeSource('assign.c', 'x =(1);');
      const relaxed: ClexConfig = {
        ...createDefaultConfig(),
        strictAssign: false,
      };
      expect((await lexFile(file, relaxed)).errors).toEqual([]);
      expect((await lexFile(file, createDefaultConfig())).errors).toHaveLength(
        1
      );
    });

    it('throws when the file does not exist', async () => {
      await expect(
        lexFile(path.join(tempDir, 'missing.c'), createDefaultConfig())
      ).rejects.toThrow(`File not found: ${path.join(tempDir, 'missing.c')}`);
    });
  });

  describe('cli-shared', () => {
    it('formats ENOENT errors', () => {
      const err = Object.assign(new Error('boom'), {
        code: 'ENOENT',
        path: '/tmp/nope.c',
      });
      expect(formatFailure(err)).toBe('File not found: /tmp/nope.c');
      expect(formatFailure(new Error('plain'))).toBe('plain');
      expect(formatFailure('text')).toBe('text');
    });

    it('reads the package version', async () => {
      expect(await readVersion()).toMatch(/^\d+\.\d+\.\d+$/);
    });
  });
});
