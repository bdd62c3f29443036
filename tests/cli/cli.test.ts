/**
 * Tests for the msbuild-compdb command line
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { normalizeArgs, runCLI } from '../../src/cli/index.js';
import { resolveSettings } from '../../src/cli/commands/index.js';
import { DEFAULT_CONFIG } from '../../src/config/index.js';
import { MemoryFileSystem, loadFixtureProject } from '../helpers/memory-file-system.js';

const ROOT = 'C:\\dev\\test-project-1';
const OUTPUT = `${ROOT}\\build\\compile_commands.json`;

function argv(...args: string[]): string[] {
  return ['node', 'msbuild-compdb', ...args];
}

function writtenEntries(fs: MemoryFileSystem): number {
  const parsed: unknown = JSON.parse(fs.readText(OUTPUT));
  return Array.isArray(parsed) ? parsed.length : -1;
}

describe('normalizeArgs', () => {
  it('should rewrite the legacy short flags', () => {
    expect(normalizeArgs(['node', 'x', '-sh', '-bd', 'out'])).toEqual([
      'node',
      'x',
      '--skip-headers',
      '--build-dir',
      'out',
    ]);
  });

  it('should leave arguments after -- alone', () => {
    expect(normalizeArgs(['-sh', '--', '-sh'])).toEqual(['--skip-headers', '--', '-sh']);
  });
});

describe('resolveSettings', () => {
  it('should prefer flags over configuration', () => {
    expect(resolveSettings(DEFAULT_CONFIG, { config: 'Release', skipHeaders: true })).toEqual({
      config: 'Release',
      buildDir: 'build',
      skipHeaders: true,
      verbose: false,
      outputFileName: 'compile_commands.json',
      indent: 4,
    });
  });
});

describe('runCLI', () => {
  let errorSpy: MockInstance<typeof console.error>;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('against an in-memory build', () => {
    let fs: MemoryFileSystem;

    beforeEach(() => {
      fs = loadFixtureProject('test-project-1', ROOT);
    });

    it('should write sources and headers by default', async () => {
      const exitCode = await runCLI(argv(), { cwd: ROOT, fileSystem: fs, env: {} });

      expect(exitCode).toBe(0);
      expect(writtenEntries(fs)).toBe(7);
    });

    it('should skip headers with -sh', async () => {
      const exitCode = await runCLI(argv('-sh'), { cwd: ROOT, fileSystem: fs, env: {} });

      expect(exitCode).toBe(0);
      expect(writtenEntries(fs)).toBe(5);
    });

    it('should read another configuration with -c', async () => {
      const exitCode = await runCLI(argv('-c', 'Release'), { cwd: ROOT, fileSystem: fs, env: {} });

      expect(exitCode).toBe(0);
      expect(writtenEntries(fs)).toBe(3);
    });

    it('should take the build directory from -bd relative to the working directory', async () => {
      const exitCode = await runCLI(argv('-bd', 'build', '--skip-headers'), {
        cwd: ROOT,
        fileSystem: fs,
        env: {},
      });

      expect(exitCode).toBe(0);
      expect(writtenEntries(fs)).toBe(5);
    });

    it('should pick up settings from the environment', async () => {
      const exitCode = await runCLI(argv(), {
        cwd: ROOT,
        fileSystem: fs,
        env: { COMPDB_CONFIG: 'Release', COMPDB_SKIP_HEADERS: 'true' },
      });

      expect(exitCode).toBe(0);
      expect(writtenEntries(fs)).toBe(1);
    });

    it('should report skipped sources as warnings', async () => {
      await runCLI(argv(), { cwd: ROOT, fileSystem: fs, env: {} });

      expect(errorSpy).toHaveBeenCalledWith(
        expect.stringContaining('WARNING: Skipping C:\\DEV\\TEST-PROJECT-1\\TEST\\OLD_TESTS.CPP'),
      );
    });

    it('should print the pipeline steps with --verbose', async () => {
      const exitCode = await runCLI(argv('--verbose'), { cwd: ROOT, fileSystem: fs, env: {} });

      expect(exitCode).toBe(0);
      expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('Found 4 tlog file(s) for Debug'));
      expect(logSpy).toHaveBeenCalledWith(expect.stringContaining(`Wrote 7 entries to ${OUTPUT}`));
    });

    it('should fail with exit code 1 for a missing build directory', async () => {
      const exitCode = await runCLI(argv('-b', 'nowhere'), { cwd: ROOT, fileSystem: fs, env: {} });

      expect(exitCode).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith(
        expect.stringContaining(`ERROR: Couldn't open build directory ${ROOT}\\nowhere`),
      );
    });
  });

  describe('against the real filesystem', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = mkdtempSync(join(tmpdir(), 'compdb-cli-'));
      mkdirSync(join(testDir, 'build'));
    });

    afterEach(() => {
      rmSync(testDir, { recursive: true, force: true });
    });

    it('should write [] for a build without tlogs', async () => {
      const exitCode = await runCLI(argv(), { cwd: testDir, env: {} });

      expect(exitCode).toBe(0);
      expect(readFileSync(join(testDir, 'build', 'compile_commands.json'), 'utf-8')).toBe('[]');
    });
  });

  it('should exit 0 after printing help', async () => {
    const exitCode = await runCLI(argv('--help'), { fileSystem: new MemoryFileSystem(), env: {} });

    expect(exitCode).toBe(0);
  });

  it('should exit 0 after printing the version', async () => {
    const exitCode = await runCLI(argv('--version'), { fileSystem: new MemoryFileSystem(), env: {} });

    expect(exitCode).toBe(0);
  });

  it('should exit non-zero on an unknown option', async () => {
    const exitCode = await runCLI(argv('--bogus'), { fileSystem: new MemoryFileSystem(), env: {} });

    expect(exitCode).not.toBe(0);
  });
});
