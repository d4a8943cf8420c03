/**
 * Tests for CLI config loading functionality.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { CONFIG_FILE_NAME, createCliApp } from './app.js';

vi.mock('node:fs', async (importOriginal) => {
  const original = await importOriginal<typeof import('node:fs')>();

  return {
    ...original,
    existsSync: vi.fn(),
    readFileSync: vi.fn(),
  };
});

const mockExistsSync = vi.mocked(existsSync);
const mockReadFileSync = vi.mocked(readFileSync);

describe('createCliApp', () => {
  beforeEach(() => {
    mockExistsSync.mockReset();
    mockReadFileSync.mockReset();
  });

  it('uses default values when no config file exists', () => {
    mockExistsSync.mockReturnValue(false);

    const context = createCliApp({ args: ['cli.toml'], env: {} });

    expect(context.args).toEqual(['cli.toml']);
    expect(context.config).toEqual({
      compiler: { max_depth: 32 },
      output: { format: 'outline', indent: 2, colors: true },
      logging: { debug: false },
    });
    expect(mockExistsSync).toHaveBeenCalledWith(CONFIG_FILE_NAME);
    expect(mockReadFileSync).not.toHaveBeenCalled();
  });

  it('loads settings from argspec.toml when the file exists', () => {
    mockExistsSync.mockReturnValue(true);
    mockReadFileSync.mockReturnValue(`
[output]
format = "json"
colors = false
`);

    const context = createCliApp({ env: {} });

    expect(context.config.output).toEqual({ format: 'json', indent: 2, colors: false });
  });

  it('reads the config file from a custom path', () => {
    mockExistsSync.mockReturnValue(false);

    createCliApp({ configFilePath: 'conf/argspec.toml', env: {} });

    expect(mockExistsSync).toHaveBeenCalledWith('conf/argspec.toml');
  });

  it('uses defaults when config file has parse error', () => {
    const consoleWarnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    mockExistsSync.mockReturnValue(true);
    mockReadFileSync.mockReturnValue('[output]\nindent = 99\n');

    const context = createCliApp({ env: {} });

    expect(consoleWarnSpy).toHaveBeenCalledWith(
      "Warning: Failed to load config from argspec.toml: Invalid value for 'output.indent': must be an integer between 0 and 8, got 99"
    );
    expect(consoleWarnSpy).toHaveBeenCalledWith('Using default settings.');
    expect(context.config.output.indent).toBe(2);

    consoleWarnSpy.mockRestore();
  });

  it('applies environment overrides over the config file', () => {
    mockExistsSync.mockReturnValue(true);
    mockReadFileSync.mockReturnValue('[compiler]\nmax_depth = 8\n[logging]\ndebug = false\n');

    const context = createCliApp({ env: { ARGSPEC_MAX_DEPTH: '4', ARGSPEC_DEBUG: '1' } });

    expect(context.config.compiler.max_depth).toBe(4);
    expect(context.config.logging.debug).toBe(true);
  });
});
