/**
 * Tests for command dispatch and help output.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createCliContext, formatCommandHelp, formatHelp, runCli } from './app.js';

const env = { NO_COLOR: '1' };

function spyOnConsole() {
  return {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
  };
}

describe('runCli', () => {
  let consoleLogSpy: ReturnType<typeof spyOnConsole>['log'];
  let consoleErrorSpy: ReturnType<typeof spyOnConsole>['error'];

  beforeEach(() => {
    ({ log: consoleLogSpy, error: consoleErrorSpy } = spyOnConsole());
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the version from package.json', async () => {
    const result = await runCli(['version'], env);

    expect(result.exitCode).toBe(0);
    expect(consoleLogSpy).toHaveBeenCalledWith('ffi-headergen v0.1.0');
  });

  it('accepts --version', async () => {
    const result = await runCli(['--version'], env);

    expect(result.exitCode).toBe(0);
    expect(consoleLogSpy).toHaveBeenCalledWith('ffi-headergen v0.1.0');
  });

  it('prints general help without a command', async () => {
    const result = await runCli([], env);

    expect(result.exitCode).toBe(0);
    expect(consoleLogSpy).toHaveBeenCalledWith(formatHelp());
  });

  it('prints command help for a topic', async () => {
    const result = await runCli(['help', 'generate'], env);

    expect(result.exitCode).toBe(0);
    expect(consoleLogSpy).toHaveBeenCalledWith(formatCommandHelp('generate'));
  });

  it('prints command help for generate --help', async () => {
    const result = await runCli(['generate', '--help'], env);

    expect(result.exitCode).toBe(0);
    expect(consoleLogSpy).toHaveBeenCalledWith(formatCommandHelp('generate'));
  });

  it('rejects an unknown help topic', async () => {
    const result = await runCli(['help', 'deploy'], env);

    expect(result.exitCode).toBe(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith('Unknown command: deploy');
  });

  it('rejects an unknown command', async () => {
    const result = await runCli(['deploy'], env);

    expect(result.exitCode).toBe(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith('Error: Unknown command: deploy');
  });

  it('reports generate without inputs as a usage error', async () => {
    const result = await runCli(['generate'], env);

    expect(result.exitCode).toBe(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      [
        'Error: No crate dump given',
        '',
        'Suggestions:',
        '  1. Check the command line',
        '    ffi-headergen help generate',
      ].join('\n')
    );
  });
});

describe('formatHelp', () => {
  it('documents the environment overrides', () => {
    const help = formatHelp();

    expect(help).toContain('ffi-headergen v0.1.0');
    expect(help).toContain(`  ${'HEADERGEN_STYLE'.padEnd(36)} Override the declaration style (both | type | tag)`);
    expect(help).toContain(`  ${'HEADERGEN_DEBUG'.padEnd(36)} Enable debug logging (boolean)`);
  });
});

describe('formatCommandHelp', () => {
  it('returns undefined for unknown commands', () => {
    expect(formatCommandHelp('deploy')).toBeUndefined();
    expect(formatCommandHelp('version')).toContain('USAGE: ffi-headergen version');
  });
});

describe('createCliContext', () => {
  it('disables colors when NO_COLOR is set', () => {
    const context = createCliContext(['lib.json'], { NO_COLOR: '' });

    expect(context.display.colors).toBe(false);
    expect(context.args).toEqual(['lib.json']);
    expect(context.cwd).toBe(process.cwd());
  });
});
