/**
 * Tests for the hook runner.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { mkdtempSync, realpathSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { HookRunner } from '../../../../src/core/hooks/index.js';
import { getTemplate, normalizeTemplate } from '../../../../src/core/catalog/index.js';
import type { CommandExecutor, ShellResult } from '../../../../src/utils/shell.js';
import { Logger } from '../../../../src/utils/logger.js';

function silentLogger(): Logger {
  const log = new Logger();
  log.setLevel('silent');
  return log;
}

function ok(stdout = ''): ShellResult {
  return { exitCode: 0, stdout, stderr: '' };
}

describe('HookRunner', () => {
  let executor: Mock<CommandExecutor>;
  let runner: HookRunner;

  beforeEach(() => {
    executor = vi.fn<CommandExecutor>().mockResolvedValue(ok());
    runner = new HookRunner({ executor, logger: silentLogger() });
  });

  it('should succeed without side effects when there are no hooks', async () => {
    const summary = await runner.runHooks(getTemplate('swift'), '/tmp/x', {});

    expect(summary).toEqual({ success: true, results: [] });
    expect(executor).not.toHaveBeenCalled();
  });

  it('should run every command in order in the base path', async () => {
    const summary = await runner.runHooks(getTemplate('nodejs'), '/tmp/x', { project_name: 'demo' });

    expect(executor.mock.calls).toEqual([
      ['yarn install', '/tmp/x'],
      ['yarn upgrade --latest', '/tmp/x'],
      ['yarn start', '/tmp/x'],
    ]);
    expect(summary.success).toBe(true);
    expect(summary.results.map((result) => result.resolvedCommand)).toEqual([
      'yarn install',
      'yarn upgrade --latest',
      'yarn start',
    ]);
  });

  it('should substitute placeholders in commands', async () => {
    const definition = normalizeTemplate('nodejs', {
      project: ['package.json'],
      hook: ['echo {project_name}'],
    });

    await runner.runHooks(definition, '/tmp/x', { project_name: 'demo' });

    expect(executor).toHaveBeenCalledWith('echo demo', '/tmp/x');
  });

  it('should record a missing parameter and keep going', async () => {
    const definition = normalizeTemplate('nodejs', {
      project: ['package.json'],
      hook: ['git init {repo_dir}', 'yarn install'],
    });

    const summary = await runner.runHooks(definition, '/tmp/x', {});

    expect(summary.success).toBe(false);
    expect(summary.results[0]).toEqual({
      command: 'git init {repo_dir}',
      success: false,
      exitCode: null,
      stdout: '',
      stderr: '',
      reason: 'missing-parameter',
      message: "Missing required parameter 'repo_dir' for: git init {repo_dir}",
    });
    expect(executor).toHaveBeenCalledTimes(1);
    expect(executor).toHaveBeenCalledWith('yarn install', '/tmp/x');
  });

  it('should record a non-zero exit with its output and run the rest', async () => {
    executor
      .mockResolvedValueOnce({ exitCode: 1, stdout: 'partial', stderr: 'network down' })
      .mockResolvedValueOnce(ok('upgraded'));
    const definition = normalizeTemplate('nodejs', {
      project: ['package.json'],
      hook: ['yarn install', 'yarn upgrade --latest'],
    });

    const summary = await runner.runHooks(definition, '/tmp/x', {});

    expect(summary.success).toBe(false);
    expect(summary.results[0]).toEqual({
      command: 'yarn install',
      resolvedCommand: 'yarn install',
      success: false,
      exitCode: 1,
      stdout: 'partial',
      stderr: 'network down',
      reason: 'non-zero-exit',
      message: 'exit code 1',
    });
    expect(summary.results[1]).toMatchObject({ success: true, stdout: 'upgraded' });
  });

  it('should record a command that never started', async () => {
    executor.mockResolvedValueOnce({ exitCode: null, stdout: '', stderr: '', error: 'spawn /bin/sh ENOENT' });
    const definition = normalizeTemplate('nodejs', { project: ['package.json'], hook: ['ls'] });

    const summary = await runner.runHooks(definition, '/missing', {});

    expect(summary.results[0]).toMatchObject({ success: false, reason: 'spawn-error', message: 'spawn /bin/sh ENOENT' });
  });

  it('should record an executor that throws', async () => {
    executor.mockRejectedValueOnce(new Error('boom'));
    const definition = normalizeTemplate('nodejs', { project: ['package.json'], hook: ['ls', 'pwd'] });

    const summary = await runner.runHooks(definition, '/tmp/x', {});

    expect(summary.results[0]).toMatchObject({ success: false, reason: 'spawn-error', message: 'boom' });
    expect(summary.results[1].success).toBe(true);
  });

  describe('echoing output', () => {
    const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});

    beforeEach(() => {
      consoleLog.mockClear();
    });

    it('should echo stdout of a successful command', async () => {
      executor.mockResolvedValueOnce(ok('Done in 1.2s\n'));
      const loud = new HookRunner({ executor, logger: new Logger() });
      const definition = normalizeTemplate('nodejs', { project: ['package.json'], hook: ['yarn install'] });

      await loud.runHooks(definition, '/tmp/x', {});

      expect(consoleLog).toHaveBeenCalledWith(expect.stringContaining('  Done in 1.2s'));
    });
  });
});

describe('HookRunner with the shell', () => {
  let basePath: string;

  beforeEach(() => {
    basePath = realpathSync(mkdtempSync(join(tmpdir(), 'seedling-hooks-test-')));
  });

  afterEach(() => {
    rmSync(basePath, { recursive: true, force: true });
  });

  it('should run commands in the base path and leave our working directory alone', async () => {
    const before = process.cwd();
    const runner = new HookRunner({ logger: silentLogger() });
    const definition = normalizeTemplate('nodejs', {
      project: ['package.json'],
      hook: ['pwd', 'exit 4', 'echo {project_name}'],
    });

    const summary = await runner.runHooks(definition, basePath, { project_name: 'demo' });

    expect(summary.results.map((result) => result.exitCode)).toEqual([0, 4, 0]);
    expect(summary.results[0].stdout.trim()).toBe(basePath);
    expect(summary.results[2].stdout).toBe('demo\n');
    expect(summary.success).toBe(false);
    expect(process.cwd()).toBe(before);
  });
});
