/**
 * Tests for the parameter collector.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ParameterCollector, type PromptProvider } from '../../../../src/core/params/index.js';
import { getTemplate, normalizeTemplate } from '../../../../src/core/catalog/index.js';
import { CancellationError } from '../../../../src/utils/errors.js';
import { Logger } from '../../../../src/utils/logger.js';

function fakePrompts() {
  return {
    text: vi.fn<PromptProvider['text']>().mockImplementation(async (_message, defaultValue) => defaultValue),
    select: vi.fn<PromptProvider['select']>().mockImplementation(async (_message, choices) => choices[0] ?? null),
    confirm: vi.fn<PromptProvider['confirm']>().mockImplementation(async (_message, defaultValue) => defaultValue),
    path: vi.fn<PromptProvider['path']>().mockImplementation(async (_message, defaultValue) => defaultValue),
  } satisfies PromptProvider;
}

const mixed = normalizeTemplate('react', {
  project: ['src'],
  params: [
    { type: 'text', name: 'project_name', message: 'Name?', default: 'my-app' },
    { type: 'select', name: 'style', message: 'Style?', choices: ['css', 'scss'], default: 'scss' },
    { type: 'confirm', name: 'typescript', message: 'TypeScript?', default: true },
    { type: 'path', name: 'output', message: 'Output?', default: './out' },
  ],
});

describe('ParameterCollector', () => {
  let prompts: ReturnType<typeof fakePrompts>;
  let log: Logger;

  beforeEach(() => {
    prompts = fakePrompts();
    log = new Logger();
    log.setLevel('silent');
  });

  it('should prompt for each kind with its default', async () => {
    const collector = new ParameterCollector(prompts, { logger: log });

    const context = await collector.collect(mixed);

    expect(prompts.text).toHaveBeenCalledWith('Name?', 'my-app');
    expect(prompts.select).toHaveBeenCalledWith('Style?', ['css', 'scss'], 'scss');
    expect(prompts.confirm).toHaveBeenCalledWith('TypeScript?', true);
    expect(prompts.path).toHaveBeenCalledWith('Output?', './out');
    expect(context).toEqual({ project_name: 'my-app', style: 'css', typescript: true, output: './out' });
  });

  it('should collect the nodejs project name', async () => {
    prompts.text.mockResolvedValueOnce('demo');
    const collector = new ParameterCollector(prompts, { logger: log });

    expect(await collector.collect(getTemplate('nodejs'))).toEqual({ project_name: 'demo' });
  });

  it('should return an empty context for templates without parameters', async () => {
    const collector = new ParameterCollector(prompts, { logger: log });

    expect(await collector.collect(getTemplate('android'))).toEqual({});
  });

  it('should abort the run when a prompt is cancelled', async () => {
    prompts.select.mockResolvedValueOnce(null);
    const collector = new ParameterCollector(prompts, { logger: log });

    await expect(collector.collect(mixed)).rejects.toThrow(CancellationError);
    expect(prompts.confirm).not.toHaveBeenCalled();
  });

  it('should treat a declined confirm as an answer, not a cancellation', async () => {
    prompts.confirm.mockResolvedValueOnce(false);
    const collector = new ParameterCollector(prompts, { logger: log });

    const context = await collector.collect(mixed);

    expect(context.typescript).toBe(false);
  });

  it('should fall back to the default when a prompt fails', async () => {
    prompts.text.mockRejectedValueOnce(new Error('terminal too small'));
    const error = vi.spyOn(log, 'error');
    const collector = new ParameterCollector(prompts, { logger: log });

    const context = await collector.collect(mixed);

    expect(context.project_name).toBe('my-app');
    expect(context.style).toBe('css');
    expect(error).toHaveBeenCalledWith('Error collecting parameter project_name: terminal too small');
  });

  it('should let a CancellationError from the provider through', async () => {
    prompts.path.mockRejectedValueOnce(new CancellationError());
    const collector = new ParameterCollector(prompts, { logger: log });

    await expect(collector.collect(mixed)).rejects.toThrow(CancellationError);
  });

  it('should skip unsupported kinds without adding a context entry', async () => {
    const definition = normalizeTemplate('nodejs', {
      project: ['package.json'],
      params: [
        { type: 'password', name: 'token', default: 'x' },
        { type: 'text', name: 'project_name', default: 'demo' },
      ],
    });
    const warn = vi.spyOn(log, 'warn');
    const collector = new ParameterCollector(prompts, { logger: log });

    const context = await collector.collect(definition);

    expect(context).toEqual({ project_name: 'demo' });
    expect('token' in context).toBe(false);
    expect(warn).toHaveBeenCalledWith('Unsupported question type: password');
    expect(prompts.text.mock.calls).toEqual([['project_name', 'demo']]);
  });

  it('should read a string default for confirm as a boolean', async () => {
    const definition = normalizeTemplate('nodejs', {
      project: ['package.json'],
      params: [{ type: 'confirm', name: 'git', default: 'True' }],
    });
    const collector = new ParameterCollector(prompts, { logger: log });

    await collector.collect(definition);

    expect(prompts.confirm).toHaveBeenCalledWith('git', true);
  });

  it('should not pass a default that is not one of the choices', async () => {
    const definition = normalizeTemplate('nodejs', {
      project: ['package.json'],
      params: [{ type: 'select', name: 'runtime', choices: ['node', 'bun'], default: 'deno' }],
    });
    const collector = new ParameterCollector(prompts, { logger: log });

    await collector.collect(definition);

    expect(prompts.select).toHaveBeenCalledWith('runtime', ['node', 'bun'], undefined);
  });
});
