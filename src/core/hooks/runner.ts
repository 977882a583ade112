/**
 * Runs a template's post-creation hook commands.
 *
 * Commands run one after another in the project directory, which is handed to
 * the executor rather than set with process.chdir. A failing command is
 * recorded and the next one still runs.
 */
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { runShellCommand, type CommandExecutor, type ShellResult } from '../../utils/shell.js';
import { resolvePattern } from '../placeholders/index.js';
import type { ParameterContext, TemplateDefinition } from '../catalog/types.js';
import type { HookResult, HookRunSummary } from './types.js';

export interface HookRunnerOptions {
  executor?: CommandExecutor;
  logger?: Logger;
}

export class HookRunner {
  private readonly executor: CommandExecutor;
  private readonly log: Logger;

  constructor(options: HookRunnerOptions = {}) {
    this.executor = options.executor ?? runShellCommand;
    this.log = options.logger ?? defaultLogger;
  }

  async runHooks(
    template: TemplateDefinition,
    basePath: string,
    context: ParameterContext
  ): Promise<HookRunSummary> {
    const hooks = template.hookCommands;
    if (hooks.length === 0) {
      return { success: true, results: [] };
    }

    this.log.info(`Executing ${hooks.length} post-creation hook(s)`);

    const results: HookResult[] = [];
    for (const command of hooks) {
      results.push(await this.runHook(command, basePath, context));
    }

    return { success: results.every((result) => result.success), results };
  }

  private async runHook(command: string, basePath: string, context: ParameterContext): Promise<HookResult> {
    const resolution = resolvePattern(command, context);
    if (!resolution.ok) {
      this.log.error(`${resolution.message} (hook)`);
      return {
        command,
        success: false,
        exitCode: null,
        stdout: '',
        stderr: '',
        reason: resolution.reason,
        message: resolution.message,
      };
    }

    const resolvedCommand = resolution.value;
    this.log.info(`Executing: ${resolvedCommand}`);

    let outcome: ShellResult;
    try {
      outcome = await this.executor(resolvedCommand, basePath);
    } catch (error) {
      const message = errorMessage(error);
      this.log.error(`Failed to execute hook command: ${resolvedCommand} - ${message}`);
      return {
        command,
        resolvedCommand,
        success: false,
        exitCode: null,
        stdout: '',
        stderr: '',
        reason: 'spawn-error',
        message,
      };
    }

    const { exitCode, stdout, stderr } = outcome;

    if (exitCode === 0) {
      this.log.success(`Command executed successfully: ${resolvedCommand}`);
      if (stdout.trim()) {
        this.log.output(stdout.trim());
      }
      return { command, resolvedCommand, success: true, exitCode, stdout, stderr };
    }

    if (exitCode === null) {
      const message = outcome.error ?? 'command did not run';
      this.log.error(`Failed to execute hook command: ${resolvedCommand} - ${message}`);
      return { command, resolvedCommand, success: false, exitCode, stdout, stderr, reason: 'spawn-error', message };
    }

    this.log.error(`Command failed with exit code ${exitCode}: ${resolvedCommand}`);
    if (stderr.trim()) {
      this.log.output(stderr.trim());
    }
    return {
      command,
      resolvedCommand,
      success: false,
      exitCode,
      stdout,
      stderr,
      reason: 'non-zero-exit',
      message: `exit code ${exitCode}`,
    };
  }
}
