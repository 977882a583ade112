/**
 * The interactive project creation flow.
 */
import * as path from 'node:path';
import { loadConfig, type Config } from '../../core/config/index.js';
import { getTemplate, listTemplateNames } from '../../core/catalog/index.js';
import { ParameterCollector, type PromptProvider } from '../../core/params/index.js';
import { ContentRenderer } from '../../core/render/index.js';
import { ProjectCreator, type ProjectCreationOutcome } from '../../core/project/index.js';
import type { CommandExecutor } from '../../utils/shell.js';
import { HookRunner } from '../../core/hooks/index.js';
import { CancellationError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

export interface WizardOptions {
  /** Path to a YAML config file */
  config?: string;
  skipHooks?: boolean;
  verbose?: boolean;
}

export interface WizardDependencies {
  prompts: PromptProvider;
  /** Directory the run starts from; default target and config lookup root */
  cwd: string;
  version: string;
  /** Replaces the shell for hook commands */
  executor?: CommandExecutor;
}

/**
 * Ask for a template, a target path and the template's parameters, then
 * create the project.
 *
 * @throws CancellationError when the user backs out of any prompt
 */
export async function runWizard(
  options: WizardOptions,
  deps: WizardDependencies
): Promise<ProjectCreationOutcome> {
  const config = await loadConfig(deps.cwd, options.config);
  log.setLevel(options.verbose ? 'debug' : config.logging.level);

  log.info(`Project Generator v${deps.version}`);

  const template = await deps.prompts.select('Select project template type:', listTemplateNames());
  if (!template) {
    throw new CancellationError();
  }

  const target = await deps.prompts.path('Select project creation path:', deps.cwd);
  if (!target) {
    throw new CancellationError();
  }
  const basePath = path.resolve(deps.cwd, target);

  const definition = getTemplate(template);
  const context = await new ParameterCollector(deps.prompts).collect(definition);

  console.log();
  log.step(`Creating ${definition.name} project at ${basePath}`);

  const outcome = await createCreator(config, options, deps).createProject(definition, basePath, context);

  if (outcome.success) {
    log.success('Project creation completed');
  } else {
    log.fail('Errors occurred during project creation');
  }
  return outcome;
}

function createCreator(config: Config, options: WizardOptions, deps: WizardDependencies): ProjectCreator {
  return new ProjectCreator({
    renderer: new ContentRenderer({
      fragmentsRoot: config.fragments.directory,
      suffix: config.fragments.suffix,
    }),
    hookRunner: new HookRunner({ executor: deps.executor, logger: log.child('hook') }),
    runHooks: config.hooks.enabled && !options.skipHooks,
  });
}
