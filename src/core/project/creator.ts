/**
 * Creates a project from a template: paths first, then hooks.
 */
import { errorMessage } from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { getTemplate } from '../catalog/index.js';
import type { ParameterContext, TemplateDefinition } from '../catalog/types.js';
import { HookRunner } from '../hooks/index.js';
import { ContentRenderer } from '../render/index.js';
import { PathMaterializer, isCreationSuccessful } from './materializer.js';
import type { ProjectCreationOutcome } from './types.js';

export interface ProjectCreatorOptions {
  /** Used to build the default materializer; ignored when `materializer` is given */
  renderer?: ContentRenderer;
  materializer?: PathMaterializer;
  hookRunner?: HookRunner;
  /** Run hook commands after a successful creation (default: true) */
  runHooks?: boolean;
  logger?: Logger;
}

export class ProjectCreator {
  private readonly materializer: PathMaterializer;
  private readonly hookRunner: HookRunner;
  private readonly runHooks: boolean;
  private readonly log: Logger;

  constructor(options: ProjectCreatorOptions = {}) {
    this.log = options.logger ?? defaultLogger;
    this.materializer =
      options.materializer ??
      new PathMaterializer({
        renderer: options.renderer ?? new ContentRenderer({ logger: this.log }),
        logger: this.log,
      });
    this.hookRunner = options.hookRunner ?? new HookRunner({ logger: this.log });
    this.runHooks = options.runHooks ?? true;
  }

  /**
   * Materialize the template under `basePath`, then run its hooks when at
   * least one path entry was created. Hook failures never change the outcome.
   *
   * @throws TemplateError when `template` names no catalog template
   */
  async createProject(
    template: string | TemplateDefinition,
    basePath: string,
    context: ParameterContext
  ): Promise<ProjectCreationOutcome> {
    const definition = typeof template === 'string' ? getTemplate(template) : template;

    try {
      if (!(await this.materializer.hasFragmentSet(definition.name))) {
        this.log.info(
          `No template files found for ${definition.name}, continuing with directory structure only`
        );
      }

      const items = await this.materializer.materialize(definition, basePath, context);
      const success = isCreationSuccessful(items);

      if (!success || !this.runHooks) {
        if (success && definition.hookCommands.length > 0) {
          this.log.info(`Skipping ${definition.hookCommands.length} post-creation hook(s)`);
        }
        return { success, items, hooks: null };
      }

      const hooks = await this.hookRunner.runHooks(definition, basePath, context);
      if (!hooks.success) {
        this.log.warn('Some hooks failed to execute');
      }
      return { success, items, hooks };
    } catch (error) {
      this.log.error(`Failed to create project: ${errorMessage(error)}`);
      return { success: false, items: [], hooks: null };
    }
  }
}
