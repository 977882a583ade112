/**
 * Renders file contents from per-template Handlebars fragments.
 *
 * A file's fragment lives at `<root>/<template>/<basename><suffix>`. A missing
 * fragment, or one that fails to compile or render, yields empty content.
 */
import * as path from 'node:path';
import Handlebars from 'handlebars';
import { fileExists, isDirectory, readFile } from '../../utils/file-system.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { getPackagedTemplatesDir } from '../../utils/package-root.js';
import type { ParameterContext } from '../catalog/types.js';

export const DEFAULT_FRAGMENT_SUFFIX = '.hbs';

export interface ContentRendererOptions {
  /** Root holding one fragment directory per template */
  fragmentsRoot?: string;
  /** Appended to a file's basename to find its fragment */
  suffix?: string;
  logger?: Logger;
}

export class ContentRenderer {
  readonly fragmentsRoot: string;
  readonly suffix: string;
  private readonly log: Logger;

  constructor(options: ContentRendererOptions = {}) {
    this.fragmentsRoot = options.fragmentsRoot ?? getPackagedTemplatesDir();
    this.suffix = options.suffix ?? DEFAULT_FRAGMENT_SUFFIX;
    this.log = options.logger ?? defaultLogger;
  }

  /**
   * Whether the template ships any fragments at all.
   */
  async hasFragmentSet(templateName: string): Promise<boolean> {
    return isDirectory(this.fragmentDir(templateName));
  }

  /**
   * Path where the fragment for `fileBasename` would live.
   */
  fragmentPath(templateName: string, fileBasename: string): string {
    return path.join(this.fragmentDir(templateName), `${fileBasename}${this.suffix}`);
  }

  /**
   * Render the fragment registered for `fileBasename`, or '' when there is none
   * or it cannot be rendered.
   */
  async render(templateName: string, fileBasename: string, context: ParameterContext): Promise<string> {
    const fragmentName = `${fileBasename}${this.suffix}`;
    const fragmentFile = this.fragmentPath(templateName, fileBasename);

    if (!(await fileExists(fragmentFile))) {
      this.log.warn(`Template file not found: ${fragmentName}`);
      return '';
    }

    try {
      const source = await readFile(fragmentFile);
      const template = Handlebars.compile(source, { noEscape: true, strict: true });
      return template({ ...context });
    } catch (error) {
      this.log.warn(`Failed to render template ${fragmentName}: ${errorMessage(error)}`);
      return '';
    }
  }

  private fragmentDir(templateName: string): string {
    return path.join(this.fragmentsRoot, templateName);
  }
}
