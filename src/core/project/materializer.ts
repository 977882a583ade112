/**
 * Creates a template's directories and files under a base path.
 *
 * Each path entry is handled on its own: a failure is logged and recorded for
 * that entry, and the remaining entries are still processed.
 */
import * as path from 'node:path';
import { ensureDir, writeFile } from '../../utils/file-system.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { resolvePattern } from '../placeholders/index.js';
import { ContentRenderer } from '../render/index.js';
import type { ParameterContext, TemplateDefinition } from '../catalog/types.js';
import type { CreationResult, PathKind } from './types.js';

/**
 * A path is a file when its last segment contains a dot, otherwise a directory.
 * Directories named like `v1.2` are therefore treated as files.
 */
export function classifyPath(resolvedPath: string): PathKind {
  return path.basename(resolvedPath).includes('.') ? 'file' : 'directory';
}

export interface PathMaterializerOptions {
  renderer?: ContentRenderer;
  logger?: Logger;
}

export class PathMaterializer {
  private readonly renderer: ContentRenderer;
  private readonly log: Logger;

  constructor(options: PathMaterializerOptions = {}) {
    this.log = options.logger ?? defaultLogger;
    this.renderer = options.renderer ?? new ContentRenderer({ logger: this.log });
  }

  /**
   * Whether file entries of this template are rendered from fragments.
   */
  hasFragmentSet(templateName: string): Promise<boolean> {
    return this.renderer.hasFragmentSet(templateName);
  }

  /**
   * Materialize every path entry of `template` under `basePath`, in order.
   */
  async materialize(
    template: TemplateDefinition,
    basePath: string,
    context: ParameterContext
  ): Promise<CreationResult[]> {
    const hasFragments = await this.hasFragmentSet(template.name);
    const results: CreationResult[] = [];

    for (const entry of template.pathEntries) {
      results.push(await this.materializeEntry(template, entry, basePath, context, hasFragments));
    }

    return results;
  }

  private async materializeEntry(
    template: TemplateDefinition,
    entry: string,
    basePath: string,
    context: ParameterContext,
    hasFragments: boolean
  ): Promise<CreationResult> {
    const resolution = resolvePattern(entry, context);
    if (!resolution.ok) {
      this.log.error(`${resolution.message} (path entry)`);
      return { status: 'failed', entry, reason: resolution.reason, message: resolution.message };
    }

    const fullPath = path.resolve(basePath, resolution.value);

    try {
      if (classifyPath(fullPath) === 'directory') {
        await ensureDir(fullPath);
        this.log.success(`Created directory: ${fullPath}`);
        return { status: 'created', entry, path: fullPath, kind: 'directory' };
      }

      return await this.materializeFile(template, entry, fullPath, context, hasFragments);
    } catch (error) {
      const message = errorMessage(error);
      this.log.error(`Error processing project item ${entry}: ${message}`);
      return { status: 'failed', entry, path: fullPath, reason: 'io-error', message };
    }
  }

  private async materializeFile(
    template: TemplateDefinition,
    entry: string,
    fullPath: string,
    context: ParameterContext,
    hasFragments: boolean
  ): Promise<CreationResult> {
    await ensureDir(path.dirname(fullPath));

    // Skeleton-only templates get empty files
    const content = hasFragments
      ? await this.renderer.render(template.name, path.basename(fullPath), context)
      : '';

    if (hasFragments && content.length === 0) {
      this.log.debug(`No content rendered, skipping: ${fullPath}`);
      return { status: 'skipped', entry, path: fullPath, kind: 'file' };
    }

    await writeFile(fullPath, content);
    this.log.success(`Created file: ${fullPath}`);
    return { status: 'created', entry, path: fullPath, kind: 'file' };
  }
}

/**
 * True when at least one entry was created.
 */
export function isCreationSuccessful(results: readonly CreationResult[]): boolean {
  return results.some((result) => result.status === 'created');
}
