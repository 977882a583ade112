/**
 * Collects a value for each parameter a template declares.
 */
import { CancellationError, errorMessage } from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import {
  isParameterKind,
  type ParameterContext,
  type ParameterKind,
  type ParameterSpec,
  type ParameterValue,
  type TemplateDefinition,
} from '../catalog/types.js';
import type { PromptProvider } from './prompt-provider.js';

export interface ParameterCollectorOptions {
  logger?: Logger;
}

export class ParameterCollector {
  private readonly log: Logger;

  constructor(
    private readonly prompts: PromptProvider,
    options: ParameterCollectorOptions = {}
  ) {
    this.log = options.logger ?? defaultLogger;
  }

  /**
   * Prompt for each declared parameter, in order.
   *
   * @throws CancellationError when the user cancels any prompt
   */
  async collect(template: TemplateDefinition): Promise<ParameterContext> {
    const context: Record<string, ParameterValue> = {};

    for (const spec of template.parameterSpecs) {
      if (!isParameterKind(spec.kind)) {
        this.log.warn(`Unsupported question type: ${spec.kind}`);
        continue;
      }

      let answer: ParameterValue | null;
      try {
        answer = await this.ask(spec.kind, spec);
      } catch (error) {
        if (error instanceof CancellationError) {
          throw error;
        }
        this.log.error(`Error collecting parameter ${spec.name}: ${errorMessage(error)}`);
        context[spec.name] = spec.default;
        continue;
      }

      if (answer === null) {
        throw new CancellationError();
      }
      context[spec.name] = answer;
    }

    return context;
  }

  private async ask(kind: ParameterKind, spec: ParameterSpec): Promise<ParameterValue | null> {
    switch (kind) {
      case 'text':
        return this.prompts.text(spec.prompt, String(spec.default));
      case 'select': {
        const choices = spec.choices ?? [];
        const preferred = typeof spec.default === 'string' && choices.includes(spec.default) ? spec.default : undefined;
        return this.prompts.select(spec.prompt, choices, preferred);
      }
      case 'confirm':
        return this.prompts.confirm(spec.prompt, toBoolean(spec.default));
      case 'path':
        return this.prompts.path(spec.prompt, String(spec.default));
    }
  }
}

function toBoolean(value: ParameterValue): boolean {
  return typeof value === 'boolean' ? value : value.trim().toLowerCase() === 'true';
}
