/**
 * PromptProvider backed by @inquirer/prompts.
 */
import { confirm, input, select } from '@inquirer/prompts';
import type { PromptProvider } from '../core/params/index.js';

/**
 * Inquirer rejects with an ExitPromptError when the user hits Ctrl+C.
 */
export function isPromptCancellation(error: unknown): boolean {
  return error instanceof Error && error.name === 'ExitPromptError';
}

async function cancellable<T>(ask: () => Promise<T>): Promise<T | null> {
  try {
    return await ask();
  } catch (error) {
    if (isPromptCancellation(error)) {
      return null;
    }
    throw error;
  }
}

export class InquirerPromptProvider implements PromptProvider {
  text(message: string, defaultValue: string): Promise<string | null> {
    return cancellable(() => input({ message, default: defaultValue }));
  }

  select(message: string, choices: readonly string[], defaultValue?: string): Promise<string | null> {
    return cancellable(() =>
      select({
        message,
        choices: choices.map((choice) => ({ name: choice, value: choice })),
        default: defaultValue,
      })
    );
  }

  confirm(message: string, defaultValue: boolean): Promise<boolean | null> {
    return cancellable(() => confirm({ message, default: defaultValue }));
  }

  path(message: string, defaultValue: string): Promise<string | null> {
    return cancellable(() =>
      input({
        message,
        default: defaultValue,
        validate: (value) => value.trim().length > 0 || 'A path is required',
      })
    );
  }
}
