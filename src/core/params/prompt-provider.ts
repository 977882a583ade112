/**
 * The interactive prompts the parameter collector relies on.
 *
 * Every method resolves to null when the user cancels the prompt.
 */
export interface PromptProvider {
  text(message: string, defaultValue: string): Promise<string | null>;
  select(message: string, choices: readonly string[], defaultValue?: string): Promise<string | null>;
  confirm(message: string, defaultValue: boolean): Promise<boolean | null>;
  /** Ask for a filesystem path */
  path(message: string, defaultValue: string): Promise<string | null>;
}
