/**
 * Hook runner result types.
 */

export type HookFailureReason = 'missing-parameter' | 'invalid-pattern' | 'non-zero-exit' | 'spawn-error';

/**
 * Outcome for one hook command.
 */
export interface HookResult {
  /** The command pattern as declared */
  command: string;
  /** The command after placeholder substitution; absent if it could not be resolved */
  resolvedCommand?: string;
  success: boolean;
  /** Null when the command never ran to an exit status */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  reason?: HookFailureReason;
  message?: string;
}

export interface HookRunSummary {
  /** False when any command failed */
  success: boolean;
  results: HookResult[];
}
