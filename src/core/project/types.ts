/**
 * Project creation result types.
 */
import type { HookRunSummary } from '../hooks/types.js';

export type PathKind = 'directory' | 'file';

/** Why a path entry could not be materialized. */
export type CreationFailureReason = 'missing-parameter' | 'invalid-pattern' | 'io-error';

/**
 * Outcome for one path entry.
 */
export type CreationResult =
  | {
      status: 'created';
      /** The path entry as declared */
      entry: string;
      /** Absolute path that was created */
      path: string;
      kind: PathKind;
    }
  | {
      /** A file whose fragment rendered no content; nothing was written */
      status: 'skipped';
      entry: string;
      path: string;
      kind: 'file';
    }
  | {
      status: 'failed';
      entry: string;
      /** Absent when the entry could not be resolved to a path */
      path?: string;
      reason: CreationFailureReason;
      message: string;
    };

/**
 * Outcome of a whole project creation run.
 */
export interface ProjectCreationOutcome {
  /** True when at least one path entry was created */
  success: boolean;
  items: CreationResult[];
  /** Null when hooks did not run (nothing created, or hooks disabled) */
  hooks: HookRunSummary | null;
}
