export { HookRunner } from './runner.js';
export type { HookRunnerOptions } from './runner.js';
export type { HookResult, HookRunSummary, HookFailureReason } from './types.js';
