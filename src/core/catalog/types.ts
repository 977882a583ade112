/**
 * Template catalog type definitions.
 */

/** Names of the built-in templates. */
export const TEMPLATE_NAMES = ['python', 'nodejs', 'swift', 'react', 'flutter', 'android'] as const;

export type TemplateName = (typeof TEMPLATE_NAMES)[number];

/** Parameter kinds the collector knows how to prompt for. */
export const PARAMETER_KINDS = ['text', 'select', 'confirm', 'path'] as const;

export type ParameterKind = (typeof PARAMETER_KINDS)[number];

/** A collected parameter value. */
export type ParameterValue = string | boolean;

/**
 * Values collected for one run, keyed by parameter name.
 */
export type ParameterContext = Readonly<Record<string, ParameterValue>>;

/**
 * Describes one value to ask the user for.
 */
export interface ParameterSpec {
  /**
   * How to prompt. Usually a ParameterKind; anything else is kept as-is so the
   * collector can report and skip it.
   */
  readonly kind: string;
  /** Unique within its template */
  readonly name: string;
  /** Display text */
  readonly prompt: string;
  readonly default: ParameterValue;
  /** Present only for `select` */
  readonly choices?: readonly string[];
}

/**
 * A named scaffold: paths to create, parameters to collect, hooks to run.
 */
export interface TemplateDefinition {
  readonly name: TemplateName;
  /** Path patterns, possibly containing `{placeholder}` tokens */
  readonly pathEntries: readonly string[];
  readonly parameterSpecs: readonly ParameterSpec[];
  /** Shell command patterns run after creation */
  readonly hookCommands: readonly string[];
}

export function isTemplateName(value: string): value is TemplateName {
  return TEMPLATE_NAMES.some((name) => name === value);
}

export function isParameterKind(value: string): value is ParameterKind {
  return PARAMETER_KINDS.some((kind) => kind === value);
}
