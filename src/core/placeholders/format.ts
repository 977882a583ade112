/**
 * `{name}` placeholder substitution for path entries and hook commands.
 *
 * `{{` and `}}` stand for literal braces. Any other lone brace, or an empty
 * `{}`, makes the pattern malformed.
 */
import { ErrorCodes, MissingParameterError, SeedlingError } from '../../utils/errors.js';
import type { ParameterContext } from '../catalog/types.js';

const TOKEN = /\{\{|\}\}|\{([^{}]*)\}|[{}]/g;

/**
 * Substitute every placeholder in `pattern` with its value from `context`.
 *
 * @throws MissingParameterError when a referenced name is absent from the context
 * @throws SeedlingError (MALFORMED_PATTERN) on unbalanced braces
 */
export function formatPattern(pattern: string, context: ParameterContext): string {
  return pattern.replace(TOKEN, (match: string, name: string | undefined) => {
    if (match === '{{') return '{';
    if (match === '}}') return '}';
    if (name === undefined || name.length === 0) {
      throw malformed(pattern);
    }
    if (!Object.prototype.hasOwnProperty.call(context, name)) {
      throw new MissingParameterError(name, pattern);
    }
    return String(context[name]);
  });
}

export type PatternResolution =
  | { ok: true; value: string }
  | { ok: false; reason: 'missing-parameter' | 'invalid-pattern'; message: string };

/**
 * Like formatPattern, but reports a resolution failure instead of throwing it.
 * Errors other than a missing parameter or malformed pattern still propagate.
 */
export function resolvePattern(pattern: string, context: ParameterContext): PatternResolution {
  try {
    return { ok: true, value: formatPattern(pattern, context) };
  } catch (error) {
    if (error instanceof MissingParameterError) {
      return { ok: false, reason: 'missing-parameter', message: error.message };
    }
    if (error instanceof SeedlingError && error.code === ErrorCodes.MALFORMED_PATTERN) {
      return { ok: false, reason: 'invalid-pattern', message: error.message };
    }
    throw error;
  }
}

/**
 * List the parameter names a pattern references, in order of first use.
 */
export function referencedParameters(pattern: string): string[] {
  const names: string[] = [];
  for (const match of pattern.matchAll(TOKEN)) {
    const name = match[1];
    if (name && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

function malformed(pattern: string): SeedlingError {
  return new SeedlingError(ErrorCodes.MALFORMED_PATTERN, `Malformed placeholder pattern: ${pattern}`, {
    pattern,
  });
}
