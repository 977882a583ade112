/**
 * Error types and codes for seedling.
 * Every error raised on purpose by the tool extends SeedlingError.
 */

/**
 * Base error class for all seedling errors.
 */
export class SeedlingError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SeedlingError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends SeedlingError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Template catalog errors (unknown template, invalid catalog entry).
 */
export class TemplateError extends SeedlingError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'TemplateError';
  }
}

/**
 * Raised when a placeholder references a name the context does not hold.
 */
export class MissingParameterError extends SeedlingError {
  constructor(
    public readonly parameter: string,
    pattern: string
  ) {
    super(ErrorCodes.MISSING_PARAMETER, `Missing required parameter '${parameter}' for: ${pattern}`, {
      parameter,
      pattern,
    });
    this.name = 'MissingParameterError';
  }
}

/**
 * The user backed out of an interactive prompt. Terminates the run.
 */
export class CancellationError extends SeedlingError {
  constructor(message = 'User cancelled the operation') {
    super(ErrorCodes.CANCELLED, message);
    this.name = 'CancellationError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends SeedlingError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Configuration
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',

  // Catalog
  UNKNOWN_TEMPLATE: 'UNKNOWN_TEMPLATE',
  INVALID_CATALOG: 'INVALID_CATALOG',

  // Resolution
  MISSING_PARAMETER: 'MISSING_PARAMETER',
  MALFORMED_PATTERN: 'MALFORMED_PATTERN',

  // Run
  CANCELLED: 'CANCELLED',

  // System (S001-S003)
  PARSE_ERROR: 'S001',
  INVALID_SCHEMA: 'S002',
  PACKAGE_ROOT_NOT_FOUND: 'S003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
