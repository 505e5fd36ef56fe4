/**
 * Error types for project resolution
 *
 * Every error carries a string-literal code for programmatic handling and a
 * details record with the context that produced it.
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Codes for errors raised while loading a project
 */
export type ConfigLoadErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_PARSE_ERROR'
  | 'CONFIG_INVALID'
  | 'IMPORT_NOT_FOUND'
  | 'IMPORT_CYCLE'
  | 'TABLE_NOT_FOUND'
  | 'TABLE_PARSE_ERROR'
  | 'MISSING_SAMPLE_NAME';

/**
 * All error codes raised by the engine
 */
export type PepErrorCode =
  | ConfigLoadErrorCode
  | 'UNRESOLVED_VARIABLE'
  | 'UNKNOWN_AMENDMENT'
  | 'SAMPLE_NOT_FOUND'
  | 'DUPLICATE_SAMPLE_NAME'
  | 'INVALID_SELECTION';

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Base class for all engine errors
 */
export class PepError extends Error {
  constructor(
    message: string,
    public readonly code: PepErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PepError';
  }
}

/**
 * Malformed or missing config file, import cycle, or unreadable table
 */
export class ConfigLoadError extends PepError {
  constructor(
    message: string,
    code: ConfigLoadErrorCode,
    details?: Record<string, unknown>
  ) {
    super(message, code, details);
    this.name = 'ConfigLoadError';
  }
}

/**
 * A template placeholder that no scope provides a value for
 */
export class UnresolvedVariableError extends PepError {
  constructor(
    public readonly template: string,
    public readonly missing: string[]
  ) {
    super(
      `Unresolved variable${missing.length > 1 ? 's' : ''} ${missing.map(m => `{${m}}`).join(', ')} in template "${template}"`,
      'UNRESOLVED_VARIABLE',
      { template, missing }
    );
    this.name = 'UnresolvedVariableError';
  }
}

/**
 * Activation of an amendment the config does not declare
 */
export class UnknownAmendmentError extends PepError {
  constructor(
    public readonly amendment: string,
    public readonly available: string[]
  ) {
    super(
      available.length > 0
        ? `Amendment "${amendment}" is not declared. Available: ${available.join(', ')}`
        : `Amendment "${amendment}" is not declared; the config declares no amendments`,
      'UNKNOWN_AMENDMENT',
      { amendment, available }
    );
    this.name = 'UnknownAmendmentError';
  }
}

/**
 * Query for a sample name the roster does not contain
 */
export class SampleNotFoundError extends PepError {
  constructor(public readonly sampleName: string) {
    super(`Sample not found: ${sampleName}`, 'SAMPLE_NOT_FOUND', { sampleName });
    this.name = 'SampleNotFoundError';
  }
}

/**
 * Two or more samples resolved to the same name
 */
export class DuplicateSampleNameError extends PepError {
  constructor(
    public readonly duplicates: string[],
    source?: string
  ) {
    super(
      `Duplicate sample name${duplicates.length > 1 ? 's' : ''}: ${duplicates.join(', ')}`,
      'DUPLICATE_SAMPLE_NAME',
      { duplicates, source }
    );
    this.name = 'DuplicateSampleNameError';
  }
}

/**
 * Invalid arguments to a roster selection
 */
export class SampleSelectionError extends PepError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_SELECTION', details);
    this.name = 'SampleSelectionError';
  }
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
