/**
 * Descriptor validation issue types
 *
 * Provides structured issues for descriptor validation with clear messages
 * and suggestions.
 */

// =============================================================================
// Issue Codes
// =============================================================================

/**
 * Validation issue codes for descriptor validation
 */
export type ValidationIssueCode =
  | 'MISSING_REQUIRED_FIELD'
  | 'INVALID_FIELD_TYPE'
  | 'INVALID_MODIFIER'
  | 'INVALID_AMENDMENT';

// =============================================================================
// Issue Types
// =============================================================================

export type ValidationSeverity = 'error' | 'warning';

/**
 * A single validation issue
 */
export interface ValidationIssue {
  /** Issue code for programmatic handling */
  code: ValidationIssueCode;
  severity: ValidationSeverity;
  /** Human-readable message */
  message: string;
  /** Key path to the problematic field (e.g., "sample_modifiers.imply[0]") */
  path: string;
  /** Suggestions for fixing the issue */
  suggestions?: string[];
}

/**
 * Result of descriptor validation
 */
export interface ValidationResult {
  /** Whether validation passed (no errors) */
  valid: boolean;
  issues: ValidationIssue[];
  /** Error-level issues only */
  errors: ValidationIssue[];
  /** Warning-level issues only */
  warnings: ValidationIssue[];
}

// =============================================================================
// Issue Builders
// =============================================================================

/**
 * Create a missing required field issue
 */
export function missingRequiredField(path: string, field: string): ValidationIssue {
  return {
    code: 'MISSING_REQUIRED_FIELD',
    severity: 'error',
    message: `Missing required field: "${field}"`,
    path,
    suggestions: [`Add the required "${field}" field to the project config`],
  };
}

/**
 * Create an invalid field type issue
 */
export function invalidFieldType(path: string, expected: string, found: unknown): ValidationIssue {
  return {
    code: 'INVALID_FIELD_TYPE',
    severity: 'error',
    message: `Expected ${expected}, found ${describeValue(found)}`,
    path,
  };
}

/**
 * Create an invalid modifier issue
 */
export function invalidModifier(path: string, reason: string): ValidationIssue {
  return {
    code: 'INVALID_MODIFIER',
    severity: 'error',
    message: `Invalid sample modifier: ${reason}`,
    path,
  };
}

/**
 * Create an invalid amendment issue
 */
export function invalidAmendment(path: string, name: string, found: unknown): ValidationIssue {
  return {
    code: 'INVALID_AMENDMENT',
    severity: 'error',
    message: `Amendment "${name}" must be a mapping, found ${describeValue(found)}`,
    path,
    suggestions: [`Declare "${name}" as a partial project config (e.g. a "metadata" section)`],
  };
}

// =============================================================================
// Result Builders
// =============================================================================

/**
 * Build a validation result from a list of issues
 */
export function validationResult(issues: ValidationIssue[]): ValidationResult {
  const errors = issues.filter(i => i.severity === 'error');
  const warnings = issues.filter(i => i.severity === 'warning');
  return {
    valid: errors.length === 0,
    issues,
    errors,
    warnings,
  };
}

/**
 * Format issues for display
 */
export function formatIssues(issues: ValidationIssue[]): string {
  const lines: string[] = [];

  for (const issue of issues) {
    const prefix = issue.severity === 'error' ? '❌' : '⚠️';
    lines.push(`${prefix} [${issue.code}] ${issue.path}`);
    lines.push(`   ${issue.message}`);
    if (issue.suggestions?.length) {
      lines.push(`   Suggestions:`);
      for (const suggestion of issue.suggestions) {
        lines.push(`     • ${suggestion}`);
      }
    }
  }

  return lines.join('\n');
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'nothing';
  if (Array.isArray(value)) return 'a list';
  if (typeof value === 'object') return 'a mapping';
  return `${typeof value} ${JSON.stringify(value)}`;
}
