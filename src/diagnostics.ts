/**
 * Structured diagnostics for degraded, non-fatal resolution conditions
 *
 * Per-sample and per-attribute problems never abort a build. They are
 * recorded here, logged at warn level, and travel with the resolved roster.
 */

import type { Logger } from './logging/logger.js';

// =============================================================================
// Diagnostic Types
// =============================================================================

/**
 * Diagnostic codes
 */
export type DiagnosticCode =
  | 'UNRESOLVED_VARIABLE'
  | 'UNMATCHED_WILDCARD'
  | 'WILDCARD_SUPPRESSED'
  | 'ORPHAN_SUBSAMPLE'
  | 'DUPLICATE_SOURCE_MISSING'
  | 'DUPLICATE_TARGET_EXISTS'
  | 'PROTECTED_ATTRIBUTE'
  | 'UNKNOWN_MODIFIER'
  | 'UNKNOWN_DATA_SOURCE';

/**
 * Severity level for diagnostics
 */
export type DiagnosticSeverity = 'warning' | 'info';

/**
 * A single recorded condition
 */
export interface Diagnostic {
  /** Code for programmatic handling */
  code: DiagnosticCode;
  /** Severity level */
  severity: DiagnosticSeverity;
  /** Human-readable message */
  message: string;
  /** Sample the condition applies to */
  sample?: string;
  /** Attribute the condition applies to */
  attribute?: string;
  /** Additional context */
  context?: Record<string, unknown>;
}

// =============================================================================
// Collector
// =============================================================================

/**
 * Accumulates diagnostics for one resolution
 */
export class Diagnostics {
  private readonly items: Diagnostic[] = [];

  constructor(private readonly logger?: Logger) {}

  /**
   * Record a diagnostic and log it
   */
  report(diagnostic: Diagnostic): void {
    this.items.push(diagnostic);
    if (!this.logger) return;

    const context: Record<string, unknown> = { code: diagnostic.code };
    if (diagnostic.sample !== undefined) context.sample = diagnostic.sample;
    if (diagnostic.attribute !== undefined) context.attribute = diagnostic.attribute;

    if (diagnostic.severity === 'warning') {
      this.logger.warn(diagnostic.message, context);
    } else {
      this.logger.info(diagnostic.message, context);
    }
  }

  /**
   * Record a warning-level diagnostic
   */
  warn(
    code: DiagnosticCode,
    message: string,
    where: Pick<Diagnostic, 'sample' | 'attribute' | 'context'> = {}
  ): void {
    this.report({ code, severity: 'warning', message, ...where });
  }

  /**
   * Record an info-level diagnostic
   */
  note(
    code: DiagnosticCode,
    message: string,
    where: Pick<Diagnostic, 'sample' | 'attribute' | 'context'> = {}
  ): void {
    this.report({ code, severity: 'info', message, ...where });
  }

  /**
   * Snapshot of everything recorded so far
   */
  list(): readonly Diagnostic[] {
    return [...this.items];
  }

  /**
   * Diagnostics with a given code
   */
  byCode(code: DiagnosticCode): Diagnostic[] {
    return this.items.filter(d => d.code === code);
  }

  get size(): number {
    return this.items.length;
  }
}

/**
 * Format diagnostics for display
 */
export function formatDiagnostics(diagnostics: readonly Diagnostic[]): string {
  const lines: string[] = [];

  for (const d of diagnostics) {
    const prefix = d.severity === 'warning' ? '⚠️' : 'ℹ';
    const where = [d.sample, d.attribute].filter(Boolean).join('.');
    lines.push(`${prefix} [${d.code}]${where ? ` ${where}` : ''}`);
    lines.push(`   ${d.message}`);
  }

  return lines.join('\n');
}
