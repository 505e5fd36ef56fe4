/**
 * Shared types for the pep-resolve CLI
 */

import type { Logger } from './logging/logger.js';
import type { Environment } from './substitution/expand.js';
import type { Diagnostic } from './diagnostics.js';
import type { SampleTable } from './samples/roster.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export type GlobalOptions = {
  /** Overlay to activate after loading */
  amendment?: string;
  /** Output JSON for scripting */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
};

/**
 * Output format for command results
 */
export type OutputFormat = 'human' | 'json';

/**
 * Context passed to all command handlers
 */
export interface CommandContext {
  options: GlobalOptions;
  outputFormat: OutputFormat;
  /** Environment tier for path and template expansion */
  env: Environment;
  logger: Logger;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}

// ============================================================================
// Command Payloads
// ============================================================================

/**
 * Project overview printed by `inspect` and `validate`
 */
export interface ProjectSummary {
  name: string;
  description?: string;
  configPath: string;
  /** Every file merged into the config, main file last */
  sources: string[];
  activeAmendment: string | null;
  amendments: string[];
  sampleCount: number;
}

export interface InspectData {
  project: ProjectSummary;
  table: SampleTable;
  diagnostics: Diagnostic[];
}

export interface SampleData {
  name: string;
  attributes: Record<string, string | string[]>;
  subsamples: Array<{ name: string; values: Record<string, string> }>;
  derivedFrom: Record<string, string[]>;
}

export interface AmendmentsData {
  amendments: string[];
  active: string | null;
}

export interface ValidateData {
  project?: ProjectSummary;
  diagnostics: Diagnostic[];
}
