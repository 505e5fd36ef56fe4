/**
 * pep-resolve public API
 */

export { Project, loadProject, type LoadProjectOptions } from './project.js';
export {
  loadConfig,
  projectName,
  projectDescription,
  type LoadConfigOptions,
} from './config/loader.js';
export { activateAmendment, deactivateAmendment, listAmendments } from './config/overlay.js';
export { validateConfig, type ConfigValidationOptions } from './config/validator.js';
export { readSettings } from './config/settings.js';
export { deepMerge, shallowMerge } from './config/merge.js';
export type { ValidationIssue, ValidationResult, ValidationIssueCode } from './config/issues.js';
export type {
  ConfigTree,
  ConfigValue,
  ProjectConfig,
  ProjectSettings,
  ModifierSettings,
  ImplyRule,
} from './config/types.js';

export { buildRoster, type BuildOptions } from './samples/build.js';
export { Roster, type SampleSelection, type SampleTable } from './samples/roster.js';
export { Sample, type AttributeValue, type Subsample } from './samples/sample.js';
export { mergeSubsamples } from './samples/subsample.js';
export {
  applyModifiers,
  applyAppend,
  applyDuplicate,
  applyDerive,
  applyImply,
  applyRemove,
  type ModifierContext,
} from './samples/modifiers.js';

export {
  expandTemplate,
  expandPathVariables,
  projectScope,
  templateVariables,
  type Environment,
  type VariableScope,
} from './substitution/expand.js';
export { expandWildcard, hasWildcard } from './substitution/wildcard.js';
export { readTable, parseTable, type Table, type TableRow } from './tables/delimited.js';

export {
  PepError,
  ConfigLoadError,
  UnresolvedVariableError,
  UnknownAmendmentError,
  SampleNotFoundError,
  DuplicateSampleNameError,
  SampleSelectionError,
  type PepErrorCode,
  type ConfigLoadErrorCode,
} from './errors.js';
export { Diagnostics, formatDiagnostics, type Diagnostic, type DiagnosticCode } from './diagnostics.js';
export { Logger, createLogger, logger, type LogLevel, type LoggerConfig } from './logging/logger.js';
