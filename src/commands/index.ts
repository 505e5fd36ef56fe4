/**
 * Command exports
 */

export { inspectCommand, openProject, summarizeProject, type InspectOptions } from './inspect.js';
export { sampleCommand, type SampleOptions } from './sample.js';
export { amendmentsCommand, type AmendmentsOptions } from './amendments.js';
export { validateCommand, type ValidateOptions } from './validate.js';
