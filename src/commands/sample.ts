/**
 * sample command - Print one resolved sample
 */

import type { CommandContext, CommandResult, SampleData } from '../types.js';
import type { Sample } from '../samples/sample.js';
import { openProject } from './inspect.js';

export interface SampleOptions {
  configPath: string;
  sampleName: string;
}

function describeSample(sample: Sample): SampleData {
  const attributes: Record<string, string | string[]> = {};
  const derivedFrom: Record<string, string[]> = {};

  for (const attribute of sample.attributes()) {
    attributes[attribute] = sample.isMultiValued(attribute)
      ? sample.getValues(attribute)
      : sample.get(attribute) ?? '';
    const sources = sample.derivedFrom(attribute);
    if (sources) derivedFrom[attribute] = [...sources];
  }

  return {
    name: sample.name,
    attributes,
    subsamples: sample.subsamples.map(row => ({ name: row.name, values: { ...row.values } })),
    derivedFrom,
  };
}

/**
 * Execute the sample command
 *
 * Human output is the sample's YAML document.
 */
export function sampleCommand(
  ctx: CommandContext,
  options: SampleOptions
): CommandResult<SampleData> {
  const project = openProject(ctx, options.configPath);
  const sample = project.getSample(options.sampleName);

  if (ctx.outputFormat === 'human') {
    process.stdout.write(sample.toYaml());
  }

  return {
    success: true,
    message: `Sample ${sample.name}`,
    data: describeSample(sample),
  };
}
