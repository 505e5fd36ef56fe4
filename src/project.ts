/**
 * Project facade: a loaded config together with its resolved roster
 *
 * Projects are immutable. `activate` and `deactivate` return new projects
 * built from scratch; the receiver keeps its config and roster.
 */

import type { ProjectConfig } from './config/types.js';
import { type LoadConfigOptions, loadConfig, projectDescription, projectName } from './config/loader.js';
import { activateAmendment, deactivateAmendment, listAmendments } from './config/overlay.js';
import { type BuildOptions, buildRoster } from './samples/build.js';
import type { Roster } from './samples/roster.js';
import type { Sample } from './samples/sample.js';

export type LoadProjectOptions = LoadConfigOptions;

export class Project {
  readonly name: string;
  readonly description: string | undefined;

  private constructor(
    readonly config: ProjectConfig,
    readonly samples: Roster,
    private readonly options: BuildOptions
  ) {
    this.name = projectName(config);
    this.description = projectDescription(config);
  }

  /**
   * Build a project from an already loaded config
   */
  static fromConfig(config: ProjectConfig, options: BuildOptions = {}): Project {
    return new Project(config, buildRoster(config, options), options);
  }

  /** Absolute path of the descriptor */
  get filePath(): string {
    return this.config.filePath;
  }

  get activeAmendment(): string | null {
    return this.config.activeAmendment;
  }

  listAmendments(): string[] {
    return listAmendments(this.config);
  }

  /**
   * Shorthand for `samples.get(name)`
   */
  getSample(name: string): Sample {
    return this.samples.get(name);
  }

  /**
   * Project with the named overlay active, rebuilt from the base
   *
   * @throws UnknownAmendmentError if the name is not declared
   */
  activate(name: string): Project {
    return Project.fromConfig(activateAmendment(this.config, name), this.options);
  }

  /**
   * Project with no overlay active
   */
  deactivate(): Project {
    return Project.fromConfig(deactivateAmendment(this.config), this.options);
  }
}

/**
 * Load a descriptor and resolve its roster
 */
export function loadProject(configPath: string, options: LoadProjectOptions = {}): Project {
  const config = loadConfig(configPath, options);
  return Project.fromConfig(config, { env: options.env, logger: options.logger });
}
