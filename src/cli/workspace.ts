/**
 * @arch propweave.cli.support
 *
 * Loads the config and the analysed project shared by every command.
 */
import { loadConfig, toConventionOptions } from '../core/config/loader.js';
import type { Config } from '../core/config/schema.js';
import { PropertyRegistryBuilder } from '../core/builder/builder.js';
import { MorphHostModel } from '../core/host/morph-model.js';
import type { HostType } from '../core/host/types.js';
import { globFiles, resolvePath } from '../utils/file-system.js';
import { logger } from '../utils/logger.js';

export interface WorkspaceOptions {
  config?: string;
  /** tsconfig.json overriding the config file's `project.tsconfig` */
  project?: string;
  /** Globs overriding the config file's `project.include` */
  files?: string[];
}

export interface Workspace {
  readonly config: Config;
  readonly builder: PropertyRegistryBuilder;
  getType(name: string): HostType;
  listTypes(): HostType[];
}

export async function openWorkspace(options: WorkspaceOptions, projectRoot = process.cwd()): Promise<Workspace> {
  const config = await loadConfig(projectRoot, options.config);
  logger.setLevel(config.log_level);

  const tsconfig = options.project ?? config.project.tsconfig;
  const patterns = options.files && options.files.length > 0 ? options.files : tsconfig ? [] : config.project.include;
  const files = patterns.length > 0
    ? await globFiles(patterns, { cwd: projectRoot, ignore: config.project.exclude })
    : [];
  logger.debug(`Opening project with ${files.length} source files`, { tsconfig, patterns });

  const model = MorphHostModel.open({
    tsConfigFilePath: tsconfig ? resolvePath(projectRoot, tsconfig) : undefined,
    files,
  });
  const builder = PropertyRegistryBuilder.create(model, toConventionOptions(config.conventions));

  return {
    config,
    builder,
    getType: (name) => model.getType(name),
    listTypes: () => model.listTypes(),
  };
}
