/**
 * @arch propweave.cli.command
 * @intent:cli-output
 */
import { Command } from 'commander';
import { DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { EMPTY_CACHE, type RegistryCache } from '../../core/registry/cache.js';
import { openWorkspace } from '../workspace.js';
import { HumanFormatter } from '../formatters/human.js';
import { JsonFormatter } from '../formatters/json.js';
import type { CheckResult } from '../formatters/types.js';
import { PropertyBuildError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

interface CheckOptions {
  config: string;
  project?: string;
  files?: string[];
  json?: boolean;
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Build property registries and report naming conflicts')
    .argument('[types...]', 'Class or interface names (default: every type in the project)')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('-p, --project <tsconfig>', 'tsconfig.json to load')
    .option('-f, --files <globs...>', 'Source files to analyse')
    .option('--json', 'Output as JSON')
    .action(async (typeNames: string[], options: CheckOptions) => {
      try {
        const failed = await runCheck(typeNames, options);
        if (failed > 0) {
          process.exit(1);
        }
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

/**
 * Build each type in turn, reusing registries built for earlier types.
 * Returns the number of types whose build failed.
 */
async function runCheck(typeNames: string[], options: CheckOptions): Promise<number> {
  const workspace = await openWorkspace(options);
  const types = typeNames.length > 0 ? typeNames.map((name) => workspace.getType(name)) : workspace.listTypes();

  const results: CheckResult[] = [];
  let cache: RegistryCache = EMPTY_CACHE;
  for (const type of types) {
    try {
      cache = workspace.builder.buildAll(type, cache);
      results.push({ type: type.name, status: 'pass', properties: cache.get(type.id)?.size ?? 0 });
    } catch (error) {
      if (!(error instanceof PropertyBuildError)) {
        throw error;
      }
      const problems = [...error.problems].map(([name, entries]): [string, string[]] => [
        name,
        entries.map((entry) => entry.message),
      ]);
      results.push({ type: type.name, status: 'fail', problems: Object.fromEntries(problems) });
    }
  }

  const formatter = options.json ? new JsonFormatter() : new HumanFormatter();
  console.log(formatter.formatCheck(results));
  return results.filter((result) => result.status === 'fail').length;
}
