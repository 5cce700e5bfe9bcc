/**
 * @arch propweave.cli.command
 * @intent:cli-output
 */
import { Command } from 'commander';
import { DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { openWorkspace } from '../workspace.js';
import { HumanFormatter } from '../formatters/human.js';
import { JsonFormatter } from '../formatters/json.js';
import { logger as log } from '../../utils/logger.js';

interface InspectOptions {
  config: string;
  project?: string;
  files?: string[];
  local?: boolean;
  json?: boolean;
}

/**
 * Create the inspect command.
 */
export function createInspectCommand(): Command {
  return new Command('inspect')
    .description('Show the property registry resolved for a class or interface')
    .argument('<type>', 'Class or interface name')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('-p, --project <tsconfig>', 'tsconfig.json to load')
    .option('-f, --files <globs...>', 'Source files to analyse')
    .option('--local', 'Only list properties declared on the type itself')
    .option('--json', 'Output as JSON')
    .action(async (typeName: string, options: InspectOptions) => {
      try {
        await runInspect(typeName, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runInspect(typeName: string, options: InspectOptions): Promise<void> {
  const workspace = await openWorkspace(options);
  const registry = workspace.builder.build(workspace.getType(typeName));

  const formatter = options.json
    ? new JsonFormatter({ localOnly: options.local })
    : new HumanFormatter({ localOnly: options.local });
  console.log(formatter.formatRegistry(registry));
}
