/**
 * @arch propweave.cli.barrel
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createInspectCommand } from './commands/inspect.js';
import { createCheckCommand } from './commands/check.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  return typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string'
    ? manifest.version
    : '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('propweave')
    .description('Resolve typed property registries across class and interface hierarchies')
    .version(readVersion());
  [createInspectCommand, createCheckCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
