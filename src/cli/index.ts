/**
 * CLI program definition.
 */
import { Command } from 'commander';
import { createGenerateCommand } from './commands/generate.js';
import { createInitCommand } from './commands/init.js';
import { createTemplatesCommand } from './commands/templates.js';
import { createVersionCommand, readVersion } from './commands/version.js';

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('blueprint')
    .description('Generate projects and files from templates')
    .version(readVersion());
  [createInitCommand, createGenerateCommand, createTemplatesCommand, createVersionCommand]
    .forEach((cmd) => program.addCommand(cmd()));
  return program;
}
