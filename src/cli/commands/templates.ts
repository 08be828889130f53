/**
 * Lists the templates `generate` can use.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../core/config/loader.js';
import { createTemplateLocator } from '../../core/template/locator.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

export function createTemplatesCommand(): Command {
  return new Command('templates')
    .description('List available templates')
    .action(async () => {
      try {
        await runTemplates();
      } catch (error) {
        log.error(errorMessage(error), error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });
}

async function runTemplates(): Promise<void> {
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot);
  const locator = createTemplateLocator(config, projectRoot);
  const templates = await locator.list();

  if (templates.length === 0) {
    log.warn('No templates found');
    console.log(chalk.dim('Searched:'));
    for (const searchPath of locator.getSearchPaths()) {
      console.log(chalk.dim(`  ${searchPath}`));
    }
    return;
  }

  console.log(chalk.bold('Available templates:'));
  for (const templateId of templates) {
    console.log(`  ${chalk.cyan(templateId)}`);
  }
}
