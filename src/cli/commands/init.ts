/**
 * Initializes a new project from the built-in `project` template.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import { buildTemplateContext, mergeContexts } from '../../core/generation/context.js';
import { GenerationExecutor } from '../../core/generation/executor.js';
import { loadMessages } from '../../core/messages/bundle.js';
import { ProjectInitModel } from '../../core/project/model.js';
import { createProjectQuestions } from '../../core/project/questions.js';
import type { Answers } from '../../core/prompting/types.js';
import { createTemplateLocator } from '../../core/template/locator.js';
import { parseTemplate } from '../../core/template/parser.js';
import { templateQuestions } from '../../core/template/questions.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { askQuestions, withInput } from '../prompter.js';
import { applyLogLevel, reportGeneratedFiles, type GenerationCommandOptions } from '../shared.js';

export const PROJECT_TEMPLATE = 'project';

export function createInitCommand(): Command {
  return new Command('init')
    .description('Create a new project')
    .argument('[directory]', 'Project directory (default: current directory)')
    .option('--dry-run', 'Show what would be generated without writing')
    .option('--verbose', 'Log every generation step')
    .action(async (directory: string | undefined, options: GenerationCommandOptions) => {
      try {
        await runInit(directory, options);
      } catch (error) {
        log.error(errorMessage(error), error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });
}

async function runInit(directory: string | undefined, options: GenerationCommandOptions): Promise<void> {
  const projectRoot = process.cwd();
  const targetRoot = path.resolve(projectRoot, directory ?? '.');
  const config = await loadConfig(projectRoot);
  applyLogLevel(config, options.verbose);

  const messages = await loadMessages();
  const template = await parseTemplate(PROJECT_TEMPLATE, createTemplateLocator(config, projectRoot));
  const projectQuestions = createProjectQuestions({
    messages,
    settings: config.init,
    directoryName: path.basename(targetRoot),
  });
  const extraQuestions = templateQuestions(template);

  console.log();
  console.log(chalk.bold('New project'));
  console.log();

  const { projectAnswers, templateAnswers } = await withInput(async (input) => {
    const projectAnswers = await askQuestions(projectQuestions, input);
    const templateAnswers: Answers = extraQuestions
      ? await askQuestions(extraQuestions, input)
      : new Map();
    return { projectAnswers, templateAnswers };
  });

  const model = ProjectInitModel.fromAnswers(projectAnswers, {
    platformVersions: config.init.platform_versions,
    databases: messages.getList('databases'),
  });
  log.debug('Project model', { ...model, rootPackageDirectory: model.rootPackageDirectory });

  const files = await new GenerationExecutor().execute(
    template.instructions,
    mergeContexts(model.toContext(), buildTemplateContext(template.modelName, extraQuestions, templateAnswers)),
    { sourceRoot: template.path, targetRoot, dryRun: options.dryRun }
  );

  reportGeneratedFiles(files, targetRoot, options.dryRun);
  if (!options.dryRun) {
    console.log();
    log.success(`Project ${model.projectName} created in ${targetRoot}`);
  }
}
