/**
 * Generates files from a template: asks the template's questions, then runs
 * its operations against the answers.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import { buildTemplateContext } from '../../core/generation/context.js';
import { GenerationExecutor } from '../../core/generation/executor.js';
import type { Answers } from '../../core/prompting/types.js';
import { createTemplateLocator } from '../../core/template/locator.js';
import { parseTemplate } from '../../core/template/parser.js';
import { templateQuestions } from '../../core/template/questions.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { askQuestions, withInput } from '../prompter.js';
import { applyLogLevel, reportGeneratedFiles, type GenerationCommandOptions } from '../shared.js';

interface GenerateOptions extends GenerationCommandOptions {
  output?: string;
}

export function createGenerateCommand(): Command {
  return new Command('generate')
    .alias('gen')
    .description('Generate files from a template')
    .argument('<template>', 'Template name (see `blueprint templates`)')
    .option('-o, --output <dir>', 'Directory to generate into (default: current directory)')
    .option('--dry-run', 'Show what would be generated without writing')
    .option('--verbose', 'Log every generation step')
    .action(async (templateId: string, options: GenerateOptions) => {
      try {
        await runGenerate(templateId, options);
      } catch (error) {
        log.error(errorMessage(error), error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });
}

async function runGenerate(templateId: string, options: GenerateOptions): Promise<void> {
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot);
  applyLogLevel(config, options.verbose);

  const template = await parseTemplate(templateId, createTemplateLocator(config, projectRoot));
  log.debug(`Using template ${templateId} from ${template.path}`);

  const questions = templateQuestions(template);
  let answers: Answers = new Map();
  if (questions) {
    console.log(chalk.bold(`Template ${templateId}`));
    answers = await withInput((input) => askQuestions(questions, input));
  }

  const targetRoot = path.resolve(projectRoot, options.output ?? '.');
  const files = await new GenerationExecutor().execute(
    template.instructions,
    buildTemplateContext(template.modelName, questions, answers),
    { sourceRoot: template.path, targetRoot, dryRun: options.dryRun }
  );

  reportGeneratedFiles(files, targetRoot, options.dryRun);
}
