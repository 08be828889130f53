/**
 * Helpers shared by the generating commands.
 */
import chalk from 'chalk';
import * as path from 'node:path';
import type { Config } from '../core/config/schema.js';
import type { GeneratedFile } from '../core/generation/executor.js';
import { logger as log } from '../utils/logger.js';

export interface GenerationCommandOptions {
  dryRun?: boolean;
  verbose?: boolean;
}

/** `--verbose` wins over the configured level. */
export function applyLogLevel(config: Config, verbose?: boolean): void {
  log.setLevel(verbose ? 'debug' : config.logging.level);
}

export function reportGeneratedFiles(files: readonly GeneratedFile[], targetRoot: string, dryRun?: boolean): void {
  if (files.length === 0) {
    log.warn('Template has no operations; nothing to generate');
    return;
  }

  console.log();
  if (dryRun) {
    console.log(chalk.bold('Dry Run - Would generate:'));
    console.log();
  }

  for (const file of files) {
    const relative = path.relative(targetRoot, file.destination) || '.';
    const marker = file.transform ? chalk.dim('(transform)') : chalk.dim('(copy)');
    if (dryRun) {
      console.log(`  ${chalk.cyan(relative)} ${marker}`);
    } else {
      log.success(`Created ${relative} ${marker}`);
    }
  }
}
