/**
 * Runs generation instructions in declaration order.
 */
import * as path from 'node:path';
import { ErrorCodes, GenerationError, SecurityError } from '../../utils/errors.js';
import { copyFile, isWithin, readFile, writeFile } from '../../utils/file-system.js';
import { logger, type Logger } from '../../utils/logger.js';
import type { GenerationInstruction } from '../template/types.js';
import { interpolate, type TemplateContext } from './context.js';

export interface ExecuteOptions {
  /** Directory the instruction sources are relative to (the template directory) */
  sourceRoot: string;
  /** Directory the destinations are relative to */
  targetRoot: string;
  /** Plan only; nothing is read or written */
  dryRun?: boolean;
}

export interface GeneratedFile {
  /** Absolute source path */
  source: string;
  /** Absolute destination path, placeholders resolved */
  destination: string;
  transform: boolean;
}

/**
 * Each instruction may rely on files written by the ones before it, so they
 * run one at a time. The first failure stops the run; files already written
 * stay in place.
 */
export class GenerationExecutor {
  private readonly log: Logger;

  constructor(log: Logger = logger.child('generate')) {
    this.log = log;
  }

  async execute(
    instructions: readonly GenerationInstruction[],
    context: TemplateContext,
    options: ExecuteOptions
  ): Promise<GeneratedFile[]> {
    const files: GeneratedFile[] = [];

    for (const [index, instruction] of instructions.entries()) {
      const file = this.plan(instruction, context, options);
      if (!options.dryRun) {
        await this.apply(file, context, index + 1);
      }
      files.push(file);
    }

    return files;
  }

  private plan(
    instruction: GenerationInstruction,
    context: TemplateContext,
    options: ExecuteOptions
  ): GeneratedFile {
    const source = path.resolve(options.sourceRoot, instruction.src);
    const destination = path.resolve(options.targetRoot, interpolate(instruction.dst, context));

    if (!isWithin(options.sourceRoot, source)) {
      throw new SecurityError(
        ErrorCodes.PATH_TRAVERSAL,
        `Source ${instruction.src} is outside the template directory`,
        { src: instruction.src }
      );
    }
    if (!isWithin(options.targetRoot, destination)) {
      throw new SecurityError(
        ErrorCodes.PATH_TRAVERSAL,
        `Destination ${instruction.dst} is outside ${options.targetRoot}`,
        { dst: instruction.dst }
      );
    }

    return { source, destination, transform: instruction.transform };
  }

  private async apply(file: GeneratedFile, context: TemplateContext, step: number): Promise<void> {
    const verb = file.transform ? 'transform' : 'copy';
    this.log.debug(`${verb} ${file.source} -> ${file.destination}`);

    try {
      if (file.transform) {
        const content = await readFile(file.source);
        await writeFile(file.destination, interpolate(content, context));
      } else {
        await copyFile(file.source, file.destination);
      }
    } catch (error) {
      throw new GenerationError(
        ErrorCodes.GENERATION_FAILED,
        `Step ${step} (${verb} ${file.source}) failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { step, source: file.source, destination: file.destination }
      );
    }
  }
}
