/**
 * Project model derived from the answers to the init questions.
 */
import { contextFromRecord, type TemplateContext } from '../generation/context.js';
import { answerNumber, answerString } from '../prompting/answers.js';
import type { Answers } from '../prompting/types.js';
import { PromptError, ErrorCodes } from '../../utils/errors.js';

export interface ProjectChoices {
  platformVersions: readonly string[];
  databases: readonly string[];
}

function choose(choices: readonly string[], index: number, question: string): string {
  const choice = choices[index];
  if (choice === undefined) {
    throw new PromptError(
      ErrorCodes.MISSING_ANSWER,
      `Answer ${index + 1} for ${question} is not one of the offered choices`,
      { question, index }
    );
  }
  return choice;
}

export class ProjectInitModel {
  constructor(
    readonly projectName: string,
    readonly namespace: string,
    readonly rootPackage: string,
    readonly platformVersion: string,
    readonly database: string
  ) {}

  /** `com.company.app` → `com/company/app` */
  get rootPackageDirectory(): string {
    return this.rootPackage.replace(/\./g, '/');
  }

  /** A typed `customPlatformVersion` replaces the chosen platform version. */
  static fromAnswers(answers: Answers, choices: ProjectChoices): ProjectInitModel {
    return new ProjectInitModel(
      answerString(answers, 'projectName'),
      answerString(answers, 'namespace'),
      answerString(answers, 'rootPackage'),
      answers.has('customPlatformVersion')
        ? answerString(answers, 'customPlatformVersion')
        : choose(choices.platformVersions, answerNumber(answers, 'platformVersion'), 'platformVersion'),
      choose(choices.databases, answerNumber(answers, 'database'), 'database')
    );
  }

  /** Placeholders `${project.<field>}` for the project template. */
  toContext(): TemplateContext {
    return contextFromRecord('project', {
      projectName: this.projectName,
      namespace: this.namespace,
      rootPackage: this.rootPackage,
      rootPackageDirectory: this.rootPackageDirectory,
      platformVersion: this.platformVersion,
      database: this.database,
    });
  }
}
