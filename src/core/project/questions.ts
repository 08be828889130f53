/**
 * Questions asked by `blueprint init`.
 */
import type { InitSettings } from '../config/schema.js';
import type { MessageSource } from '../messages/bundle.js';
import { answerString } from '../prompting/answers.js';
import { questionList, type QuestionList } from '../prompting/question-list.js';
import { checkIsPackage, checkRegex } from '../prompting/validation.js';

export const PROJECT_NAME_PATTERN = '[a-zA-Z][0-9a-zA-Z_-]*';
export const NAMESPACE_PATTERN = '[a-z][a-z0-9]*';
export const PLATFORM_VERSION_PATTERN = '[0-9]+(\\.[0-9]+)*(-[0-9A-Za-z.]+)?';

export interface ProjectQuestionsOptions {
  messages: MessageSource;
  settings: InitSettings;
  /** Name of the directory being initialized; the default project name */
  directoryName: string;
}

/** `My-App` → `myapp`. */
export function toNamespace(projectName: string): string {
  return projectName.replace(/[^0-9a-zA-Z]/g, '').toLowerCase();
}

export function createProjectQuestions({ messages, settings, directoryName }: ProjectQuestionsOptions): QuestionList {
  return questionList((q) => {
    q.question('projectName', messages.get('projectName'), (question) => {
      question
        .default(directoryName)
        .validateWith((value) => checkRegex(
          value,
          PROJECT_NAME_PATTERN,
          "Project name should start with a letter and contain only letters, digits, '-' and '_'"
        ));
    });

    q.question('namespace', messages.get('namespace'), (question) => {
      question
        .defaultFrom((answers) => toNamespace(answerString(answers, 'projectName')))
        .validateWith((value) => checkRegex(value, NAMESPACE_PATTERN, 'Namespace should be lower-case letters and digits'));
    });

    q.question('rootPackage', messages.get('rootPackage'), (question) => {
      question
        .defaultFrom((answers) => `${settings.package_prefix}.${answerString(answers, 'namespace')}`)
        .validateWith((value) => checkIsPackage(value));
    });

    const customVersionIndex = settings.platform_versions.length;
    q.options(
      'platformVersion',
      messages.get('platformVersion'),
      [...settings.platform_versions, messages.get('customPlatformVersionOption')],
      (question) => {
        question.default(0);
      }
    );

    q.question('customPlatformVersion', messages.get('customPlatformVersion'), (question) => {
      question
        .askIf((answers) => answers.get('platformVersion') === customVersionIndex)
        .validateWith((value) => checkRegex(value, PLATFORM_VERSION_PATTERN, 'Platform version should look like 7.2.1 or 7.3-SNAPSHOT'));
    });

    q.options('database', messages.get('database'), messages.getList('databases'), (question) => {
      question.default(0);
    });
  });
}
