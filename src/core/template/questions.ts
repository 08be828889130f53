/**
 * Template question descriptors → prompting questions.
 */
import { QuestionListBuilder, type QuestionList } from '../prompting/question-list.js';
import type { Template } from './types.js';

/**
 * The template's questions as a QuestionList, or `undefined` for a template
 * that asks nothing.
 */
export function templateQuestions(template: Template): QuestionList | undefined {
  if (template.questions.length === 0) return undefined;

  const builder = new QuestionListBuilder();
  for (const question of template.questions) {
    switch (question.kind) {
      case 'plain':
        builder.question(question.name, question.caption);
        break;
      case 'options':
        builder.options(question.name, question.caption, question.options);
        break;
    }
  }
  return builder.build();
}
