/**
 * Prompt text for a question. Plain text only; the CLI adds colour.
 */
import { resolveDefault } from './default-value.js';
import {
  assertNever,
  type ConfirmationQuestion,
  type Question,
  type SimpleQuestion,
} from './questions.js';
import type { Answers, AnswerValue } from './types.js';

/**
 * The question's default, resolved against `answers` and printed through the
 * question itself. `undefined` when there is no default.
 */
export function printDefault<T extends AnswerValue>(
  question: SimpleQuestion<T>,
  answers: Answers
): string | undefined {
  const value = resolveDefault(question.defaultValue, answers);
  return value === undefined ? undefined : question.print(value);
}

function withHint(caption: string, hint: string | undefined): string {
  return hint ? `> ${caption} (${hint})` : `> ${caption}`;
}

function confirmationHint(question: ConfirmationQuestion, answers: Answers): string {
  const value = resolveDefault(question.defaultValue, answers);
  if (value === undefined) return 'y/n';
  return value ? 'Y/n' : 'y/N';
}

export function renderPrompt(question: Question, answers: Answers): string {
  switch (question.kind) {
    case 'plain':
      return withHint(question.caption, printDefault(question, answers));
    case 'options': {
      const lines = [withHint(question.caption, printDefault(question, answers))];
      question.options.forEach((option, index) => lines.push(`${index + 1}. ${option}`));
      return lines.join('\n');
    }
    case 'confirmation':
      return `> ${question.caption} (${confirmationHint(question, answers)})`;
    default:
      return assertNever(question);
  }
}
