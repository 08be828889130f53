/**
 * The single-question transition: raw text in, committed value or rejection out.
 */
import { printDefault } from './prompt.js';
import { assertNever, type Question, type SimpleQuestion } from './questions.js';
import type { AnswerOutcome, Answers, AnswerValue } from './types.js';

function transition<T extends AnswerValue>(
  question: SimpleQuestion<T>,
  rawText: string,
  answers: Answers
): AnswerOutcome<T> {
  let input = rawText;
  if (input.trim() === '') {
    input = printDefault(question, answers) ?? input;
  }

  const read = question.read(input);
  if (!read.success) {
    return { status: 'rejected', message: read.error };
  }

  const validation = question.validate(read.value);
  if (!validation.success) {
    return { status: 'rejected', message: validation.error };
  }

  return { status: 'committed', value: read.value };
}

/**
 * Converts and validates `rawText` for `question`. Blank input falls back to
 * the question's default. Recoverable failures come back as `rejected`; this
 * function never records anything in `answers`.
 */
export function answerQuestion(question: Question, rawText: string, answers: Answers): AnswerOutcome {
  switch (question.kind) {
    case 'plain':
      return transition(question, rawText, answers);
    case 'options':
      return transition(question, rawText, answers);
    case 'confirmation':
      return transition(question, rawText, answers);
    default:
      return assertNever(question);
  }
}

/**
 * Printed form of a committed answer, through the question that produced it.
 * `undefined` when the value does not have the question's type.
 */
export function printAnswer(question: Question, value: AnswerValue): string | undefined {
  switch (question.kind) {
    case 'plain':
      return question.accepts(value) ? question.print(value) : undefined;
    case 'options':
      return question.accepts(value) ? question.print(value) : undefined;
    case 'confirmation':
      return question.accepts(value) ? question.print(value) : undefined;
    default:
      return assertNever(question);
  }
}
