/**
 * Answer bookkeeping and typed access for computed defaults and models.
 */
import { PromptError, ErrorCodes } from '../../utils/errors.js';
import type { Answers, AnswerValue } from './types.js';

/**
 * Append-only store of committed answers. A name is committed once.
 */
export class AnswerStore {
  private readonly values = new Map<string, AnswerValue>();

  get size(): number {
    return this.values.size;
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get(name: string): AnswerValue | undefined {
    return this.values.get(name);
  }

  commit(name: string, value: AnswerValue): void {
    if (this.values.has(name)) {
      throw new PromptError(
        ErrorCodes.ANSWER_ALREADY_SET,
        `Question ${name} is already answered`,
        { question: name }
      );
    }
    this.values.set(name, value);
  }

  /** A copy of the answers so far, in answering order. */
  snapshot(): Answers {
    return new Map(this.values);
  }
}

function missingAnswer(name: string, expected: string, actual: AnswerValue | undefined): PromptError {
  const found = actual === undefined ? 'no answer' : `a ${typeof actual}`;
  return new PromptError(
    ErrorCodes.MISSING_ANSWER,
    `Expected a ${expected} answer for ${name}, found ${found}`,
    { question: name }
  );
}

export function answerString(answers: Answers, name: string): string {
  const value = answers.get(name);
  if (typeof value !== 'string') throw missingAnswer(name, 'string', value);
  return value;
}

export function answerNumber(answers: Answers, name: string): number {
  const value = answers.get(name);
  if (typeof value !== 'number') throw missingAnswer(name, 'number', value);
  return value;
}

export function answerBoolean(answers: Answers, name: string): boolean {
  const value = answers.get(name);
  if (typeof value !== 'boolean') throw missingAnswer(name, 'boolean', value);
  return value;
}
