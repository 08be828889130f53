/**
 * Shared types of the prompting engine.
 */

/** A committed answer: text, a zero-based option index, or a yes/no flag. */
export type AnswerValue = string | number | boolean;

/**
 * Answers gathered so far, keyed by question name. Iteration order is the
 * order in which questions were answered.
 */
export type Answers = ReadonlyMap<string, AnswerValue>;

export type QuestionKind = 'plain' | 'options' | 'confirmation';

/**
 * Outcome of converting raw text into a question's value type.
 */
export type ReadResult<T> =
  | { success: true; value: T }
  | { success: false; error: string };

/**
 * Outcome of checking a converted value. `error` is shown to the user verbatim.
 */
export type ValidationResult = { success: true } | { success: false; error: string };

export type Validator<T> = (value: T) => ValidationResult;

/** Decides from earlier answers whether a question is asked at all. */
export type AskCondition = (answers: Answers) => boolean;

/**
 * Result of the single-question transition: either the value to commit or the
 * message to show before asking again.
 */
export type AnswerOutcome<T = AnswerValue> =
  | { status: 'committed'; value: T }
  | { status: 'rejected'; message: string };

/** Raw text → typed value. */
export interface Readable<T> {
  read(raw: string): ReadResult<T>;
}

/** Typed value → canonical display text. */
export interface Printable<T> {
  print(value: T): string;
}

/** Post-conversion acceptance check. */
export interface Validatable<T> {
  validate(value: T): ValidationResult;
}
