/**
 * Question variants: free text, single choice and yes/no.
 *
 * The set is closed. Code that needs per-variant behaviour switches on `kind`
 * over the `Question` union rather than subclassing.
 */
import { PromptError, ErrorCodes } from '../../utils/errors.js';
import {
  NO_DEFAULT,
  computedDefault,
  fixedDefault,
  type DefaultFunction,
  type DefaultValue,
} from './default-value.js';
import { accept, allOf, reject } from './validation.js';
import type {
  Answers,
  AnswerValue,
  AskCondition,
  Printable,
  QuestionKind,
  Readable,
  ReadResult,
  Validatable,
  ValidationResult,
  Validator,
} from './types.js';

/**
 * State and configuration shared by every variant: identity, default value and
 * the optional validator.
 */
export abstract class SimpleQuestion<T extends AnswerValue>
  implements Readable<T>, Printable<T>, Validatable<T>
{
  abstract readonly kind: QuestionKind;

  private currentDefault: DefaultValue<T> = NO_DEFAULT;
  private validator: Validator<T> | undefined;
  private condition: AskCondition | undefined;
  private sealed = false;

  constructor(
    readonly name: string,
    readonly caption: string
  ) {}

  abstract read(raw: string): ReadResult<T>;

  abstract print(value: T): string;

  /** Whether an untyped answer has this question's value type. */
  abstract accepts(value: AnswerValue): value is T;

  get defaultValue(): DefaultValue<T> {
    return this.currentDefault;
  }

  /** Sets a fixed default. Defaults may be replaced until the list is built. */
  default(value: T): this {
    this.assertOpen();
    this.currentDefault = fixedDefault(value);
    return this;
  }

  /** Sets a default computed from earlier answers when the question is rendered. */
  defaultFrom(compute: DefaultFunction<T>): this {
    this.assertOpen();
    this.currentDefault = computedDefault(compute);
    return this;
  }

  /** Asks the question only when `condition` holds for the earlier answers. */
  askIf(condition: AskCondition): this {
    this.assertOpen();
    this.condition = condition;
    return this;
  }

  isAsked(answers: Answers): boolean {
    return this.condition ? this.condition(answers) : true;
  }

  /**
   * Attaches the validator. A question takes one validator only.
   */
  validateWith(validator: Validator<T>): this {
    this.assertOpen();
    if (this.validator) {
      throw new PromptError(
        ErrorCodes.VALIDATOR_ALREADY_SET,
        `Validation is already set for question ${this.name}`,
        { question: this.name }
      );
    }
    this.validator = validator;
    return this;
  }

  validate(value: T): ValidationResult {
    return this.validator ? this.validator(value) : accept();
  }

  /** Called by QuestionListBuilder.build(); configuration is closed afterwards. */
  seal(): void {
    this.sealed = true;
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new PromptError(
        ErrorCodes.LIST_ALREADY_BUILT,
        `Question ${this.name} belongs to a built list and can no longer be configured`,
        { question: this.name }
      );
    }
  }
}

export class PlainQuestion extends SimpleQuestion<string> {
  readonly kind = 'plain';

  read(raw: string): ReadResult<string> {
    return { success: true, value: raw };
  }

  print(value: string): string {
    return value;
  }

  accepts(value: AnswerValue): value is string {
    return typeof value === 'string';
  }
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Single choice. Stored as a zero-based index, typed and printed one-based.
 */
export class OptionsQuestion extends SimpleQuestion<number> {
  readonly kind = 'options';
  readonly options: readonly string[];

  constructor(name: string, caption: string, options: readonly string[]) {
    super(name, caption);
    if (options.length === 0) {
      throw new PromptError(
        ErrorCodes.EMPTY_OPTIONS,
        `Question ${name} has no options`,
        { question: name }
      );
    }
    this.options = Object.freeze([...options]);
  }

  private get rangeHint(): string {
    return `Input 1-${this.options.length}`;
  }

  read(raw: string): ReadResult<number> {
    if (!INTEGER_PATTERN.test(raw)) {
      return { success: false, error: this.rangeHint };
    }
    return { success: true, value: Number.parseInt(raw, 10) - 1 };
  }

  print(value: number): string {
    return String(value + 1);
  }

  accepts(value: AnswerValue): value is number {
    return typeof value === 'number';
  }

  /** The range check always runs first; an attached validator runs after it. */
  override validate(value: number): ValidationResult {
    return allOf<number>(
      (index) => (Number.isInteger(index) && index >= 0 && index < this.options.length
        ? accept()
        : reject(this.rangeHint)),
      (index) => super.validate(index)
    )(value);
  }

  /** Label of the option at a zero-based index. */
  label(index: number): string | undefined {
    return this.options[index];
  }
}

export class ConfirmationQuestion extends SimpleQuestion<boolean> {
  readonly kind = 'confirmation';

  read(raw: string): ReadResult<boolean> {
    const normalized = raw.toLowerCase().trim();
    if (normalized === 'y') return { success: true, value: true };
    if (normalized === 'n') return { success: true, value: false };
    return { success: false, error: 'Invalid value' };
  }

  print(value: boolean): string {
    return value ? 'y' : 'n';
  }

  accepts(value: AnswerValue): value is boolean {
    return typeof value === 'boolean';
  }
}

export type Question = PlainQuestion | OptionsQuestion | ConfirmationQuestion;

export function assertNever(value: never): never {
  throw new Error(`Unexpected question: ${JSON.stringify(value)}`);
}
