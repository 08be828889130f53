/**
 * Ordered question trees and their builder.
 */
import { PromptError, ErrorCodes } from '../../utils/errors.js';
import {
  ConfirmationQuestion,
  OptionsQuestion,
  PlainQuestion,
  type Question,
} from './questions.js';

/**
 * A finalized, duplicate-free sequence of questions. Iteration order is the
 * order in which the questions are asked.
 */
export class QuestionList implements Iterable<Question> {
  private readonly questions: readonly Question[];
  private readonly byName: ReadonlyMap<string, Question>;

  /** Use QuestionListBuilder or questionList(); the checks live there. */
  constructor(questions: readonly Question[]) {
    this.questions = Object.freeze([...questions]);
    this.byName = new Map(this.questions.map((question) => [question.name, question]));
  }

  get size(): number {
    return this.questions.length;
  }

  get(name: string): Question | undefined {
    return this.byName.get(name);
  }

  names(): string[] {
    return this.questions.map((question) => question.name);
  }

  [Symbol.iterator](): Iterator<Question> {
    return this.questions[Symbol.iterator]();
  }
}

/**
 * Collects questions in call order. Each add method may take a configuration
 * step that runs on the new question before it is appended.
 */
export class QuestionListBuilder {
  private readonly questions: Question[] = [];
  private built = false;

  question(name: string, caption: string, configure?: (question: PlainQuestion) => void): this {
    return this.add(new PlainQuestion(name, caption), configure);
  }

  options(
    name: string,
    caption: string,
    options: readonly string[],
    configure?: (question: OptionsQuestion) => void
  ): this {
    return this.add(new OptionsQuestion(name, caption, options), configure);
  }

  confirmation(
    name: string,
    caption: string,
    configure?: (question: ConfirmationQuestion) => void
  ): this {
    return this.add(new ConfirmationQuestion(name, caption), configure);
  }

  /**
   * Checks the collected questions and freezes them into a QuestionList.
   * The list must not be empty and names must be unique. The questions are
   * sealed: configuring them afterwards throws.
   */
  build(): QuestionList {
    if (this.built) {
      throw new PromptError(ErrorCodes.LIST_ALREADY_BUILT, 'Question list is already built');
    }
    if (this.questions.length === 0) {
      throw new PromptError(ErrorCodes.EMPTY_QUESTION_LIST, 'Question list is empty');
    }

    // Names are reported in order of first appearance.
    const counts = new Map<string, number>();
    for (const question of this.questions) {
      counts.set(question.name, (counts.get(question.name) ?? 0) + 1);
    }
    for (const [name, count] of counts) {
      if (count > 1) {
        throw new PromptError(
          ErrorCodes.DUPLICATE_QUESTION,
          `Duplicated questions with name ${name}`,
          { question: name, count }
        );
      }
    }

    this.built = true;
    for (const question of this.questions) {
      question.seal();
    }
    return new QuestionList(this.questions);
  }

  private add<Q extends Question>(question: Q, configure?: (question: Q) => void): this {
    if (this.built) {
      throw new PromptError(ErrorCodes.LIST_ALREADY_BUILT, 'Question list is already built');
    }
    configure?.(question);
    this.questions.push(question);
    return this;
  }
}

/**
 * Declarative form: `questionList((q) => { q.question(...); q.options(...); })`.
 */
export function questionList(setup: (builder: QuestionListBuilder) => void): QuestionList {
  const builder = new QuestionListBuilder();
  setup(builder);
  return builder.build();
}
