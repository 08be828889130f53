/**
 * Interactive answering loop: asks each question until its answer is accepted.
 */
import chalk from 'chalk';
import * as readline from 'node:readline';
import { answerQuestion } from '../core/prompting/answering.js';
import { AnswerStore } from '../core/prompting/answers.js';
import { renderPrompt } from '../core/prompting/prompt.js';
import type { QuestionList } from '../core/prompting/question-list.js';
import type { Answers } from '../core/prompting/types.js';
import { ErrorCodes, PromptError } from '../utils/errors.js';

/** Where raw answers come from. */
export interface InputSource {
  ask(prompt: string): Promise<string>;
  close(): void;
}

export function createReadlineInput(): InputSource {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return {
    // End of input (Ctrl+D, a closed pipe) rejects the pending question.
    ask: (prompt: string) => new Promise((resolve, reject) => {
      const onClose = () => {
        reject(new PromptError(ErrorCodes.INPUT_CLOSED, 'Input closed before the question was answered'));
      };
      rl.once('close', onClose);
      rl.question(prompt, (answer) => {
        rl.off('close', onClose);
        resolve(answer);
      });
    }),
    close: () => rl.close(),
  };
}

/**
 * Asks every question of `questions` in order, skipping those whose ask
 * condition does not hold. A rejected answer prints its message and the same
 * question is asked again.
 */
export async function askQuestions(questions: QuestionList, input: InputSource): Promise<Answers> {
  const store = new AnswerStore();

  for (const question of questions) {
    if (!question.isAsked(store.snapshot())) continue;

    while (true) {
      const answers = store.snapshot();
      const raw = await input.ask(`${chalk.cyan(renderPrompt(question, answers))}\n`);
      const outcome = answerQuestion(question, raw, answers);

      if (outcome.status === 'committed') {
        store.commit(question.name, outcome.value);
        break;
      }
      console.log(chalk.yellow(`  ${outcome.message}`));
    }
  }

  return store.snapshot();
}

/**
 * Runs `session` against a fresh readline input and always closes it.
 */
export async function withInput<T>(
  session: (input: InputSource) => Promise<T>,
  createInput: () => InputSource = createReadlineInput
): Promise<T> {
  const input = createInput();
  try {
    return await session(input);
  } finally {
    input.close();
  }
}
