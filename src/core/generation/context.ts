/**
 * Placeholder context: the printed answers a template can refer to.
 */
import { printAnswer } from '../prompting/answering.js';
import type { QuestionList } from '../prompting/question-list.js';
import type { Answers } from '../prompting/types.js';

/** Placeholder key → replacement text. */
export type TemplateContext = ReadonlyMap<string, string>;

const PLACEHOLDER_PATTERN = /\$\{([A-Za-z_][\w.-]*)\}/g;

/**
 * Exposes every answered question of `questions` as `${name}` and, when the
 * template has a model name, as `${modelName.name}`. Values are printed
 * through their question.
 */
export function buildTemplateContext(
  modelName: string,
  questions: QuestionList | undefined,
  answers: Answers
): TemplateContext {
  const context = new Map<string, string>();
  if (!questions) return context;

  for (const question of questions) {
    const value = answers.get(question.name);
    if (value === undefined) continue;
    const printed = printAnswer(question, value);
    if (printed === undefined) continue;
    context.set(question.name, printed);
    if (modelName) {
      context.set(`${modelName}.${question.name}`, printed);
    }
  }
  return context;
}

/** `${prefix.key}` for every entry of `values`. */
export function contextFromRecord(prefix: string, values: Record<string, string>): TemplateContext {
  return new Map(Object.entries(values).map(([key, value]) => [`${prefix}.${key}`, value]));
}

/** Later contexts override earlier ones. */
export function mergeContexts(...contexts: TemplateContext[]): TemplateContext {
  const merged = new Map<string, string>();
  for (const context of contexts) {
    for (const [key, value] of context) {
      merged.set(key, value);
    }
  }
  return merged;
}

/**
 * Replaces every `${key}` found in `context`. Unknown placeholders are left
 * as they are.
 */
export function interpolate(text: string, context: TemplateContext): string {
  return text.replace(PLACEHOLDER_PATTERN, (match: string, key: string) => context.get(key) ?? match);
}
