/**
 * Default values: absent, fixed, or computed from earlier answers.
 */
import type { Answers } from './types.js';

export type DefaultFunction<T> = (answers: Answers) => T;

export type DefaultValue<T> =
  | { kind: 'none' }
  | { kind: 'fixed'; value: T }
  | { kind: 'computed'; compute: DefaultFunction<T> };

export const NO_DEFAULT: DefaultValue<never> = { kind: 'none' };

export function fixedDefault<T>(value: T): DefaultValue<T> {
  return { kind: 'fixed', value };
}

/**
 * A default evaluated when the question is rendered, not when it is declared.
 * `compute` may only read answers of questions asked before this one.
 */
export function computedDefault<T>(compute: DefaultFunction<T>): DefaultValue<T> {
  return { kind: 'computed', compute };
}

export function resolveDefault<T>(defaultValue: DefaultValue<T>, answers: Answers): T | undefined {
  switch (defaultValue.kind) {
    case 'none':
      return undefined;
    case 'fixed':
      return defaultValue.value;
    case 'computed':
      return defaultValue.compute(answers);
  }
}
