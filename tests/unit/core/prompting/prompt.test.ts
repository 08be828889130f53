/**
 * Tests for prompt rendering.
 */
import { describe, it, expect } from 'vitest';
import { answerString } from '../../../../src/core/prompting/answers.js';
import { printDefault, renderPrompt } from '../../../../src/core/prompting/prompt.js';
import {
  ConfirmationQuestion,
  OptionsQuestion,
  PlainQuestion,
} from '../../../../src/core/prompting/questions.js';

const none = new Map<string, string | number | boolean>();

describe('renderPrompt', () => {
  it('should render a caption without a default', () => {
    expect(renderPrompt(new PlainQuestion('name', 'Project name'), none)).toBe('> Project name');
  });

  it('should render a fixed default', () => {
    const question = new PlainQuestion('name', 'Project name').default('demo');
    expect(renderPrompt(question, none)).toBe('> Project name (demo)');
  });

  it('should skip an empty default', () => {
    const question = new PlainQuestion('name', 'Project name').default('');
    expect(renderPrompt(question, none)).toBe('> Project name');
  });

  it('should render a computed default from earlier answers', () => {
    const question = new PlainQuestion('pkg', 'Package').defaultFrom(
      (answers) => `com.${answerString(answers, 'name')}`
    );

    expect(renderPrompt(question, new Map([['name', 'shop']]))).toBe('> Package (com.shop)');
    expect(renderPrompt(question, new Map([['name', 'blog']]))).toBe('> Package (com.blog)');
  });

  it('should list options and print the default one-based', () => {
    const question = new OptionsQuestion('pick', 'Pick', ['A', 'B']).default(1);
    expect(renderPrompt(question, none)).toBe('> Pick (2)\n1. A\n2. B');
  });

  it('should list options without a default', () => {
    const question = new OptionsQuestion('db', 'Database', ['HSQLDB', 'PostgreSQL', 'MySQL']);
    expect(renderPrompt(question, none)).toBe('> Database\n1. HSQLDB\n2. PostgreSQL\n3. MySQL');
  });

  it('should mark the default letter of a confirmation', () => {
    expect(renderPrompt(new ConfirmationQuestion('ok', 'Continue?'), none)).toBe('> Continue? (y/n)');
    expect(renderPrompt(new ConfirmationQuestion('ok', 'Continue?').default(true), none)).toBe('> Continue? (Y/n)');
    expect(renderPrompt(new ConfirmationQuestion('ok', 'Continue?').default(false), none)).toBe('> Continue? (y/N)');
  });

  it('should resolve a computed confirmation default', () => {
    const question = new ConfirmationQuestion('tests', 'Add tests?').defaultFrom(
      (answers) => answers.get('kind') === 'library'
    );
    expect(renderPrompt(question, new Map([['kind', 'library']]))).toBe('> Add tests? (Y/n)');
    expect(renderPrompt(question, new Map([['kind', 'app']]))).toBe('> Add tests? (y/N)');
  });
});

describe('printDefault', () => {
  it('should print through the question', () => {
    expect(printDefault(new OptionsQuestion('pick', 'Pick', ['A', 'B']).default(0), none)).toBe('1');
    expect(printDefault(new ConfirmationQuestion('ok', 'OK?').default(false), none)).toBe('n');
    expect(printDefault(new PlainQuestion('name', 'Name'), none)).toBeUndefined();
  });
});
