/**
 * Prompting engine exports barrel file.
 */
export * from './types.js';
export * from './default-value.js';
export * from './validation.js';
export * from './questions.js';
export * from './question-list.js';
export * from './answers.js';
export * from './prompt.js';
export * from './answering.js';
