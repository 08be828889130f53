/**
 * Template exports barrel file.
 */
export * from './types.js';
export * from './locator.js';
export * from './parser.js';
export * from './questions.js';
