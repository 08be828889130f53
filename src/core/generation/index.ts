/**
 * Generation exports barrel file.
 */
export * from './context.js';
export * from './executor.js';
