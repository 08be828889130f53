export * from './questions.js';
export * from './model.js';
