/**
 * blueprint - project generator.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Prompting engine
export * from './core/prompting/index.js';

// Templates and generation
export * from './core/template/index.js';
export * from './core/generation/index.js';

// Project initialisation
export * from './core/messages/index.js';
export * from './core/project/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
export { askQuestions, type InputSource } from './cli/prompter.js';
