/**
 * Error types and codes for blueprint.
 *
 * Every fatal failure raised by the prompting core, the template parser and the
 * generation executor extends BlueprintError. Recoverable input problems are not
 * errors: they are returned as result values (see core/prompting/types.ts).
 */

/**
 * Base error class for all blueprint errors.
 */
export class BlueprintError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BlueprintError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Structural errors in question definitions and answer bookkeeping.
 * Error codes: P001-P008
 */
export class PromptError extends BlueprintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'PromptError';
  }
}

/**
 * Missing or malformed template descriptions.
 * Error codes: T001-T002
 */
export class TemplateError extends BlueprintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'TemplateError';
  }
}

/**
 * Failures while applying generation instructions.
 */
export class GenerationError extends BlueprintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'GenerationError';
  }
}

/**
 * Configuration and message bundle errors.
 */
export class ConfigError extends BlueprintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (parse errors, schema mismatches).
 * Error codes: S001-S002
 */
export class SystemError extends BlueprintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * Security errors (paths escaping their root).
 */
export class SecurityError extends BlueprintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SecurityError';
  }
}

export const ErrorCodes = {
  // Prompting (P001-P008)
  DUPLICATE_QUESTION: 'P001',
  EMPTY_QUESTION_LIST: 'P002',
  EMPTY_OPTIONS: 'P003',
  VALIDATOR_ALREADY_SET: 'P004',
  MISSING_ANSWER: 'P005',
  ANSWER_ALREADY_SET: 'P006',
  LIST_ALREADY_BUILT: 'P007',
  INPUT_CLOSED: 'P008',

  // Templates (T001-T002)
  TEMPLATE_NOT_FOUND: 'T001',
  INVALID_TEMPLATE: 'T002',

  // Generation
  GENERATION_FAILED: 'G001',

  // Configuration
  CONFIG_LOAD_ERROR: 'C001',
  MISSING_MESSAGE: 'C002',

  // System errors
  PARSE_ERROR: 'S001',
  SCHEMA_ERROR: 'S002',

  // Security errors
  PATH_TRAVERSAL: 'SEC001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Message of an unknown thrown value, for the command boundary.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
