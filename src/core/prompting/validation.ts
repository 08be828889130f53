/**
 * Validation helpers. Validators return results instead of throwing; the
 * error text reaches the user as-is.
 */
import type { ValidationResult, Validator } from './types.js';

const ACCEPTED: ValidationResult = { success: true };

export const PACKAGE_NAME_PATTERN = '[a-zA-Z][0-9a-zA-Z]*(\\.[a-zA-Z][0-9a-zA-Z]*)*';
export const CLASS_NAME_PATTERN = '[A-Z]+\\w*';

export function accept(): ValidationResult {
  return ACCEPTED;
}

export function reject(error: string): ValidationResult {
  return { success: false, error };
}

/**
 * Checks that the whole of `value` matches `pattern`.
 */
export function checkRegex(
  value: string,
  pattern: string,
  failMessage: string = 'Invalid value'
): ValidationResult {
  return new RegExp(`^(?:${pattern})$`).test(value) ? ACCEPTED : reject(failMessage);
}

/** Dotted identifier such as `com.company.app`. */
export function checkIsPackage(
  value: string,
  failMessage: string = 'Is not valid package name'
): ValidationResult {
  return checkRegex(value, PACKAGE_NAME_PATTERN, failMessage);
}

/** Capitalized identifier such as `OrderService`. */
export function checkIsClass(
  value: string,
  failMessage: string = 'Invalid class name'
): ValidationResult {
  return checkRegex(value, CLASS_NAME_PATTERN, failMessage);
}

/**
 * Runs validators in order and stops at the first failure.
 */
export function allOf<T>(...validators: Validator<T>[]): Validator<T> {
  return (value) => {
    for (const validator of validators) {
      const result = validator(value);
      if (!result.success) return result;
    }
    return ACCEPTED;
  };
}
